import type {
  PasswordPolicy,
  PasswordPolicyConfig,
  PasswordPolicyResult,
} from "../../core/ports/password-policy.js";

interface Rule {
  readonly enabled: (config: PasswordPolicyConfig) => boolean;
  readonly passes: (password: string, config: PasswordPolicyConfig) => boolean;
  readonly message: (config: PasswordPolicyConfig) => string;
}

/** Evaluated in order; every failing rule contributes its message */
const RULES: readonly Rule[] = [
  {
    enabled: () => true,
    passes: (p, c) => p.length >= c.minLength,
    message: (c) => `Passwords must be at least ${c.minLength} characters.`,
  },
  {
    enabled: (c) => c.requireUppercase,
    passes: (p) => /[A-Z]/.test(p),
    message: () => "Passwords must have at least one uppercase ('A'-'Z').",
  },
  {
    enabled: (c) => c.requireLowercase,
    passes: (p) => /[a-z]/.test(p),
    message: () => "Passwords must have at least one lowercase ('a'-'z').",
  },
  {
    enabled: (c) => c.requireDigit,
    passes: (p) => /\d/.test(p),
    message: () => "Passwords must have at least one digit ('0'-'9').",
  },
  {
    enabled: (c) => c.requireSpecial,
    passes: (p) => /[^A-Za-z0-9]/.test(p),
    message: () => "Passwords must have at least one non alphanumeric character.",
  },
];

/** Complexity rules; violation texts reach callers unchanged */
export const createPasswordPolicy = (config: PasswordPolicyConfig): PasswordPolicy => ({
  config,

  validate(password: string): PasswordPolicyResult {
    const violations = RULES.filter((r) => r.enabled(config) && !r.passes(password, config)).map(
      (r) => r.message(config),
    );
    return { valid: violations.length === 0, violations };
  },
});
