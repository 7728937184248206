/**
 * Port: Password Policy. Complexity rules applied before a hash is
 * written. Reuse detection is the password history's job.
 */
export interface PasswordPolicyConfig {
  readonly minLength: number;
  readonly requireUppercase: boolean;
  readonly requireLowercase: boolean;
  readonly requireDigit: boolean;
  readonly requireSpecial: boolean;
}

export interface PasswordPolicyResult {
  readonly valid: boolean;
  readonly violations: readonly string[];
}

export interface PasswordPolicy {
  validate(password: string): PasswordPolicyResult;
  readonly config: PasswordPolicyConfig;
}
