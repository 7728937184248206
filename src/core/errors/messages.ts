/** Human-readable texts carried in AppError.errors */
export const ErrorMessages = {
  USER_NOT_FOUND: "User not found.",
  FORBIDDEN: "You do not have permission to act on this user.",
  PASSWORD_MISMATCH: "Password and confirmation password do not match.",
  PASSWORD_ALREADY_SET: "A password has already been set for this user.",
  INVALID_CREDENTIALS: "Invalid credentials.",
  CANNOT_REUSE: "The new password was used recently and cannot be reused.",
  ALREADY_ACTIVATED: "The account is already activated.",
  NOT_ACTIVATED: "The account is not activated.",
  INACTIVE_USER: "Roles can only be assigned to active accounts.",
  INVALID_ROLE: "The role does not exist.",
  ROLE_ALREADY_HELD: "The user already holds a role.",
  MISSING_ROLE: "The user does not hold this role.",
  AUDIT_LOG_NOT_FOUND: "Audit log entry not found.",
  USER_NAME_TAKEN: "The user name is already taken.",
  EMAIL_TAKEN: "The email address is already in use.",
} as const;
