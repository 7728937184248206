import type { Timestamp, UserId } from "../types/index.js";

/**
 * User entity. Plain data.
 * Roles live in a separate membership relation and are read through
 * the repository.
 */
export interface User {
  readonly id: UserId;
  readonly userName: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly email: string;
  readonly phoneNumber: string | null;
  /** null until the owner sets a first password */
  readonly passwordHash: string | null;
  readonly accountStatus: AccountStatus;
  readonly createdAt: Timestamp;
  readonly updatedAt: Timestamp;
}

export type CredentialedUser = User & { readonly passwordHash: string };
export type UncredentialedUser = User & { readonly passwordHash: null };

export const hasPassword = (user: User): user is CredentialedUser =>
  user.passwordHash !== null && user.passwordHash.length > 0;

export const AccountStatus = {
  INACTIVE: 0,
  ACTIVE: 1,
} as const;

export type AccountStatus = (typeof AccountStatus)[keyof typeof AccountStatus];

export const isAccountStatus = (value: number): value is AccountStatus =>
  value === AccountStatus.INACTIVE || value === AccountStatus.ACTIVE;
