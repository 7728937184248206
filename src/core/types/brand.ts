/**
 * Branded / opaque type utility.
 * Keeps structurally identical primitives (user ids, request ids) apart.
 *
 * @example
 * type UserId = Brand<string, "UserId">;
 * const id = brand<string, "UserId">("6f1c...");
 */
declare const __brand: unique symbol;

export type Brand<T, B extends string> = T & { readonly [__brand]: B };

export type UserId = Brand<string, "UserId">;
export type RequestId = Brand<string, "RequestId">;
export type Timestamp = Brand<number, "Timestamp">;

/** Runtime no-op, compile-time tag */
export const brand = <T, B extends string>(value: T): Brand<T, B> => value as Brand<T, B>;

/** User ids compare without regard to case; the canonical form is lowercase. */
export const toUserId = (value: string): UserId => brand<string, "UserId">(value.toLowerCase());
export const toTimestamp = (value: number): Timestamp => brand<number, "Timestamp">(value);
