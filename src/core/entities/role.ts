/**
 * Closed role set with a total order. Names match the stored and
 * token-carried role strings exactly.
 */
export const Role = {
  USER: "User",
  ADMIN: "Admin",
  SUPER_ADMIN: "SuperAdmin",
} as const;

export type Role = (typeof Role)[keyof typeof Role];

export const ROLE_RANK: Record<Role, number> = {
  User: 1,
  Admin: 2,
  SuperAdmin: 3,
};

export const ALL_ROLES: readonly Role[] = [Role.ADMIN, Role.SUPER_ADMIN, Role.USER];

export const parseRole = (value: string): Role | null => {
  switch (value) {
    case Role.USER:
      return Role.USER;
    case Role.ADMIN:
      return Role.ADMIN;
    case Role.SUPER_ADMIN:
      return Role.SUPER_ADMIN;
    default:
      return null;
  }
};

/** Highest-ranked recognised role, or null when none of the names is a role */
export const highestRole = (names: readonly string[]): Role | null => {
  let best: Role | null = null;
  for (const name of names) {
    const role = parseRole(name);
    if (role !== null && (best === null || ROLE_RANK[role] > ROLE_RANK[best])) {
      best = role;
    }
  }
  return best;
};
