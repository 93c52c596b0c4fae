/**
 * Authentication and authorization types.
 *
 * Callers present an API key (X-Api-Key); each key is bound to one role.
 *
 *   viewer    reads cycle status
 *   operator  also submits confirmations on behalf of participants
 *   admin     also retries cycle closure
 */

export type Role = "admin" | "operator" | "viewer";

export type Permission = "status:read" | "confirmation:submit" | "cycle:close";

export const ROLE_PERMISSIONS: Readonly<Record<Role, readonly Permission[]>> = {
  viewer: ["status:read"],
  operator: ["status:read", "confirmation:submit"],
  admin: ["status:read", "confirmation:submit", "cycle:close"],
};

export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

export function isRole(value: string): value is Role {
  return value === "admin" || value === "operator" || value === "viewer";
}

/** Set by the auth middleware; absent when the node runs unsecured. */
export interface AuthContext {
  readonly type: "api-key";
  readonly identity: string;
  readonly role: Role;
}

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
}
