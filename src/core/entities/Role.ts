/**
 * Requester roles known to the ticket domain
 */
export enum UserRole {
  ADMIN = 'ADMIN',
  USER = 'USER'
}

const KNOWN_ROLES: readonly string[] = Object.values(UserRole);
const PRIORITY_MANAGERS: ReadonlySet<UserRole> = new Set([UserRole.ADMIN]);

export function isUserRole(value: string): value is UserRole {
  return KNOWN_ROLES.includes(value);
}

/**
 * Only administrators may escalate or reprioritize a ticket
 */
export function canChangePriority(role: UserRole): boolean {
  return PRIORITY_MANAGERS.has(role);
}
