export { parseRolesHeader } from './header';
export { readStoredRoles, storedRoleNames } from './role-store';
export type { StoredRoles } from './role-store';
export { resolveRoles, withDefaultRole } from './resolver';
