export { enforceRoles } from './enforce';
export { EnforcementError } from './errors';
