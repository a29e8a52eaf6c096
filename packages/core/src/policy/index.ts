export { PolicyParseError } from './errors';
export { loadPolicyTable } from './loader';
export { PolicyTableSchema } from './schema';
export type { PolicyRule, PolicyTable, PolicyTableInput } from './schema';
export { PolicyTableEnforcer } from './table-enforcer';
