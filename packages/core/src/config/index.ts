/**
 * Configuration Module
 */

export {
  DEFAULT_ROLE_GATE_OPTIONS,
  resolveRoleGateConfig,
  withEnforcer,
} from './defaults';

export { ConfigLoadError, ConfigValidationError } from './errors';

export {
  RoleGateSettingsSchema,
  loadRoleGateSettings,
  parseRoleGateSettings,
} from './loader';

export type { RoleGateSettings, SettingsLoaderOptions } from './loader';
