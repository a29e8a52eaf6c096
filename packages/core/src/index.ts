// Types
export * from './types';

// Option defaults, resolution and settings files
export * from './config';

// Role resolution
export * from './roles';

// Enforcement loop
export * from './engine';

// Per-request decision
export { evaluateRequest } from './gate';

// Built-in policy-table enforcer
export * from './policy';

// Logging and matching helpers
export { Logger, logger, isLogLevel } from './utils/logger';
export type { LogLevel, LoggerOptions } from './utils/logger';
export { matchesResourcePattern, matchesMethod } from './utils/pattern-matching';
