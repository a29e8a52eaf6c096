/**
 * Settings Loader
 *
 * Loads the serialisable part of the gate options from YAML:
 * - Environment variable substitution (${VAR} and ${VAR:-default})
 * - String to boolean conversion for substituted values
 * - Unknown-key rejection
 * - Type validation with zod
 *
 * Function-valued options (skipper, enforcer, callbacks) can only be
 * supplied in code.
 */

import * as fs from 'fs';
import * as yaml from 'yaml';
import { z } from 'zod';
import { ConfigLoadError, ConfigValidationError } from './errors';

export const RoleGateSettingsSchema = z
  .object({
    contextKey: z.string().min(1),
    defaultRole: z.string().min(1),
    enableRolesHeader: z.boolean(),
    rolesHeader: z.string().min(1),
    forbiddenMessage: z.string().min(1),
  })
  .partial()
  .strict();

export type RoleGateSettings = z.infer<typeof RoleGateSettingsSchema>;

export interface SettingsLoaderOptions {
  configPath?: string;
  /** Variables used for substitution. Default: process.env */
  env?: NodeJS.ProcessEnv;
}

const DEFAULT_SEARCH_PATHS = ['./rolegate.yaml', './config/rolegate.yaml'];

export function loadRoleGateSettings(options: SettingsLoaderOptions = {}): RoleGateSettings {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? findSettingsFile();

  if (!configPath) {
    return {};
  }
  if (!fs.existsSync(configPath)) {
    throw new ConfigLoadError(`Config file not found: ${configPath}`);
  }

  return parseRoleGateSettings(readFile(configPath), env);
}

/**
 * Parse settings from YAML text.
 */
export function parseRoleGateSettings(
  content: string,
  env: NodeJS.ProcessEnv = process.env
): RoleGateSettings {
  const parsed = parseYaml(content);
  const substituted = substituteEnvVars(parsed, env);
  const converted = convertTypes(substituted);

  const result = RoleGateSettingsSchema.safeParse(converted);
  if (!result.success) {
    const issue = result.error.issues[0];
    if (issue.code === 'unrecognized_keys') {
      const key = issue.keys[0];
      throw new ConfigValidationError(`Unknown configuration key: '${key}'`, key, converted[key]);
    }
    const field = issue.path.join('.');
    throw new ConfigValidationError(
      `Invalid value for ${field}: ${issue.message}`,
      field,
      converted[field],
      'expected' in issue ? String(issue.expected) : undefined
    );
  }
  return result.data;
}

function findSettingsFile(): string | null {
  for (const searchPath of DEFAULT_SEARCH_PATHS) {
    if (fs.existsSync(searchPath)) {
      return searchPath;
    }
  }
  return null;
}

function readFile(path: string): string {
  try {
    return fs.readFileSync(path, 'utf8');
  } catch (e) {
    throw new ConfigLoadError(`Failed to read config file: ${path}`, e instanceof Error ? e : undefined);
  }
}

function parseYaml(content: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = yaml.parse(content);
  } catch (e) {
    throw new ConfigLoadError('Invalid YAML syntax', e instanceof Error ? e : undefined);
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigLoadError('Config file must contain a mapping');
  }
  return Object.fromEntries(Object.entries(parsed));
}

function substituteEnvVars(
  obj: Record<string, unknown>,
  env: NodeJS.ProcessEnv
): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(obj).map(([key, value]) => [key, substituteValue(value, env)])
  );
}

function substituteValue(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value !== 'string') {
    return value;
  }

  return value.replace(/\$\{(\w+)(?::-([^}]*))?\}/g, (_match, name: string, defaultVal?: string) => {
    const envValue = env[name];

    // Empty counts as unset when a default is given
    if (envValue === '' && defaultVal !== undefined) {
      return defaultVal;
    }
    if (envValue === undefined && defaultVal === undefined) {
      throw new ConfigLoadError(`Required environment variable '${name}' not set`);
    }
    return envValue ?? defaultVal ?? '';
  });
}

function convertTypes(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    if (value === 'true') {
      result[key] = true;
    } else if (value === 'false') {
      result[key] = false;
    } else {
      result[key] = value;
    }
  }

  return result;
}
