import * as fs from 'fs';
import { ConfigLoadError } from '../config/errors';
import { logger as defaultLogger, type Logger } from '../utils/logger';
import { PolicyTableEnforcer } from './table-enforcer';

/**
 * Load a policy-table file (YAML or JSON) into an enforcer.
 */
export function loadPolicyTable(path: string, logger: Logger = defaultLogger): PolicyTableEnforcer {
  let content: string;
  try {
    content = fs.readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ConfigLoadError(
      `Failed to read policy file: ${path}`,
      error instanceof Error ? error : undefined
    );
  }

  const enforcer = PolicyTableEnforcer.fromYaml(content, path);
  logger.info('Loaded policy table', { path, rules: enforcer.ruleCount });
  return enforcer;
}
