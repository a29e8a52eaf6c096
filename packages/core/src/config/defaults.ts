/**
 * Gate option defaults and resolution.
 */

import type { Enforcer, ResolvedRoleGateConfig, RoleGateOptions } from '../types';
import { ConfigValidationError } from './errors';

export const DEFAULT_ROLE_GATE_OPTIONS = Object.freeze({
  contextKey: 'roles',
  defaultRole: 'any',
  enableRolesHeader: false,
  rolesHeader: 'X-Roles',
  forbiddenMessage: 'Access to this resource has been restricted',
});

const neverSkip = (): boolean => false;

function orDefault(value: string | undefined, fallback: string): string {
  return value === undefined || value === '' ? fallback : value;
}

/**
 * Apply defaults to user options and check the enforcer is present.
 *
 * Throws ConfigValidationError when no enforcer is given; this is meant to
 * stop server setup, not to be handled per request.
 */
export function resolveRoleGateConfig<TRequest>(
  options: RoleGateOptions<TRequest>
): ResolvedRoleGateConfig<TRequest> {
  const enforcer = options.enforcer;
  if (!enforcer || typeof enforcer.enforce !== 'function') {
    throw new ConfigValidationError(
      'Role gate requires an enforcer',
      'enforcer',
      enforcer,
      'Enforcer'
    );
  }

  return Object.freeze({
    skipper: options.skipper ?? neverSkip,
    enforcer,
    contextKey: orDefault(options.contextKey, DEFAULT_ROLE_GATE_OPTIONS.contextKey),
    defaultRole: orDefault(options.defaultRole, DEFAULT_ROLE_GATE_OPTIONS.defaultRole),
    enableRolesHeader: options.enableRolesHeader ?? DEFAULT_ROLE_GATE_OPTIONS.enableRolesHeader,
    rolesHeader: orDefault(options.rolesHeader, DEFAULT_ROLE_GATE_OPTIONS.rolesHeader),
    rolesHeaderFunc: options.rolesHeaderFunc,
    rolesFunc: options.rolesFunc,
    forbiddenMessage: orDefault(options.forbiddenMessage, DEFAULT_ROLE_GATE_OPTIONS.forbiddenMessage),
    successFunc: options.successFunc,
    failureFunc: options.failureFunc,
  });
}

/**
 * All-defaults options for the given enforcer.
 */
export function withEnforcer<TRequest>(enforcer: Enforcer): RoleGateOptions<TRequest> {
  return { ...DEFAULT_ROLE_GATE_OPTIONS, enforcer };
}
