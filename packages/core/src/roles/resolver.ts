import type { RequestExchange, ResolvedRoleGateConfig } from '../types';
import { parseRolesHeader } from './header';
import { readStoredRoles, storedRoleNames } from './role-store';

/**
 * Resolve the role set for a request.
 *
 * Precedence:
 * 1. `rolesFunc`, when configured (its errors propagate)
 * 2. the request store under `contextKey`
 * 3. the roles header, when enabled and the store gave nothing
 *
 * The result may be empty; the default-role fallback is applied by the
 * caller.
 */
export async function resolveRoles<TRequest>(
  config: ResolvedRoleGateConfig<TRequest>,
  request: TRequest,
  exchange: RequestExchange
): Promise<string[]> {
  if (config.rolesFunc) {
    return [...(await config.rolesFunc(request))];
  }

  const roles = storedRoleNames(readStoredRoles(exchange.stored(config.contextKey)));
  if (roles.length > 0 || !config.enableRolesHeader) {
    return roles;
  }

  const header = exchange.header(config.rolesHeader) || config.defaultRole;
  const parse = config.rolesHeaderFunc ?? parseRolesHeader;
  return [...(await parse(header))];
}

/**
 * Roles to enforce: the resolved set, or the default role alone when empty.
 */
export function withDefaultRole(roles: string[], defaultRole: string): string[] {
  return roles.length > 0 ? roles : [defaultRole];
}
