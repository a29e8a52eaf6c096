/**
 * Role Gate
 *
 * Per-request authorization decision, independent of any HTTP framework:
 * skip check, role resolution, default-role fallback, enforcement loop and
 * outcome observers.
 */

import type { GateOutcome, RequestExchange, ResolvedRoleGateConfig } from './types';
import { resolveRoles, withDefaultRole } from './roles';
import { enforceRoles } from './engine';

/**
 * Decide whether a request may proceed.
 *
 * Errors from `rolesFunc` / `rolesHeaderFunc` propagate unchanged and no
 * enforcement is attempted. Engine failures surface as EnforcementError.
 * Observer return values are ignored and observer errors are not caught.
 */
export async function evaluateRequest<TRequest>(
  config: ResolvedRoleGateConfig<TRequest>,
  request: TRequest,
  exchange: RequestExchange
): Promise<GateOutcome> {
  if (config.skipper(request)) {
    return { outcome: 'skipped' };
  }

  const roles = withDefaultRole(
    await resolveRoles(config, request, exchange),
    config.defaultRole
  );

  const object = exchange.object();
  const action = exchange.action();
  const decision = await enforceRoles(config.enforcer, roles, object, action);

  if (decision.authorized && decision.role !== undefined) {
    config.successFunc?.(decision.role, object, action);
    return { outcome: 'granted', decision };
  }

  config.failureFunc?.([...roles], object, action);
  return { outcome: 'denied', decision };
}
