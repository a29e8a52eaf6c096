import type { AuthorizationDecision, Enforcer } from '../types';
import { EnforcementError } from './errors';

/**
 * Try each role against the enforcer in order until one is granted.
 *
 * First grant wins: later roles are never queried. An engine failure aborts
 * the loop with EnforcementError without trying the remaining roles.
 */
export async function enforceRoles(
  enforcer: Enforcer,
  roles: string[],
  object: string,
  action: string
): Promise<AuthorizationDecision> {
  for (const role of roles) {
    let allowed: boolean;
    try {
      allowed = await enforcer.enforce(role, object, action);
    } catch (error) {
      throw new EnforcementError(
        `error enforcing: ${error instanceof Error ? error.message : String(error)}`,
        role,
        object,
        action,
        error
      );
    }

    if (allowed) {
      return { object, action, authorized: true, role, roles };
    }
  }

  return { object, action, authorized: false, roles };
}
