export {
  createRoleGateHook,
  fastifyExchange,
  registerRoleGate,
} from './role-gate';

export type { FastifyRoleGateOptions, RoleGateHook } from './role-gate';

export { RequestStore, getRequestStore, peekRequestValue } from './request-store';
