/**
 * Fastify Role Gate
 *
 * Registers the role gate as an `onRequest` hook:
 * - forwards when the request is skipped or a role is granted
 * - replies 403 `{ message }` when every role is denied
 * - replies 500 when the enforcer fails
 * - hands errors from custom role functions to Fastify's error handler
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import {
  EnforcementError,
  evaluateRequest,
  resolveRoleGateConfig,
  type GateOutcome,
  type RequestExchange,
  type RoleGateOptions,
} from '@rolegate/core';
import { peekRequestValue } from './request-store';

export type FastifyRoleGateOptions = RoleGateOptions<FastifyRequest>;

export type RoleGateHook = (
  request: FastifyRequest,
  reply: FastifyReply
) => Promise<FastifyReply | undefined>;

const INTERNAL_ERROR_MESSAGE = 'Internal Server Error';

function pathOf(url: string): string {
  const queryStart = url.indexOf('?');
  return queryStart === -1 ? url : url.slice(0, queryStart);
}

/**
 * Read-only view of a Fastify request for the gate.
 *
 * The object is the matched route pattern; requests that matched no route
 * fall back to the raw path without its query string.
 */
export function fastifyExchange(request: FastifyRequest): RequestExchange {
  return {
    object: () => request.routeOptions.url || pathOf(request.url),
    action: () => request.method,
    header: (name) => {
      const value = request.headers[name.toLowerCase()];
      return Array.isArray(value) ? value.join(',') : value ?? '';
    },
    stored: (key) => peekRequestValue(request, key),
  };
}

/**
 * Build the gate hook. Options are resolved once here; a missing enforcer
 * throws ConfigValidationError before any request is served.
 */
export function createRoleGateHook(options: FastifyRoleGateOptions): RoleGateHook {
  const config = resolveRoleGateConfig(options);

  return async function roleGate(request, reply) {
    let result: GateOutcome;
    try {
      result = await evaluateRequest(config, request, fastifyExchange(request));
    } catch (error) {
      if (error instanceof EnforcementError) {
        request.log.error(
          { err: error.cause ?? error, role: error.subject, object: error.object, action: error.action },
          'error enforcing'
        );
        return reply.code(error.statusCode).send({ message: INTERNAL_ERROR_MESSAGE });
      }
      throw error;
    }

    switch (result.outcome) {
      case 'skipped':
        return undefined;
      case 'granted':
        request.log.debug(
          { role: result.decision.role, object: result.decision.object, action: result.decision.action },
          'role gate granted'
        );
        return undefined;
      case 'denied':
        request.log.warn(
          { roles: result.decision.roles, object: result.decision.object, action: result.decision.action },
          'role gate denied'
        );
        return reply.code(403).send({ message: config.forbiddenMessage });
    }
  };
}

/**
 * Guard every route of `app` (and its child contexts) with the role gate.
 *
 * @example
 * registerRoleGate(app, {
 *   enforcer: loadPolicyTable('./policy.yaml'),
 *   enableRolesHeader: true,
 * });
 */
export function registerRoleGate(app: FastifyInstance, options: FastifyRoleGateOptions): void {
  app.addHook('onRequest', createRoleGateHook(options));
}
