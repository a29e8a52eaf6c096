/**
 * Core Types
 *
 * Shared type definitions for the role gate: the enforcement engine
 * contract, gate options and the per-request decision.
 */

// =============================================================================
// Enforcement Engine
// =============================================================================

/**
 * Policy-decision collaborator.
 *
 * Answers whether `subject` may perform `action` on `object`. A thrown error
 * or rejected promise means the engine itself failed, which is distinct from
 * a `false` answer.
 */
export interface Enforcer {
  enforce(subject: string, object: string, action: string): boolean | Promise<boolean>;
}

// =============================================================================
// Extension Points
// =============================================================================

/** Returns true when the gate should be bypassed for the request */
export type Skipper<TRequest> = (request: TRequest) => boolean;

/** Custom role resolution; replaces store and header lookup entirely */
export type RolesFunc<TRequest> = (request: TRequest) => string[] | Promise<string[]>;

/** Custom parser for the raw roles header text */
export type RolesHeaderFunc = (header: string) => string[] | Promise<string[]>;

/** Called with the role that was granted access */
export type SuccessFunc = (role: string, object: string, action: string) => void;

/** Called with the full role set when no role was granted access */
export type FailureFunc = (roles: string[], object: string, action: string) => void;

// =============================================================================
// Options
// =============================================================================

export interface RoleGateOptions<TRequest> {
  /** Bypass predicate. Default: never skip */
  skipper?: Skipper<TRequest>;
  /** Enforcement engine. Required */
  enforcer?: Enforcer;
  /** Request-store key holding pre-resolved roles. Default: `roles` */
  contextKey?: string;
  /** Role used when nothing else yields one. Default: `any` */
  defaultRole?: string;
  /** Read roles from a request header when the store has none */
  enableRolesHeader?: boolean;
  /** Header carrying comma-separated roles. Default: `X-Roles` */
  rolesHeader?: string;
  rolesHeaderFunc?: RolesHeaderFunc;
  rolesFunc?: RolesFunc<TRequest>;
  /** Message sent with 403 responses */
  forbiddenMessage?: string;
  successFunc?: SuccessFunc;
  failureFunc?: FailureFunc;
}

/**
 * Options after defaults have been applied. Frozen once built.
 */
export interface ResolvedRoleGateConfig<TRequest> {
  readonly skipper: Skipper<TRequest>;
  readonly enforcer: Enforcer;
  readonly contextKey: string;
  readonly defaultRole: string;
  readonly enableRolesHeader: boolean;
  readonly rolesHeader: string;
  readonly rolesHeaderFunc?: RolesHeaderFunc;
  readonly rolesFunc?: RolesFunc<TRequest>;
  readonly forbiddenMessage: string;
  readonly successFunc?: SuccessFunc;
  readonly failureFunc?: FailureFunc;
}

// =============================================================================
// Request View
// =============================================================================

/**
 * What the gate needs to read from a framework request.
 * Framework adapters implement this over their own request type.
 */
export interface RequestExchange {
  /** Matched route pattern, e.g. `/users/:id` */
  object(): string;
  /** HTTP method */
  action(): string;
  /** Header value, or empty string when absent */
  header(name: string): string;
  /** Raw value stored under `key` in the request-scoped store */
  stored(key: string): unknown;
}

// =============================================================================
// Decisions
// =============================================================================

export interface AuthorizationDecision {
  object: string;
  action: string;
  authorized: boolean;
  /** Role that produced the grant */
  role?: string;
  /** Roles that were considered, in order */
  roles: string[];
}

export type GateOutcome =
  | { outcome: 'skipped' }
  | { outcome: 'granted'; decision: AuthorizationDecision }
  | { outcome: 'denied'; decision: AuthorizationDecision };
