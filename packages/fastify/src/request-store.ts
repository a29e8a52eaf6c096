import type { FastifyRequest } from 'fastify';

/**
 * Per-request key/value store.
 *
 * Hooks that run before the gate (authentication, session lookup) put the
 * caller's roles here under the gate's `contextKey`; the gate only reads.
 */
export class RequestStore {
  private readonly values = new Map<string, unknown>();

  get(key: string): unknown {
    return this.values.get(key);
  }

  set(key: string, value: unknown): this {
    this.values.set(key, value);
    return this;
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  delete(key: string): boolean {
    return this.values.delete(key);
  }
}

// Released with the request object
const stores = new WeakMap<FastifyRequest, RequestStore>();

/**
 * The store for `request`, created on first access.
 */
export function getRequestStore(request: FastifyRequest): RequestStore {
  let store = stores.get(request);
  if (!store) {
    store = new RequestStore();
    stores.set(request, store);
  }
  return store;
}

/**
 * Read a value without creating a store for the request.
 */
export function peekRequestValue(request: FastifyRequest, key: string): unknown {
  return stores.get(request)?.get(key);
}
