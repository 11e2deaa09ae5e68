// src/services/scopeStore.ts

/**
 * Per-request key/value store.
 *
 * Entries are keyed by the request object itself, never by its contents, so two
 * in-flight requests cannot collide even if their tokens happened to match.
 * JavaScript runs on one thread: concurrent requests only interleave at await
 * points and each one reads and writes its own entry, so no locking is needed.
 *
 * An entry lives until `release(request)`. Callers that never release (see the
 * no-clear wrappers) leak one entry per request for the life of the process.
 */
export class ScopeStore {
  private readonly entries = new Map<object, Map<string, unknown>>();

  /** Bind `value` under `key` for `request`, replacing any previous value. */
  bind(request: object, key: string, value: unknown): void {
    let scope = this.entries.get(request);
    if (!scope) {
      scope = new Map();
      this.entries.set(request, scope);
    }
    scope.set(key, value);
  }

  get(request: object, key: string): unknown {
    return this.entries.get(request)?.get(key);
  }

  has(request: object): boolean {
    return this.entries.has(request);
  }

  /** Drop every binding of `request`. */
  release(request: object): void {
    this.entries.delete(request);
  }

  /** Number of requests with live bindings. */
  get size(): number {
    return this.entries.size;
  }
}
