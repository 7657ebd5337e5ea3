import { AsyncLocalStorage } from "async_hooks";
import { ResourceCycleError } from "./errors";

/**
 * How to build a resource that needs a credential first.
 */
export interface SecretGatedResourceDefinition<T> {
  /**
   * Environment-variable style key the secret is stored under.
   */
  secretName: string;
  /**
   * Shown to the user when the secret is missing.
   */
  prompt: string;
  create(secret: string): T | Promise<T>;
}

export type SecretProvider = (envVar: string, prompt: string) => Promise<string>;

type CacheEntry<T> =
  | { state: "pending"; promise: Promise<T> }
  | { state: "ready"; value: T };

interface ConstructionScope {
  /**
   * Keys being built along this call chain, outermost first.
   */
  keys: ReadonlySet<string>;
  current: string;
}

/**
 * Keyed cache of lazily constructed resources.
 *
 * The first `acquire` for a key fetches the secret and builds the resource;
 * callers arriving while that is in flight share the same promise, later
 * callers get the stored value. A failed construction leaves the key empty
 * so the next access starts over.
 *
 * A construction that would end up waiting on itself, in its own call chain
 * or through constructions running in other flows, is rejected with
 * ResourceCycleError.
 */
export class ResourceCache<T> {
  private entries = new Map<string, CacheEntry<T>>();
  private constructing = new AsyncLocalStorage<ConstructionScope>();
  /**
   * Construction key -> pending keys it is currently awaiting.
   */
  private waitingOn = new Map<string, Set<string>>();

  acquire(
    key: string,
    definition: SecretGatedResourceDefinition<T>,
    secrets: SecretProvider
  ): Promise<T> {
    const entry = this.entries.get(key);
    if (entry?.state === "ready") {
      return Promise.resolve(entry.value);
    }

    const scope = this.constructing.getStore();
    if (scope?.keys.has(key)) {
      return Promise.reject(new ResourceCycleError(key));
    }

    if (entry?.state === "pending") {
      if (!scope) {
        return entry.promise;
      }
      if (this.waitsOnAny(key, scope.keys)) {
        return Promise.reject(new ResourceCycleError(key));
      }
      return this.awaitFrom(scope.current, key, entry.promise);
    }

    const keys = new Set(scope?.keys ?? []);
    keys.add(key);
    // Deferred by one tick so the pending entry is stored before construction starts.
    const promise = Promise.resolve().then(() =>
      this.constructing.run({ keys, current: key }, () =>
        this.construct(key, definition, secrets)
      )
    );
    this.entries.set(key, { state: "pending", promise });
    return scope ? this.awaitFrom(scope.current, key, promise) : promise;
  }

  peek(key: string): T | undefined {
    const entry = this.entries.get(key);
    return entry?.state === "ready" ? entry.value : undefined;
  }

  isReady(key: string): boolean {
    return this.entries.get(key)?.state === "ready";
  }

  clear(): void {
    this.entries.clear();
    this.waitingOn.clear();
  }

  private awaitFrom(waiter: string, key: string, promise: Promise<T>): Promise<T> {
    const edges = this.waitingOn.get(waiter) ?? new Set<string>();
    edges.add(key);
    this.waitingOn.set(waiter, edges);
    return promise.finally(() => {
      edges.delete(key);
      if (edges.size === 0 && this.waitingOn.get(waiter) === edges) {
        this.waitingOn.delete(waiter);
      }
    });
  }

  /**
   * Whether the construction of `key` is, directly or through other
   * constructions, waiting on one of `targets`.
   */
  private waitsOnAny(key: string, targets: ReadonlySet<string>): boolean {
    const seen = new Set<string>();
    const stack = [key];
    while (stack.length > 0) {
      const next = stack.pop();
      if (next === undefined || seen.has(next)) continue;
      if (targets.has(next)) return true;
      seen.add(next);
      stack.push(...(this.waitingOn.get(next) ?? []));
    }
    return false;
  }

  private async construct(
    key: string,
    definition: SecretGatedResourceDefinition<T>,
    secrets: SecretProvider
  ): Promise<T> {
    try {
      const secret = await secrets(definition.secretName, definition.prompt);
      const value = await definition.create(secret);
      this.entries.set(key, { state: "ready", value });
      return value;
    } catch (err) {
      this.entries.delete(key);
      throw err;
    }
  }
}
