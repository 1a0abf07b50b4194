import { AsyncLocalStorage } from "node:async_hooks";
import { randomUUID } from "node:crypto";
import { ContextError } from "switchyard-shared";

export type ContextFieldValue = string | number | boolean | undefined;

/**
 * Execution context of a serial scope.
 * Loggers read it to tag every line with the scope that produced it.
 */
export interface ScopeContext {
  scopeId: string;
  /** Scope name, e.g. the channel topic */
  name: string;
  /**
   * Extra fields injected into log lines (e.g. `topic`, `join_ref`).
   * Values may be functions, read lazily when a line is written.
   */
  fields: Record<string, ContextFieldValue | (() => ContextFieldValue)>;
}

const storage = new AsyncLocalStorage<ScopeContext>();

export class Context {
  /**
   * Creates a new context object with defaults.
   */
  static create(overrides: Partial<ScopeContext> = {}): ScopeContext {
    return {
      scopeId: overrides.scopeId ?? randomUUID(),
      name: overrides.name ?? "anonymous",
      fields: overrides.fields ?? {},
    };
  }

  /**
   * Runs a function within the given context.
   */
  static run<T>(context: ScopeContext, fn: () => T): T {
    return storage.run(context, fn);
  }

  /**
   * Creates a child context that inherits from the current context (or creates a new root).
   * Fields are merged; the child's win.
   *
   * @example
   * ```typescript
   * const ctx = Context.child({ fields: { attempt: 2 } });
   * Context.run(ctx, () => log.info('retrying'));
   * ```
   */
  static child(overrides: Partial<ScopeContext> = {}): ScopeContext {
    const parent = Context.tryGet();
    if (!parent) {
      return Context.create(overrides);
    }
    return {
      ...parent,
      ...overrides,
      fields: { ...parent.fields, ...overrides.fields },
    };
  }

  /**
   * Gets the current context. Throws if not found.
   */
  static get(): ScopeContext {
    const store = storage.getStore();
    if (!store) {
      throw ContextError.notFound();
    }
    return store;
  }

  /**
   * Gets the current context or returns undefined if not found.
   */
  static tryGet(): ScopeContext | undefined {
    return storage.getStore();
  }
}

/**
 * Resolve lazily-evaluated context fields into plain values.
 */
export function resolveFields(fields: ScopeContext["fields"]): Record<string, ContextFieldValue> {
  const resolved: Record<string, ContextFieldValue> = {};
  for (const [key, value] of Object.entries(fields)) {
    const current = typeof value === "function" ? value() : value;
    if (current !== undefined) {
      resolved[key] = current;
    }
  }
  return resolved;
}
