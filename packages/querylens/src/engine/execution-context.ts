import { AsyncLocalStorage } from "node:async_hooks";

import { type ContextId } from "../core/types";

/**
 * Carries the current context id across `await` boundaries.
 *
 * Hooks always take an explicit context id; this is only how integrations
 * that sit deep inside a driver find out which one to pass.
 */
export class ExecutionContext {
  readonly #storage = new AsyncLocalStorage<ContextId>();

  run<T>(contextId: ContextId, fn: () => T): T {
    return this.#storage.run(contextId, fn);
  }

  current(): ContextId | undefined {
    return this.#storage.getStore();
  }
}
