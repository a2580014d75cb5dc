/**
 * packages/core/src/widgets/callbacks.ts — Multi-subscriber event registry for widgets.
 */

import { describeThrown } from "../errors.js";
import type { Logger } from "../logging.js";

export type EventArgsMap = Record<string, unknown[]>;

type Listener<A extends unknown[]> = (...args: A) => void;

type ListenerTable<M extends EventArgsMap> = { [E in keyof M]?: Listener<M[E]>[] };

/**
 * Listeners run in registration order. A throwing listener is logged and the
 * remaining listeners still run.
 */
export class CallbackRegistry<M extends EventArgsMap> {
  private readonly listeners: ListenerTable<M> = {};
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /** Returns a function that removes this registration. */
  bind<E extends keyof M>(event: E, callback: Listener<M[E]>): () => void {
    const list = this.listeners[event];
    if (list === undefined) {
      this.listeners[event] = [callback];
    } else {
      list.push(callback);
    }

    let bound = true;
    return () => {
      if (!bound) return;
      bound = false;
      const current = this.listeners[event];
      if (current === undefined) return;
      const index = current.indexOf(callback);
      if (index >= 0) current.splice(index, 1);
    };
  }

  /** Invoke every listener for `event`; returns how many ran without throwing. */
  trigger<E extends keyof M>(event: E, ...args: M[E]): number {
    const list = this.listeners[event];
    if (list === undefined || list.length === 0) return 0;

    let succeeded = 0;
    for (const listener of list.slice()) {
      try {
        listener(...args);
        succeeded++;
      } catch (err: unknown) {
        this.logger.warn(
          { err, event: String(event) },
          `widget callback threw: ${describeThrown(err)}`,
        );
      }
    }
    return succeeded;
  }

  count(event: keyof M): number {
    return this.listeners[event]?.length ?? 0;
  }

  clear(): void {
    for (const key of Object.keys(this.listeners)) {
      Reflect.deleteProperty(this.listeners, key);
    }
  }
}
