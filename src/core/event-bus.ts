/**
 * Typed event emitter for task and command lifecycle.
 */

import type { IInvocation, TaskName } from "../types/task.js";
import { logger } from "../utils/logger.js";

type EventHandler<T> = (data: T) => void;

export interface ITaskEventMap {
  "task:start": { task: TaskName };
  "task:finish": { task: TaskName; exitCode: number };
  "command:start": { task: TaskName; invocation: IInvocation; dryRun: boolean };
  "command:exit": { task: TaskName; invocation: IInvocation; exitCode: number; durationMs: number };
}

export type TaskEventName = keyof ITaskEventMap;

type HandlerSets = {
  [K in TaskEventName]?: Set<EventHandler<ITaskEventMap[K]>>;
};

export class EventBus {
  private listeners: HandlerSets = {};

  on<K extends TaskEventName>(event: K, handler: EventHandler<ITaskEventMap[K]>): () => void {
    const handlers: Set<EventHandler<ITaskEventMap[K]>> = this.listeners[event] ?? new Set();
    handlers.add(handler);
    this.listeners[event] = handlers;

    // Return unsubscribe function
    return () => {
      handlers.delete(handler);
      if (handlers.size === 0) {
        delete this.listeners[event];
      }
    };
  }

  once<K extends TaskEventName>(event: K, handler: EventHandler<ITaskEventMap[K]>): () => void {
    const wrappedHandler: EventHandler<ITaskEventMap[K]> = (data) => {
      unsubscribe();
      handler(data);
    };
    const unsubscribe = this.on(event, wrappedHandler);
    return unsubscribe;
  }

  emit<K extends TaskEventName>(event: K, data: ITaskEventMap[K]): void {
    const handlers = this.listeners[event];
    if (!handlers) {
      return;
    }
    for (const handler of [...handlers]) {
      try {
        handler(data);
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error({ event, error: message }, "Event handler failed");
      }
    }
  }

  removeAllListeners(event?: TaskEventName): void {
    if (event) {
      delete this.listeners[event];
    } else {
      this.listeners = {};
    }
  }

  listenerCount(event: TaskEventName): number {
    return this.listeners[event]?.size ?? 0;
  }
}
