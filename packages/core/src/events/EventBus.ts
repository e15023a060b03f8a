import type { Logger } from '../config.js';

export type EventHandler<T> = (data: T) => void;

type HandlerTable<Events> = { [K in keyof Events]?: Set<EventHandler<Events[K]>> };

/**
 * Typed publish/subscribe hub. A failing handler is logged and the
 * remaining handlers still run.
 */
export class EventBus<Events extends object> {
  private handlers: HandlerTable<Events> = {};
  private logger: Pick<Logger, 'error'>;

  constructor(logger: Pick<Logger, 'error'> = console) {
    this.logger = logger;
  }

  on<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): () => void {
    const set = this.handlers[event] ?? new Set<EventHandler<Events[K]>>();
    this.handlers[event] = set;
    set.add(handler);
    return () => {
      set.delete(handler);
    };
  }

  off<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): void {
    this.handlers[event]?.delete(handler);
  }

  emit<K extends keyof Events>(event: K, data: Events[K]): void {
    const set = this.handlers[event];
    if (!set) return;
    for (const handler of [...set]) {
      try {
        handler(data);
      } catch (error) {
        this.logger.error(`Error in ${String(event)} listener:`, error);
      }
    }
  }

  listenerCount(event: keyof Events): number {
    return this.handlers[event]?.size ?? 0;
  }

  clear(): void {
    this.handlers = {};
  }
}
