import type { EngineLogger } from "../logger";

export type EventHub<T> = {
  publish(key: string, event: T): void;
  subscribe(key: string, handler: (event: T) => void): () => void;
  /** Drop every subscriber of one key */
  clear(key: string): void;
};

export function createEventHub<T>(logger: EngineLogger): EventHub<T> {
  const subscribers = new Map<string, Set<(event: T) => void>>();

  return {
    publish(key, event) {
      const keySubscribers = subscribers.get(key);
      if (!keySubscribers?.size) {
        return;
      }

      for (const handler of keySubscribers) {
        try {
          handler(event);
        } catch (error) {
          logger.error("Event subscriber failed", {
            key,
            error: error instanceof Error ? error.message : String(error),
          });
        }
      }
    },

    subscribe(key, handler) {
      const keySubscribers =
        subscribers.get(key) ?? new Set<(event: T) => void>();
      keySubscribers.add(handler);
      subscribers.set(key, keySubscribers);

      return () => {
        const current = subscribers.get(key);
        if (!current) {
          return;
        }
        current.delete(handler);
        if (current.size === 0) {
          subscribers.delete(key);
        }
      };
    },

    clear(key) {
      subscribers.delete(key);
    },
  };
}
