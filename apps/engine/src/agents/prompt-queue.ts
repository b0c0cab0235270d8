import type { PromptRequest } from "./types";

/** FIFO buffer of pending prompt requests for one session. */
export type PromptQueue = {
  enqueue(request: PromptRequest): void;
  /** Oldest pending request, or undefined when empty */
  dequeue(): PromptRequest | undefined;
  peek(): PromptRequest | undefined;
  size(): number;
  snapshot(): readonly PromptRequest[];
  /** Remove every pending request, marking each cancelled */
  cancelAll(): PromptRequest[];
};

export function createPromptQueue(): PromptQueue {
  const entries: PromptRequest[] = [];

  return {
    enqueue(request) {
      entries.push(request);
    },
    dequeue() {
      return entries.shift();
    },
    peek() {
      return entries[0];
    },
    size() {
      return entries.length;
    },
    snapshot() {
      return [...entries];
    },
    cancelAll() {
      const cancelled = entries.splice(0, entries.length);
      for (const request of cancelled) {
        request.status = "cancelled";
      }
      return cancelled;
    },
  };
}
