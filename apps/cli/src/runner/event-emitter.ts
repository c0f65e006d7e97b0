import type { UpdateEvent } from "./types.js";

/**
 * Type-safe event emitter for update events
 */
export class UpdateEventEmitter {
  private listeners: Array<(event: UpdateEvent) => void> = [];

  /**
   * Subscribe to events
   * @returns Unsubscribe function
   */
  on(callback: (event: UpdateEvent) => void): () => void {
    this.listeners.push(callback);
    return () => {
      const index = this.listeners.indexOf(callback);
      if (index > -1) {
        this.listeners.splice(index, 1);
      }
    };
  }

  emit(event: UpdateEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}
