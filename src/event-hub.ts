/**
 * @fileoverview Minimal typed listener registry. Each event carries one payload.
 */

type ListenerSets<M> = { [K in keyof M]?: Set<(payload: M[K]) => void> };

export class EventHub<M> {
  private readonly listeners: ListenerSets<M> = {};

  /**
   * Registers a listener and returns a function that removes it.
   */
  on<K extends keyof M>(event: K, listener: (payload: M[K]) => void): () => void {
    const set = this.listeners[event] ?? new Set<(payload: M[K]) => void>();
    set.add(listener);
    this.listeners[event] = set;
    return () => {
      set.delete(listener);
    };
  }

  emit<K extends keyof M>(event: K, payload: M[K]): void {
    const set = this.listeners[event];
    if (set === undefined) {
      return;
    }
    for (const listener of Array.from(set)) {
      listener(payload);
    }
  }
}
