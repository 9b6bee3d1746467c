/**
 * Generic listener management for state change callbacks
 */

export type Listener<TArgs extends unknown[]> = (...args: TArgs) => void;

export class ListenerManager<TArgs extends unknown[] = []> {
  private listeners: Listener<TArgs>[] = [];

  /**
   * @param tag - Prefix for errors logged on behalf of a failing listener
   */
  constructor(private readonly tag = "[ListenerManager]") {}

  /**
   * Add a listener
   * @returns Function that removes it again
   */
  add(listener: Listener<TArgs>): () => void {
    this.listeners.push(listener);
    return () => this.remove(listener);
  }

  /**
   * Remove a listener
   */
  remove(listener: Listener<TArgs>): void {
    const index = this.listeners.indexOf(listener);
    if (index !== -1) {
      this.listeners.splice(index, 1);
    }
  }

  /**
   * Notify all listeners with error handling
   */
  notify(...args: TArgs): void {
    // Snapshot so listeners may unsubscribe while being notified
    for (const listener of this.listeners.slice()) {
      try {
        listener(...args);
      } catch (error) {
        console.error(`${this.tag} Error in listener callback:`, error);
      }
    }
  }

  /**
   * Clear all listeners
   */
  clear(): void {
    this.listeners = [];
  }

  /**
   * Get listener count
   */
  get count(): number {
    return this.listeners.length;
  }
}
