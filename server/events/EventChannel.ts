/**
 * EventChannel - In-process publish/subscribe for acquisition events
 *
 * Subscribers are keyed by id. A throwing subscriber is logged and does
 * not stop delivery to the others.
 */

type SubscriberCallback<T> = (event: T) => void;

export interface EventChannel<T> {
  publish(event: T): void;
  /** Returns an unsubscribe function */
  subscribe(id: string, callback: SubscriberCallback<T>): () => void;
  unsubscribe(id: string): void;
  getSubscriberCount(): number;
}

export function createEventChannel<T>(name = 'Events'): EventChannel<T> {
  const subscribers = new Map<string, SubscriberCallback<T>>();

  return {
    publish(event: T): void {
      for (const [id, callback] of subscribers) {
        try {
          callback(event);
        } catch (err) {
          console.error(`[${name}] Subscriber ${id} failed:`, err);
        }
      }
    },

    subscribe(id: string, callback: SubscriberCallback<T>): () => void {
      subscribers.set(id, callback);
      return () => {
        if (subscribers.get(id) === callback) {
          subscribers.delete(id);
        }
      };
    },

    unsubscribe(id: string): void {
      subscribers.delete(id);
    },

    getSubscriberCount(): number {
      return subscribers.size;
    },
  };
}
