/**
 * Notification Log
 *
 * Append-only ledger of simulated dispatches for the session.
 */

import type { NotificationEvent } from '../types/index.js';

export const DEFAULT_RECENT_LIMIT = 10;

/**
 * Frozen copy with its own Date, so no caller can reach stored state
 */
function snapshot(event: NotificationEvent): NotificationEvent {
  return Object.freeze({ ...event, timestamp: new Date(event.timestamp.getTime()) });
}

export class NotificationLog {
  private events: NotificationEvent[] = [];

  append(event: NotificationEvent): NotificationEvent {
    const stored = snapshot(event);
    this.events.push(stored);
    return snapshot(stored);
  }

  get size(): number {
    return this.events.length;
  }

  /**
   * Every event in dispatch order
   */
  all(): readonly NotificationEvent[] {
    return this.events.map(snapshot);
  }

  /**
   * The last `limit` events, newest first
   */
  recent(limit: number = DEFAULT_RECENT_LIMIT): NotificationEvent[] {
    if (limit <= 0) return [];
    return this.events.slice(-limit).reverse().map(snapshot);
  }
}
