import type { ClockPort } from '../ports/clock.port';
import { DefaultClock } from './default-clock';

export interface DedupStoreOptions {
  /** Upper bound for both the admitted ids and the rendered mappings. */
  maxEntries: number;
  /** Entries older than this are pruned before each admission. */
  retentionMs: number;
  clock?: ClockPort;
}

export interface DedupStoreStats {
  admitted: number;
  rendered: number;
  evicted: number;
}

interface RenderedEntry {
  notificationId: number;
  recordedAt: number;
  /** Admitted ids released again when the render is forgotten. */
  eventIds: string[];
}

/**
 * Remembers which events were already surfaced so that frames redelivered after
 * a reconnect are dropped. Bounded: once full, the oldest entries go first, so a
 * redelivery older than the window is admitted again.
 */
export class DedupStore {
  private readonly admitted = new Map<string, number>();
  private readonly rendered = new Map<string, RenderedEntry>();
  private readonly maxEntries: number;
  private readonly retentionMs: number;
  private readonly clock: ClockPort;
  private evicted = 0;

  constructor(options: DedupStoreOptions) {
    if (!Number.isInteger(options.maxEntries) || options.maxEntries < 1) {
      throw new Error('maxEntries must be a positive integer');
    }
    if (options.retentionMs <= 0) {
      throw new Error('retentionMs must be positive');
    }
    this.maxEntries = options.maxEntries;
    this.retentionMs = options.retentionMs;
    this.clock = options.clock ?? new DefaultClock();
  }

  /**
   * Returns true and records the id the first time it is seen, false afterwards.
   */
  admit(eventId: string): boolean {
    const now = this.clock.now();
    this.pruneAdmitted(now);

    if (this.admitted.has(eventId)) {
      return false;
    }

    this.admitted.set(eventId, now);
    while (this.admitted.size > this.maxEntries) {
      const oldest = this.admitted.keys().next();
      if (oldest.done) {
        break;
      }
      this.admitted.delete(oldest.value);
      this.evicted++;
    }

    return true;
  }

  has(eventId: string): boolean {
    return this.admitted.has(eventId);
  }

  /**
   * Maps a notification key to the id showing it. `eventId`, when given, is
   * released by `forgetRendered` so the same content can be shown again once
   * its render is gone.
   */
  recordRendered(key: string, notificationId: number, eventId?: string): void {
    const now = this.clock.now();
    this.pruneRendered(now);

    const eventIds = this.rendered.get(key)?.eventIds ?? [];
    if (eventId !== undefined && !eventIds.includes(eventId)) {
      eventIds.push(eventId);
    }

    // Re-inserting moves the key to the young end of the map.
    this.rendered.delete(key);
    this.rendered.set(key, { notificationId, recordedAt: now, eventIds });

    while (this.rendered.size > this.maxEntries) {
      const oldest = this.rendered.keys().next();
      if (oldest.done) {
        break;
      }
      this.rendered.delete(oldest.value);
    }
  }

  lookupRendered(key: string): number | null {
    const entry = this.rendered.get(key);
    if (!entry) {
      return null;
    }
    if (this.clock.now() - entry.recordedAt > this.retentionMs) {
      this.rendered.delete(key);
      return null;
    }
    return entry.notificationId;
  }

  forgetRendered(key: string): boolean {
    const entry = this.rendered.get(key);
    if (!entry) {
      return false;
    }
    this.rendered.delete(key);
    for (const eventId of entry.eventIds) {
      this.admitted.delete(eventId);
    }
    return true;
  }

  get size(): number {
    return this.admitted.size;
  }

  getStats(): DedupStoreStats {
    return {
      admitted: this.admitted.size,
      rendered: this.rendered.size,
      evicted: this.evicted,
    };
  }

  private pruneAdmitted(now: number): void {
    // Insertion order is admission order, so the first young entry ends the scan.
    for (const [eventId, admittedAt] of this.admitted) {
      if (now - admittedAt <= this.retentionMs) {
        break;
      }
      this.admitted.delete(eventId);
      this.evicted++;
    }
  }

  private pruneRendered(now: number): void {
    for (const [key, entry] of this.rendered) {
      if (now - entry.recordedAt <= this.retentionMs) {
        break;
      }
      this.rendered.delete(key);
    }
  }
}
