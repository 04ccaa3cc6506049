/**
 * Realtime feed cache
 *
 * Bounds vehicle position fetches to one per mode per one-minute bucket.
 * Entries are keyed by (mode, floor(now / 60s)) and hold the in-flight or
 * settled fetch promise, so concurrent callers for the same key share a single
 * request while different modes never wait on each other.
 *
 * A rejected fetch is removed from the map before waiters observe it; the next
 * caller in the same bucket starts a fresh fetch.
 */

import type { GtfsModeKey } from '../types/trip.js';
import type { RealtimeFeed } from '../types/realtime.js';
import type { RealtimeFeedSource } from './trip-planner-client.js';
import type { Logger } from '../utils/logger.js';
import { realtimeFeedFetchesTotal } from '../utils/metrics.js';

export const BUCKET_MS = 60_000;

interface CacheEntry {
  mode: GtfsModeKey;
  bucket: number;
  feed: Promise<RealtimeFeed>;
}

interface RealtimeFeedCacheDependencies {
  source: RealtimeFeedSource;
  logger: Logger;
  /** Milliseconds since epoch; injectable for tests */
  clock?: () => number;
}

export class RealtimeFeedCache {
  private source: RealtimeFeedSource;
  private logger: Logger;
  private clock: () => number;
  private entries = new Map<string, CacheEntry>();

  constructor(deps: RealtimeFeedCacheDependencies) {
    if (!deps.source) {
      throw new Error('source is required');
    }
    if (!deps.logger) {
      throw new Error('logger is required');
    }
    this.source = deps.source;
    this.logger = deps.logger;
    this.clock = deps.clock ?? Date.now;
  }

  /**
   * Feed for the mode in the current time bucket, fetching it at most once per bucket.
   *
   * The returned promise is shared: a caller that stops waiting on it does not
   * cancel the fetch for anyone else.
   */
  get(mode: GtfsModeKey): Promise<RealtimeFeed> {
    const bucket = Math.floor(this.clock() / BUCKET_MS);
    const key = `${mode}:${bucket}`;

    const existing = this.entries.get(key);
    if (existing) {
      return existing.feed;
    }

    this.evictBefore(bucket - 1);

    const entry: CacheEntry = { mode, bucket, feed: this.fetch(mode, bucket) };
    this.entries.set(key, entry);

    // Failures are not cached; the entry is gone before waiters see the rejection
    entry.feed.catch(() => {
      if (this.entries.get(key) === entry) {
        this.entries.delete(key);
      }
    });

    return entry.feed;
  }

  /**
   * Number of cached or in-flight entries
   */
  get size(): number {
    return this.entries.size;
  }

  private async fetch(mode: GtfsModeKey, bucket: number): Promise<RealtimeFeed> {
    this.logger.debug('Fetching realtime feed', { mode, bucket });

    try {
      const feed = await this.source.fetchRealtimeFeed(mode);
      realtimeFeedFetchesTotal.inc({ mode, outcome: 'success' });
      this.logger.debug('Realtime feed fetched', { mode, bucket, entities: feed.entities.length });
      return feed;
    } catch (error) {
      realtimeFeedFetchesTotal.inc({ mode, outcome: 'error' });
      this.logger.warn('Realtime feed fetch failed', {
        mode,
        bucket,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  private evictBefore(oldestBucket: number): void {
    for (const [key, entry] of this.entries) {
      if (entry.bucket < oldestBucket) {
        this.entries.delete(key);
      }
    }
  }
}
