/**
 * Unit tests for the realtime feed cache
 *
 * Test Coverage:
 * - One upstream fetch per mode per one-minute bucket, shared by concurrent callers
 * - Failures are surfaced to every waiter and never cached
 * - Distinct modes do not wait on each other
 */

import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { RealtimeFeedCache, BUCKET_MS } from '../../../src/services/realtime-feed-cache.js';
import { UpstreamError } from '../../../src/errors.js';
import type { RealtimeFeedSource } from '../../../src/services/trip-planner-client.js';
import type { GtfsModeKey } from '../../../src/types/trip.js';
import type { RealtimeFeed } from '../../../src/types/realtime.js';
import { createMockLogger } from '../../helpers/fixtures.js';

function feedFor(mode: GtfsModeKey, tripId = 'T1'): RealtimeFeed {
  return {
    mode,
    fetchedAt: new Date('2024-05-01T08:00:00Z'),
    entities: [{ id: `${mode}-1`, trip: { tripId }, vehicle: {} }],
  };
}

describe('RealtimeFeedCache', () => {
  let now: number;
  let fetchRealtimeFeed: Mock<RealtimeFeedSource['fetchRealtimeFeed']>;
  let cache: RealtimeFeedCache;

  beforeEach(() => {
    // 10 seconds into a bucket
    now = 28_000_000 * BUCKET_MS + 10_000;
    fetchRealtimeFeed = vi.fn<RealtimeFeedSource['fetchRealtimeFeed']>(async (mode) => feedFor(mode));
    cache = new RealtimeFeedCache({
      source: { fetchRealtimeFeed },
      logger: createMockLogger(),
      clock: () => now,
    });
  });

  it('should fetch once for concurrent callers of the same mode in the same bucket', async () => {
    const [first, second] = await Promise.all([cache.get('buses'), cache.get('buses')]);

    expect(fetchRealtimeFeed).toHaveBeenCalledTimes(1);
    expect(fetchRealtimeFeed).toHaveBeenCalledWith('buses');
    expect(first).toBe(second);
  });

  it('should reuse the feed for later calls within the same bucket', async () => {
    const first = await cache.get('buses');
    now += 45_000; // still inside the same minute

    const second = await cache.get('buses');

    expect(fetchRealtimeFeed).toHaveBeenCalledTimes(1);
    expect(second).toBe(first);
  });

  it('should fetch again once the bucket rolls over', async () => {
    const first = await cache.get('buses');
    now += BUCKET_MS;

    const second = await cache.get('buses');

    expect(fetchRealtimeFeed).toHaveBeenCalledTimes(2);
    expect(second).not.toBe(first);
  });

  it('should fetch each mode separately', async () => {
    const [buses, ferries] = await Promise.all([cache.get('buses'), cache.get('ferries')]);

    expect(fetchRealtimeFeed).toHaveBeenCalledTimes(2);
    expect(buses.mode).toBe('buses');
    expect(ferries.mode).toBe('ferries');
  });

  it('should not hold one mode behind a slow fetch for another', async () => {
    fetchRealtimeFeed.mockImplementation((mode) =>
      mode === 'sydneytrains' ? new Promise<RealtimeFeed>(() => {}) : Promise.resolve(feedFor(mode))
    );

    const pendingTrains = cache.get('sydneytrains');
    const ferries = await cache.get('ferries');

    expect(ferries.mode).toBe('ferries');
    expect(cache.size).toBe(2);
    expect(pendingTrains).toBeInstanceOf(Promise);
  });

  it('should surface a failure to every waiter and not cache it', async () => {
    const failure = new UpstreamError('Realtime feed (buses) returned HTTP 503', 503);
    fetchRealtimeFeed.mockRejectedValueOnce(failure);

    const results = await Promise.allSettled([cache.get('buses'), cache.get('buses')]);

    expect(results).toEqual([
      { status: 'rejected', reason: failure },
      { status: 'rejected', reason: failure },
    ]);
    expect(fetchRealtimeFeed).toHaveBeenCalledTimes(1);
    expect(cache.size).toBe(0);

    // Same bucket: the next caller retries
    const feed = await cache.get('buses');
    expect(feed.mode).toBe('buses');
    expect(fetchRealtimeFeed).toHaveBeenCalledTimes(2);
  });

  it('should not cache a source that throws synchronously', async () => {
    fetchRealtimeFeed.mockImplementationOnce(() => {
      throw new Error('socket closed');
    });

    await expect(cache.get('lightrail')).rejects.toThrow('socket closed');
    expect(cache.size).toBe(0);

    await expect(cache.get('lightrail')).resolves.toMatchObject({ mode: 'lightrail' });
  });

  it('should discard entries more than one bucket old when inserting', async () => {
    await cache.get('buses');
    now += BUCKET_MS;
    await cache.get('ferries');
    expect(cache.size).toBe(2);

    now += BUCKET_MS; // buses entry is now two buckets old
    await cache.get('lightrail');

    expect(cache.size).toBe(2);

    now += 5 * BUCKET_MS;
    await cache.get('buses');

    expect(cache.size).toBe(1);
  });
});
