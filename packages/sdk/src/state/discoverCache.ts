/**
 * Single-slot cache for the Discover snapshot. Entries expire at the
 * server's `cacheHints.nextRefresh`, falling back to `ttlSeconds` and then
 * to one hour.
 */

import type { DiscoverSnapshot } from '../models';

export const DEFAULT_SNAPSHOT_TTL_SECONDS = 3600;

type CacheEntry = {
  snapshot: DiscoverSnapshot;
  expiresAt: number;
};

export class DiscoverSnapshotCache {
  private entry: CacheEntry | null = null;

  constructor(private readonly now: () => Date = () => new Date()) {}

  set(snapshot: DiscoverSnapshot): void {
    this.entry = { snapshot, expiresAt: this.expiryFor(snapshot) };
  }

  get(): DiscoverSnapshot | null {
    if (!this.entry) {
      return null;
    }
    if (this.now().getTime() >= this.entry.expiresAt) {
      this.entry = null;
      return null;
    }
    return this.entry.snapshot;
  }

  clear(): void {
    this.entry = null;
  }

  /** Epoch millis at which the cached snapshot goes stale, or null when empty. */
  expiresAt(): number | null {
    return this.entry?.expiresAt ?? null;
  }

  private expiryFor(snapshot: DiscoverSnapshot): number {
    const hints = snapshot.cacheHints;
    const nextRefresh = hints?.nextRefresh ? Date.parse(hints.nextRefresh) : Number.NaN;
    if (Number.isFinite(nextRefresh)) {
      return nextRefresh;
    }

    const ttlSeconds =
      typeof hints?.ttlSeconds === 'number' && Number.isFinite(hints.ttlSeconds)
        ? hints.ttlSeconds
        : DEFAULT_SNAPSHOT_TTL_SECONDS;
    return this.now().getTime() + ttlSeconds * 1000;
  }
}
