import { DiscoverSnapshotCache } from '../discoverCache';
import type { DiscoverSnapshot } from '../../models';

const snapshot = (cacheHints?: DiscoverSnapshot['cacheHints']): DiscoverSnapshot => ({
  date: '2024-03-01',
  sign: 'leo',
  personalized: false,
  now: { theme: 'Steady progress', actions: [] },
  lens: {
    energyState: { id: 'quiet', label: 'Quiet', description: 'Inward', icon: 'moon.stars' },
    domainWeights: { self: 0.25, love: 0.25, work: 0.25, mind: 0.25 },
    moonPhase: 0.5,
    activations: [],
  },
  lucky: { color: 'Gold', number: 1, element: 'Fire' },
  keywords: ['focus'],
  cacheHints,
});

describe('DiscoverSnapshotCache', () => {
  let now: Date;
  const clock = () => now;

  beforeEach(() => {
    now = new Date('2024-03-01T10:00:00.000Z');
  });

  it('is empty until set', () => {
    expect(new DiscoverSnapshotCache(clock).get()).toBeNull();
  });

  it('expires at nextRefresh', () => {
    const cache = new DiscoverSnapshotCache(clock);
    const value = snapshot({ ttlSeconds: 60, nextRefresh: '2024-03-01T11:00:00.000Z' });
    cache.set(value);

    now = new Date('2024-03-01T10:59:59.999Z');
    expect(cache.get()).toBe(value);

    now = new Date('2024-03-01T11:00:00.000Z');
    expect(cache.get()).toBeNull();
    expect(cache.expiresAt()).toBeNull();
  });

  it('falls back to ttlSeconds when nextRefresh does not parse', () => {
    const cache = new DiscoverSnapshotCache(clock);
    cache.set(snapshot({ ttlSeconds: 120, nextRefresh: 'soon' }));

    expect(cache.expiresAt()).toBe(Date.parse('2024-03-01T10:02:00.000Z'));
  });

  it('defaults to one hour without hints', () => {
    const cache = new DiscoverSnapshotCache(clock);
    cache.set(snapshot());

    expect(cache.expiresAt()).toBe(Date.parse('2024-03-01T11:00:00.000Z'));
  });

  it('clear empties the slot', () => {
    const cache = new DiscoverSnapshotCache(clock);
    cache.set(snapshot());

    cache.clear();

    expect(cache.get()).toBeNull();
  });
});
