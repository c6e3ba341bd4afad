/**
 * Discover Snapshot Model
 */

import { z } from 'zod';

export type EnergyState = 'flowing' | 'intense' | 'quiet' | 'volatile';
export type DiscoverDomain = 'self' | 'love' | 'work' | 'mind';

export interface DiscoverAction {
  id: string;
  text: string;
  type: 'do' | 'avoid';
}

export interface CacheHints {
  ttlSeconds?: number;
  nextRefresh?: string;
}

export interface DiscoverSnapshot {
  date: string;
  sign: string;
  personalized: boolean;
  now: {
    theme: string;
    actions: DiscoverAction[];
  };
  lens: {
    energyState: { id: EnergyState; label: string; description: string; icon: string };
    domainWeights: Record<DiscoverDomain, number>;
    moonPhase: number;
    activations: Array<{ planet: string; sign: string; speed: number; retrograde: boolean }>;
  };
  lucky: { color: string; number: number; element: string };
  keywords: string[];
  cacheHints?: CacheHints;
}

const domainWeight = z.number();

export const discoverSnapshotSchema: z.ZodType<DiscoverSnapshot> = z.object({
  date: z.string(),
  sign: z.string(),
  personalized: z.boolean(),
  now: z.object({
    theme: z.string(),
    actions: z.array(
      z.object({
        id: z.string(),
        text: z.string(),
        type: z.enum(['do', 'avoid']),
      }),
    ),
  }),
  lens: z.object({
    energyState: z.object({
      id: z.enum(['flowing', 'intense', 'quiet', 'volatile']),
      label: z.string(),
      description: z.string(),
      icon: z.string(),
    }),
    domainWeights: z.object({
      self: domainWeight,
      love: domainWeight,
      work: domainWeight,
      mind: domainWeight,
    }),
    moonPhase: z.number(),
    activations: z.array(
      z.object({
        planet: z.string(),
        sign: z.string(),
        speed: z.number(),
        retrograde: z.boolean(),
      }),
    ),
  }),
  lucky: z.object({
    color: z.string(),
    number: z.number(),
    element: z.string(),
  }),
  keywords: z.array(z.string()),
  cacheHints: z
    .object({
      ttlSeconds: z.number().optional(),
      nextRefresh: z.string().optional(),
    })
    .optional(),
});
