/**
 * Ephemeris, chart, dasha and horoscope models
 */

import { z } from 'zod';

export type ZodiacSystem = 'western' | 'vedic';

export interface PlanetEntry {
  id: string;
  symbol: string;
  name: string;
  sign: string;
  degree: number;
  retrograde: boolean;
  house: number | null;
  significance: string;
}

export interface EphemerisResponse {
  planets: PlanetEntry[];
  timestamp: string;
  has_rising_sign: boolean;
}

export interface SignPosition {
  degree: number;
  sign: string;
}

/** Keyed by body name, e.g. `Sun`, `Moon`, `Ascendant`. */
export type NamedPositions = Record<string, SignPosition>;

export type AspectName = 'conjunction' | 'sextile' | 'square' | 'trine' | 'opposition';

export interface Aspect {
  planet1: string;
  planet2: string;
  aspect: AspectName;
  orb: number;
}

/**
 * Birth details as the API accepts them. `time` defaults to noon and
 * `timezone` to UTC on the server.
 */
export interface BirthDataInput {
  date: string;
  time?: string;
  timezone?: string;
  latitude?: number;
  longitude?: number;
}

export interface ChartResponse {
  chartId: string;
  charts: {
    western: { positions: NamedPositions };
    vedic: { positions: NamedPositions };
  };
  type: string;
  aspects: Aspect[];
}

export interface DashaPeriodSummary {
  lord: string;
  start: string;
  end: string;
  annotation?: string;
}

export interface DashaQuery {
  birthDate: string;
  targetDate: string;
  birthTime?: string;
  timezone?: string;
  latitude?: number;
  longitude?: number;
  includeBoundaries?: boolean;
  debug?: boolean;
}

export interface DashaResponse {
  mahadasha: DashaPeriodSummary;
  antardasha: DashaPeriodSummary;
  boundaries?: {
    mahadasha: DashaPeriodSummary;
    antardasha: DashaPeriodSummary[];
    breakpoints: string[];
  };
  debug?: Record<string, unknown>;
  disclaimer: string;
}

export interface DashaTransitionLevel {
  current_lord: string;
  days_remaining: number;
  ends_on: string;
  next_lord: string | null;
  years_remaining?: number;
  months_remaining?: number;
}

export interface CompleteDashaRequest {
  birthData: BirthDataInput;
  targetDate?: string;
  includeTransitions?: boolean;
  includeEducation?: boolean;
}

export interface CompleteDashaResponse {
  dasha: Record<string, unknown>;
  current_period: {
    mahadasha: DashaPeriodSummary;
    antardasha: DashaPeriodSummary | null;
    pratyantardasha: DashaPeriodSummary | null;
    narrative: string;
  };
  transitions?: {
    timing: {
      mahadasha?: DashaTransitionLevel;
      antardasha?: DashaTransitionLevel;
      pratyantardasha?: DashaTransitionLevel;
    };
  };
  education?: Record<string, string>;
  disclaimer: string;
}

export type HoroscopeType = 'daily' | 'weekly' | 'monthly';

export interface Horoscope {
  id: string;
  sign: string;
  date: string;
  type: HoroscopeType;
  content: string;
  luckyElements: {
    color: string;
    number: number;
    element: string;
  };
}

export interface LocationResult {
  name: string;
  displayName: string;
  latitude: number;
  longitude: number;
  state: string | null;
  country: string;
  timezone: string;
}

export const namedPositionsSchema: z.ZodType<NamedPositions> = z.record(
  z.object({
    degree: z.number(),
    sign: z.string(),
  }),
);

export const ephemerisResponseSchema: z.ZodType<EphemerisResponse> = z.object({
  planets: z.array(
    z.object({
      id: z.string(),
      symbol: z.string(),
      name: z.string(),
      sign: z.string(),
      degree: z.number(),
      retrograde: z.boolean(),
      house: z.number().nullable(),
      significance: z.string(),
    }),
  ),
  timestamp: z.string(),
  has_rising_sign: z.boolean(),
});
