import { EphemerisService, getEphemerisService } from '../../astro/ephemeris';
import type {
  UserProfileUpdate,
  UserRecord,
  UserRepository,
} from '../../repositories/users/UserRepository';
import { parseBirthData } from '../../../utils/birthData';

export type SubscriptionStatus = {
  isActive: boolean;
  expiresAt: string | null;
};

type DerivedSigns = Pick<UserRecord, 'sunSign' | 'moonSign' | 'risingSign'>;

export class UserDomainService {
  constructor(
    private readonly userRepository: UserRepository,
    private readonly ephemeris: EphemerisService = getEphemerisService(),
  ) {}

  async getById(userId: string): Promise<UserRecord | null> {
    return this.userRepository.getById(userId);
  }

  async upsertById(userId: string, updates: UserProfileUpdate, now: Date): Promise<UserRecord> {
    return this.userRepository.upsertById(userId, updates, { now });
  }

  /**
   * Applies a profile patch and recomputes the tropical Sun, Moon and rising
   * signs from the merged birth details.
   */
  async updateProfile(userId: string, updates: UserProfileUpdate, now: Date): Promise<UserRecord> {
    const existing = await this.userRepository.getById(userId);
    const merged = { ...existing, ...updates };
    const signs = this.deriveSigns(merged);

    return this.userRepository.upsertById(userId, { ...updates, ...signs }, { now });
  }

  deriveSigns(profile: UserProfileUpdate): DerivedSigns {
    if (!profile.birthDate) {
      return { sunSign: null, moonSign: null, risingSign: null };
    }

    const birth = parseBirthData(
      {
        date: profile.birthDate,
        time: profile.birthTime ?? undefined,
        timezone: profile.timezone ?? undefined,
        latitude: profile.birthLatitude ?? undefined,
        longitude: profile.birthLongitude ?? undefined,
      },
      { requireCoords: false },
    );
    const chart = this.ephemeris.getPositions(birth.instant, {
      latitude: birth.latitude ?? undefined,
      longitude: birth.longitude ?? undefined,
      system: 'western',
    });
    const signOf = (id: string) => chart.bodies.find((body) => body.id === id)?.sign ?? null;

    return {
      sunSign: signOf('sun'),
      moonSign: signOf('moon'),
      risingSign: chart.ascendant?.sign ?? null,
    };
  }

  async getSubscriptionStatus(userId: string, now: Date): Promise<SubscriptionStatus> {
    const user = await this.userRepository.getById(userId);
    const expiresAt = user?.subscriptionExpiresAt ?? null;
    const expiresAtMs = expiresAt ? Date.parse(expiresAt) : Number.NaN;

    return {
      isActive: Number.isFinite(expiresAtMs) && expiresAtMs > now.getTime(),
      expiresAt,
    };
  }

  async deleteAccountData(userId: string): Promise<number> {
    return this.userRepository.deleteAccountData(userId);
  }
}
