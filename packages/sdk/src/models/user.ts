/**
 * User Profile Model
 */

import { z } from 'zod';

export interface UserProfile {
  id: string;
  email: string | null;
  firstName: string | null;
  lastName: string | null;
  fullName: string | null;
  birthDate: string | null;
  birthTime: string | null;
  birthPlace: string | null;
  birthLatitude: number | null;
  birthLongitude: number | null;
  timezone: string | null;
  sunSign: string | null;
  moonSign: string | null;
  risingSign: string | null;
  subscriptionExpiresAt: string | null;
  createdAt: string | null;
  updatedAt: string | null;
}

export type UpdateProfileRequest = Partial<
  Pick<
    UserProfile,
    | 'fullName'
    | 'firstName'
    | 'lastName'
    | 'email'
    | 'birthDate'
    | 'birthTime'
    | 'birthPlace'
    | 'birthLatitude'
    | 'birthLongitude'
    | 'timezone'
  >
>;

export interface SubscriptionStatus {
  isActive: boolean;
  expiresAt: string | null;
}

export interface AppleSignInRequest {
  identityToken: string;
  userIdentifier: string;
  email?: string | null;
  firstName?: string | null;
  lastName?: string | null;
}

export interface AuthSession {
  jwtToken: string;
  user: UserProfile;
  expiresAt: string;
}

const nullableString = z.string().nullable();
const nullableNumber = z.number().nullable();

export const userProfileSchema: z.ZodType<UserProfile> = z.object({
  id: z.string(),
  email: nullableString,
  firstName: nullableString,
  lastName: nullableString,
  fullName: nullableString,
  birthDate: nullableString,
  birthTime: nullableString,
  birthPlace: nullableString,
  birthLatitude: nullableNumber,
  birthLongitude: nullableNumber,
  timezone: nullableString,
  sunSign: nullableString,
  moonSign: nullableString,
  risingSign: nullableString,
  subscriptionExpiresAt: nullableString,
  createdAt: nullableString,
  updatedAt: nullableString,
});

export const authSessionSchema: z.ZodType<AuthSession> = z.object({
  jwtToken: z.string().min(1),
  user: userProfileSchema,
  expiresAt: z.string(),
});
