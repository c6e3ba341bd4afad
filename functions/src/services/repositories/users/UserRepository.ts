export type UserRecord = {
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
};

export type UserProfileUpdate = Partial<
  Omit<UserRecord, 'id' | 'createdAt' | 'updatedAt' | 'subscriptionExpiresAt'>
>;

export interface UserRepository {
  getById(userId: string): Promise<UserRecord | null>;
  upsertById(userId: string, updates: UserProfileUpdate, options: { now: Date }): Promise<UserRecord>;
  /**
   * Removes the user document, its subcollections and every conversation,
   * report and temple booking the user owns. Returns the number of deleted
   * documents.
   */
  deleteAccountData(userId: string): Promise<number>;
}
