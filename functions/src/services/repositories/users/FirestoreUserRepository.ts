import type { UserProfileUpdate, UserRecord, UserRepository } from './UserRepository';
import { compact, readNumber, readString, readTimestamp } from '../common/fields';

const FIRESTORE_DELETE_BATCH_SIZE = 450;

const OWNED_COLLECTIONS = ['conversations', 'reports', 'templeBookings'] as const;

export function mapUserData(id: string, data: FirebaseFirestore.DocumentData): UserRecord {
  return {
    id,
    email: readString(data, 'email'),
    firstName: readString(data, 'firstName'),
    lastName: readString(data, 'lastName'),
    fullName: readString(data, 'fullName'),
    birthDate: readString(data, 'birthDate'),
    birthTime: readString(data, 'birthTime'),
    birthPlace: readString(data, 'birthPlace'),
    birthLatitude: readNumber(data, 'birthLatitude'),
    birthLongitude: readNumber(data, 'birthLongitude'),
    timezone: readString(data, 'timezone'),
    sunSign: readString(data, 'sunSign'),
    moonSign: readString(data, 'moonSign'),
    risingSign: readString(data, 'risingSign'),
    subscriptionExpiresAt: readTimestamp(data, 'subscriptionExpiresAt'),
    createdAt: readTimestamp(data, 'createdAt'),
    updatedAt: readTimestamp(data, 'updatedAt'),
  };
}

export class FirestoreUserRepository implements UserRepository {
  constructor(private readonly db: FirebaseFirestore.Firestore) {}

  async getById(userId: string): Promise<UserRecord | null> {
    const userDoc = await this.db.collection('users').doc(userId).get();

    if (!userDoc.exists) {
      return null;
    }

    return mapUserData(userDoc.id, userDoc.data() ?? {});
  }

  async upsertById(
    userId: string,
    updates: UserProfileUpdate,
    options: { now: Date },
  ): Promise<UserRecord> {
    const userRef = this.db.collection('users').doc(userId);
    const userDoc = await userRef.get();
    const payload = compact({ ...updates, updatedAt: options.now });

    if (!userDoc.exists) {
      payload.createdAt = options.now;
    }

    await userRef.set(payload, { merge: true });
    const updatedDoc = await userRef.get();

    return mapUserData(userId, updatedDoc.data() ?? {});
  }

  async deleteAccountData(userId: string): Promise<number> {
    const userRef = this.db.collection('users').doc(userId);

    const [ownedSnapshots, subcollections] = await Promise.all([
      Promise.all(
        OWNED_COLLECTIONS.map((collection) =>
          this.db.collection(collection).where('userId', '==', userId).get(),
        ),
      ),
      userRef.listCollections(),
    ]);

    const conversationDocs = ownedSnapshots[0].docs;
    const nestedSnapshots = await Promise.all([
      ...subcollections.map((subcollectionRef) => subcollectionRef.get()),
      ...conversationDocs.map((doc) => doc.ref.collection('messages').get()),
    ]);

    const uniqueDocRefs = new Map<string, FirebaseFirestore.DocumentReference>();
    nestedSnapshots.flatMap((snapshot) => snapshot.docs).forEach((doc) => {
      uniqueDocRefs.set(doc.ref.path, doc.ref);
    });
    ownedSnapshots.flatMap((snapshot) => snapshot.docs).forEach((doc) => {
      uniqueDocRefs.set(doc.ref.path, doc.ref);
    });
    uniqueDocRefs.set(userRef.path, userRef);

    const refs = Array.from(uniqueDocRefs.values());
    let deletedCount = 0;

    for (let start = 0; start < refs.length; start += FIRESTORE_DELETE_BATCH_SIZE) {
      const batch = this.db.batch();
      const chunk = refs.slice(start, start + FIRESTORE_DELETE_BATCH_SIZE);
      chunk.forEach((ref) => batch.delete(ref));
      await batch.commit();
      deletedCount += chunk.length;
    }

    return deletedCount;
  }
}
