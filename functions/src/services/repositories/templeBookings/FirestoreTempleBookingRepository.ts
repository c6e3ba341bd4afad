import { readNumber, readString, readTimestamp } from '../common/fields';
import {
  BookingStatus,
  CreateTempleBookingInput,
  Sankalp,
  TempleBookingRecord,
  TempleBookingRepository,
  isBookingStatus,
} from './TempleBookingRepository';

function readSankalp(data: FirebaseFirestore.DocumentData): Sankalp {
  const raw: unknown = data.sankalp;
  const source: FirebaseFirestore.DocumentData =
    raw && typeof raw === 'object' && !Array.isArray(raw) ? { ...raw } : {};

  return {
    name: readString(source, 'name'),
    gotra: readString(source, 'gotra'),
    nakshatra: readString(source, 'nakshatra'),
  };
}

function mapBookingData(id: string, data: FirebaseFirestore.DocumentData): TempleBookingRecord {
  return {
    id,
    userId: readString(data, 'userId') ?? '',
    poojaTypeId: readString(data, 'poojaTypeId') ?? '',
    scheduledDate: readString(data, 'scheduledDate') ?? '',
    scheduledTime: readString(data, 'scheduledTime') ?? '',
    timezone: readString(data, 'timezone') ?? 'UTC',
    sankalp: readSankalp(data),
    specialRequests: readString(data, 'specialRequests'),
    status: isBookingStatus(data.status) ? data.status : 'pending',
    amountDue: readNumber(data, 'amountDue') ?? 0,
    createdAt: readTimestamp(data, 'createdAt'),
    updatedAt: readTimestamp(data, 'updatedAt'),
  };
}

export class FirestoreTempleBookingRepository implements TempleBookingRepository {
  constructor(private readonly db: FirebaseFirestore.Firestore) {}

  async create(
    userId: string,
    input: CreateTempleBookingInput,
    now: Date,
  ): Promise<TempleBookingRecord> {
    const payload = {
      ...input,
      userId,
      status: 'pending',
      createdAt: now,
      updatedAt: now,
    };
    const docRef = await this.db.collection('templeBookings').add(payload);
    return mapBookingData(docRef.id, payload);
  }

  async getById(bookingId: string): Promise<TempleBookingRecord | null> {
    const doc = await this.db.collection('templeBookings').doc(bookingId).get();
    if (!doc.exists) {
      return null;
    }
    return mapBookingData(doc.id, doc.data() ?? {});
  }

  async listByUser(
    userId: string,
    options: { status?: BookingStatus } = {},
  ): Promise<TempleBookingRecord[]> {
    let query: FirebaseFirestore.Query = this.db
      .collection('templeBookings')
      .where('userId', '==', userId);

    if (options.status) {
      query = query.where('status', '==', options.status);
    }

    const snapshot = await query
      .orderBy('scheduledDate', 'desc')
      .orderBy('scheduledTime', 'desc')
      .get();

    return snapshot.docs.map((doc) => mapBookingData(doc.id, doc.data()));
  }

  async updateStatus(bookingId: string, status: BookingStatus, now: Date): Promise<void> {
    await this.db
      .collection('templeBookings')
      .doc(bookingId)
      .update({ status, updatedAt: now });
  }
}
