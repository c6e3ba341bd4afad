export type BookingStatus = 'pending' | 'confirmed' | 'cancelled' | 'completed';

export const BOOKING_STATUSES: readonly BookingStatus[] = [
  'pending',
  'confirmed',
  'cancelled',
  'completed',
];

export type Sankalp = {
  name: string | null;
  gotra: string | null;
  nakshatra: string | null;
};

export type TempleBookingRecord = {
  id: string;
  userId: string;
  poojaTypeId: string;
  scheduledDate: string;
  scheduledTime: string;
  timezone: string;
  sankalp: Sankalp;
  specialRequests: string | null;
  status: BookingStatus;
  amountDue: number;
  createdAt: string | null;
  updatedAt: string | null;
};

export type CreateTempleBookingInput = Omit<
  TempleBookingRecord,
  'id' | 'userId' | 'status' | 'createdAt' | 'updatedAt'
>;

export interface TempleBookingRepository {
  create(userId: string, input: CreateTempleBookingInput, now: Date): Promise<TempleBookingRecord>;
  getById(bookingId: string): Promise<TempleBookingRecord | null>;
  /** Newest schedule first. */
  listByUser(userId: string, options?: { status?: BookingStatus }): Promise<TempleBookingRecord[]>;
  updateStatus(bookingId: string, status: BookingStatus, now: Date): Promise<void>;
}

export function isBookingStatus(value: unknown): value is BookingStatus {
  return typeof value === 'string' && BOOKING_STATUSES.some((status) => status === value);
}
