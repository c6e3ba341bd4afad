import type {
  BookingStatus,
  CreateTempleBookingInput,
  TempleBookingRecord,
  TempleBookingRepository,
} from '../../repositories/templeBookings/TempleBookingRepository';

const FINAL_STATUSES: readonly BookingStatus[] = ['completed', 'cancelled'];

export type CancelBookingResult =
  | { outcome: 'not_found' }
  | { outcome: 'invalid_status'; status: BookingStatus }
  | { outcome: 'cancelled'; bookingId: string };

export class TempleBookingDomainService {
  constructor(private readonly bookingRepository: TempleBookingRepository) {}

  async createForUser(
    userId: string,
    input: CreateTempleBookingInput,
    now: Date,
  ): Promise<TempleBookingRecord> {
    return this.bookingRepository.create(userId, input, now);
  }

  async listForUser(userId: string, status?: BookingStatus): Promise<TempleBookingRecord[]> {
    return this.bookingRepository.listByUser(userId, status ? { status } : {});
  }

  async getForUser(userId: string, bookingId: string): Promise<TempleBookingRecord | null> {
    const booking = await this.bookingRepository.getById(bookingId);

    if (!booking || booking.userId !== userId) {
      return null;
    }

    return booking;
  }

  async cancelForUser(userId: string, bookingId: string, now: Date): Promise<CancelBookingResult> {
    const booking = await this.getForUser(userId, bookingId);

    if (!booking) {
      return { outcome: 'not_found' };
    }

    if (FINAL_STATUSES.includes(booking.status)) {
      return { outcome: 'invalid_status', status: booking.status };
    }

    await this.bookingRepository.updateStatus(bookingId, 'cancelled', now);
    return { outcome: 'cancelled', bookingId };
  }
}
