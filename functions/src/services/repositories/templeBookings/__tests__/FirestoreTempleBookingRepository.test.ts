import { InMemoryFirestore } from '../../__tests__/inMemoryFirestore';
import { FirestoreTempleBookingRepository } from '../FirestoreTempleBookingRepository';
import type { CreateTempleBookingInput } from '../TempleBookingRepository';

function bookingInput(overrides: Partial<CreateTempleBookingInput> = {}): CreateTempleBookingInput {
  return {
    poojaTypeId: 'pooja_ganesh',
    scheduledDate: '2024-06-01',
    scheduledTime: '09:00',
    timezone: 'Asia/Kolkata',
    sankalp: { name: 'Test Devotee', gotra: null, nakshatra: 'Rohini' },
    specialRequests: null,
    amountDue: 1100,
    ...overrides,
  };
}

describe('FirestoreTempleBookingRepository', () => {
  it('creates pending bookings owned by the user', async () => {
    const harness = new InMemoryFirestore();
    const repository = new FirestoreTempleBookingRepository(harness.asFirestore());

    const booking = await repository.create('user-1', bookingInput(), new Date('2024-05-01T00:00:00Z'));

    expect(booking).toEqual({
      id: 'templeBookings-1',
      userId: 'user-1',
      ...bookingInput(),
      status: 'pending',
      createdAt: '2024-05-01T00:00:00.000Z',
      updatedAt: '2024-05-01T00:00:00.000Z',
    });
    await expect(repository.getById('templeBookings-1')).resolves.toEqual(booking);
  });

  it('lists bookings newest schedule first and filters by status', async () => {
    const harness = new InMemoryFirestore();
    const repository = new FirestoreTempleBookingRepository(harness.asFirestore());
    const now = new Date('2024-05-01T00:00:00Z');
    const early = await repository.create('user-1', bookingInput({ scheduledTime: '07:00' }), now);
    const late = await repository.create('user-1', bookingInput({ scheduledTime: '18:00' }), now);
    const next = await repository.create('user-1', bookingInput({ scheduledDate: '2024-07-01' }), now);
    await repository.create('user-2', bookingInput(), now);
    await repository.updateStatus(early.id, 'cancelled', new Date('2024-05-02T00:00:00Z'));

    const all = await repository.listByUser('user-1');
    expect(all.map((booking) => booking.id)).toEqual([next.id, late.id, early.id]);

    const cancelled = await repository.listByUser('user-1', { status: 'cancelled' });
    expect(cancelled).toHaveLength(1);
    expect(cancelled[0]).toMatchObject({
      id: early.id,
      status: 'cancelled',
      updatedAt: '2024-05-02T00:00:00.000Z',
    });
  });

  it('reads unknown stored statuses as pending', async () => {
    const harness = new InMemoryFirestore();
    harness.seed('templeBookings/legacy', { userId: 'user-1', status: 'archived' });
    const repository = new FirestoreTempleBookingRepository(harness.asFirestore());

    const booking = await repository.getById('legacy');

    expect(booking?.status).toBe('pending');
    expect(booking?.sankalp).toEqual({ name: null, gotra: null, nakshatra: null });
    expect(booking?.timezone).toBe('UTC');
  });
});
