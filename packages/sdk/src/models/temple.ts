/**
 * Temple Booking Models
 */

export type BookingStatus = 'pending' | 'confirmed' | 'cancelled' | 'completed';

export interface PoojaType {
  id: string;
  name: string;
  description: string;
  deity: string;
  durationMinutes: number;
  basePrice: number;
  iconName: string;
  benefits: string[];
  ingredients: string[];
}

export interface Sankalp {
  name: string | null;
  gotra: string | null;
  nakshatra: string | null;
}

export interface TempleBooking {
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
  pooja?: PoojaType | null;
}

export interface CreateBookingRequest {
  poojaTypeId: string;
  scheduledDate: string;
  scheduledTime: string;
  timezone?: string;
  sankalp?: {
    name?: string;
    gotra?: string;
    nakshatra?: string;
  };
  specialRequests?: string;
}

export interface CreateBookingResponse {
  bookingId: string;
  status: BookingStatus;
  scheduledDate: string;
  scheduledTime: string;
  amountDue: number;
  message: string;
}

export interface CancelBookingResponse {
  bookingId: string;
  status: 'cancelled';
  message: string;
}
