export type SeatClass = 'business' | 'economy';

export type FlightStatus = 'scheduled' | 'boarding' | 'departed' | 'arrived' | 'cancelled' | 'delayed';

export type ReservationStatus = 'confirmed' | 'cancelled' | 'checked_in' | 'completed';

export type PaymentStatus = 'pending' | 'paid' | 'refunded';

export const SEAT_CLASSES: readonly SeatClass[] = ['business', 'economy'];

/** Statuses that occupy a seat. */
export const LIVE_STATUSES: readonly ReservationStatus[] = ['confirmed', 'checked_in', 'completed'];

export function isLive(status: ReservationStatus): boolean {
  return LIVE_STATUSES.includes(status);
}

export type Aircraft = {
  id: string;
  model: string;
  registrationNumber: string;
  totalSeats: number;
  businessSeats: number;
  economySeats: number;
};

export type Seat = {
  id: string;
  aircraftId: string;
  code: string;
  seatClass: SeatClass;
};

export type FlightInstance = {
  id: string;
  flightNumber: string;
  aircraftId: string;
  originCode: string;
  destinationCode: string;
  departureTime: Date;
  arrivalTime: Date;
  basePrice: number;
  status: FlightStatus;
};

export type Passenger = {
  id: string;
  firstName: string;
  lastName: string;
  email: string;
  phone: string | null;
  dateOfBirth: string | null;
  passportNumber: string | null;
  nationality: string | null;
};

export type NewPassenger = Omit<Passenger, 'id'>;

export type Reservation = {
  id: string;
  bookingReference: string;
  passengerId: string;
  flightId: string;
  seatId: string | null;
  ticketPrice: number;
  status: ReservationStatus;
  paymentStatus: PaymentStatus;
  createdAt: Date;
};

export type NewReservation = Omit<Reservation, 'id' | 'createdAt'>;

export type ReservationPatch = {
  status?: ReservationStatus;
  paymentStatus?: PaymentStatus;
};

export type ManifestEntry = {
  bookingReference: string;
  passenger: Pick<Passenger, 'id' | 'firstName' | 'lastName' | 'email' | 'passportNumber'>;
  seat: Pick<Seat, 'id' | 'code' | 'seatClass'> | null;
  status: ReservationStatus;
  paymentStatus: PaymentStatus;
};

export type SeatEventType = 'CLAIMED' | 'RELEASED';

export type SeatEvent = {
  seatId: string;
  flightId: string;
  eventType: SeatEventType;
  actor: string | null;
  metadata: Record<string, unknown>;
};

export type FlightSearchCriteria = {
  originCode: string;
  destinationCode: string;
  /** UTC calendar day, YYYY-MM-DD. */
  date: string;
  status: FlightStatus;
};

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date()
};
