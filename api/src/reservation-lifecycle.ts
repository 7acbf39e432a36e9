import {
  CancellationClosedError,
  FlightNotBookableError,
  InvalidTransitionError,
  NotFoundError,
  SeatUnavailableError,
  ValidationError
} from './errors.js';
import type { InventoryLedger } from './inventory-ledger.js';
import type { Logger } from './logger.js';
import type { ReferenceGenerator } from './reference-generator.js';
import type { Store, StoreSession } from './store.js';
import {
  systemClock,
  type Clock,
  type FlightInstance,
  type FlightStatus,
  type Reservation,
  type ReservationStatus,
  type Seat,
  type SeatClass
} from './types.js';

const TRANSITIONS: Record<ReservationStatus, readonly ReservationStatus[]> = {
  confirmed: ['checked_in', 'cancelled'],
  checked_in: ['completed', 'cancelled'],
  cancelled: [],
  completed: []
};

export function canTransition(from: ReservationStatus, to: ReservationStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

const CHECK_IN_CLOSED: readonly FlightStatus[] = ['departed', 'arrived', 'cancelled'];

export type Pricing = {
  businessSurcharge: number;
};

export function priceFor(flight: Pick<FlightInstance, 'basePrice'>, seatClass: SeatClass, pricing: Pricing): number {
  const price = seatClass === 'business' ? flight.basePrice + pricing.businessSurcharge : flight.basePrice;
  return Math.round(price * 100) / 100;
}

export type BookingRequest = {
  passengerId: string;
  flightId: string;
  seatId: string;
  price: number;
};

export type AutoAssignRequest = {
  passengerId: string;
  flightId: string;
  seatClass: SeatClass;
};

export type ReservationManagerOptions = {
  store: Store;
  ledger: InventoryLedger;
  references: ReferenceGenerator;
  pricing: Pricing;
  logger: Logger;
  clock?: Clock;
};

export class ReservationManager {
  private readonly store: Store;
  private readonly ledger: InventoryLedger;
  private readonly references: ReferenceGenerator;
  private readonly pricing: Pricing;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(options: ReservationManagerOptions) {
    this.store = options.store;
    this.ledger = options.ledger;
    this.references = options.references;
    this.pricing = options.pricing;
    this.clock = options.clock ?? systemClock;
    this.log = options.logger.child({ component: 'reservations' });
  }

  /**
   * Claims the seat, mints a reference and writes the reservation in one
   * transaction. A failure anywhere rolls the claim back with it.
   */
  async book(request: BookingRequest): Promise<Reservation> {
    if (!Number.isFinite(request.price) || request.price < 0) {
      throw new ValidationError(`price must be a non-negative number, got ${request.price}`);
    }
    const reservation = await this.store.transaction(async (session) => {
      const flight = await this.bookableFlight(session, request.flightId);
      const claim = await this.ledger.tryClaim(session, flight.id, request.seatId, request.passengerId);
      if (claim.status === 'already_held') {
        throw new SeatUnavailableError(flight.id, claim.seat.code);
      }
      return this.persist(session, request.passengerId, flight, claim.seat, request.price);
    });
    this.log.info(
      { reference: reservation.bookingReference, flightId: reservation.flightId, seatId: reservation.seatId },
      'reservation booked'
    );
    return reservation;
  }

  /** First free seat of the class in catalog order, priced from the flight's base fare. */
  async bookAnySeat(request: AutoAssignRequest): Promise<Reservation> {
    const reservation = await this.store.transaction(async (session) => {
      const flight = await this.bookableFlight(session, request.flightId);
      const candidates = (await this.ledger.availableSeats(flight.id, session)).filter(
        (seat) => seat.seatClass === request.seatClass
      );
      for (const candidate of candidates) {
        const claim = await this.ledger.tryClaim(session, flight.id, candidate.id, request.passengerId);
        if (claim.status === 'claimed') {
          const price = priceFor(flight, claim.seat.seatClass, this.pricing);
          return this.persist(session, request.passengerId, flight, claim.seat, price);
        }
      }
      throw new SeatUnavailableError(flight.id, `in ${request.seatClass} class`);
    });
    this.log.info(
      { reference: reservation.bookingReference, flightId: reservation.flightId, seatId: reservation.seatId },
      'reservation booked by seat class'
    );
    return reservation;
  }

  /**
   * Repeat cancels return the cancelled reservation unchanged. The departure
   * check reads the clock inside the transaction that applies the change.
   */
  async cancel(bookingReference: string): Promise<Reservation> {
    const { reservation, changed } = await this.store.transaction(async (session) => {
      const current = await this.locked(session, bookingReference);
      if (current.status === 'cancelled') {
        return { reservation: current, changed: false };
      }
      if (!canTransition(current.status, 'cancelled')) {
        throw new InvalidTransitionError(current.status, 'cancelled');
      }
      const flight = await this.flightOf(session, current);
      if (flight.departureTime.getTime() <= this.clock.now().getTime()) {
        throw new CancellationClosedError(bookingReference);
      }
      if (current.seatId !== null) {
        await this.ledger.release(session, current.flightId, current.seatId, current.passengerId, 'reservation cancelled');
      }
      const updated = await session.updateReservation(current.id, {
        status: 'cancelled',
        paymentStatus: current.paymentStatus === 'paid' ? 'refunded' : current.paymentStatus
      });
      return { reservation: updated, changed: true };
    });
    if (changed) {
      this.log.info({ reference: bookingReference, flightId: reservation.flightId }, 'reservation cancelled');
    }
    return reservation;
  }

  async checkIn(bookingReference: string): Promise<Reservation> {
    return this.store.transaction(async (session) => {
      const current = await this.locked(session, bookingReference);
      if (current.status === 'checked_in') {
        return current;
      }
      if (!canTransition(current.status, 'checked_in')) {
        throw new InvalidTransitionError(current.status, 'checked_in');
      }
      const flight = await this.flightOf(session, current);
      if (CHECK_IN_CLOSED.includes(flight.status)) {
        throw new InvalidTransitionError(current.status, 'checked_in', `flight is ${flight.status}`);
      }
      const updated = await session.updateReservation(current.id, { status: 'checked_in' });
      this.log.info({ reference: bookingReference, flightId: flight.id }, 'passenger checked in');
      return updated;
    });
  }

  async complete(bookingReference: string): Promise<Reservation> {
    return this.store.transaction(async (session) => {
      const current = await this.locked(session, bookingReference);
      if (current.status === 'completed') {
        return current;
      }
      if (!canTransition(current.status, 'completed')) {
        throw new InvalidTransitionError(current.status, 'completed');
      }
      const flight = await this.flightOf(session, current);
      if (flight.status !== 'arrived') {
        throw new InvalidTransitionError(current.status, 'completed', `flight is ${flight.status}`);
      }
      const updated = await session.updateReservation(current.id, { status: 'completed' });
      this.log.info({ reference: bookingReference, flightId: flight.id }, 'reservation completed');
      return updated;
    });
  }

  /** Completes every checked-in reservation on arrived flights. Returns how many changed. */
  async completeArrivedFlights(): Promise<number> {
    const flights = await this.store.listFlightsByStatus('arrived');
    let completed = 0;
    for (const flight of flights) {
      completed += await this.store.transaction(async (session) => {
        const due = await session.listReservationsByFlight(flight.id, { statuses: ['checked_in'], lock: true });
        for (const reservation of due) {
          await session.updateReservation(reservation.id, { status: 'completed' });
        }
        return due.length;
      });
    }
    if (completed > 0) {
      this.log.info({ completed }, 'completed reservations on arrived flights');
    }
    return completed;
  }

  async lookup(bookingReference: string): Promise<Reservation> {
    const reservation = await this.store.findReservation(bookingReference);
    if (!reservation) {
      throw new NotFoundError('Reservation', bookingReference);
    }
    return reservation;
  }

  listFor(passengerId: string): Promise<Reservation[]> {
    return this.store.listReservationsByPassenger(passengerId);
  }

  private async bookableFlight(session: StoreSession, flightId: string): Promise<FlightInstance> {
    const flight = await session.findFlight(flightId, { lock: true });
    if (!flight) {
      throw new NotFoundError('Flight', flightId);
    }
    if (flight.status !== 'scheduled') {
      throw new FlightNotBookableError(flightId, flight.status);
    }
    return flight;
  }

  private async persist(
    session: StoreSession,
    passengerId: string,
    flight: FlightInstance,
    seat: Seat,
    price: number
  ): Promise<Reservation> {
    const passenger = await session.findPassenger(passengerId);
    if (!passenger) {
      throw new NotFoundError('Passenger', passengerId);
    }
    const bookingReference = await this.references.newReference(session);
    return session.insertReservation({
      bookingReference,
      passengerId,
      flightId: flight.id,
      seatId: seat.id,
      ticketPrice: price,
      status: 'confirmed',
      paymentStatus: 'paid'
    });
  }

  private async locked(session: StoreSession, bookingReference: string): Promise<Reservation> {
    const reservation = await session.findReservation(bookingReference, { lock: true });
    if (!reservation) {
      throw new NotFoundError('Reservation', bookingReference);
    }
    return reservation;
  }

  private async flightOf(session: StoreSession, reservation: Reservation): Promise<FlightInstance> {
    const flight = await session.findFlight(reservation.flightId);
    if (!flight) {
      throw new NotFoundError('Flight', reservation.flightId);
    }
    return flight;
  }
}
