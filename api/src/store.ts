import type { Logger } from './logger.js';
import type {
  Aircraft,
  FlightInstance,
  FlightSearchCriteria,
  FlightStatus,
  ManifestEntry,
  NewPassenger,
  NewReservation,
  Passenger,
  Reservation,
  ReservationPatch,
  ReservationStatus,
  Seat,
  SeatEvent
} from './types.js';

export type LockOption = { lock?: boolean };

/**
 * Read side of the storage-access layer. Every method returns typed records;
 * row shapes never leave the implementation.
 */
export interface StoreReader {
  findAircraft(aircraftId: string): Promise<Aircraft | null>;
  listSeats(aircraftId: string): Promise<Seat[]>;
  findFlight(flightId: string, opts?: LockOption): Promise<FlightInstance | null>;
  searchFlights(criteria: FlightSearchCriteria): Promise<FlightInstance[]>;
  listFlightsByStatus(status: FlightStatus): Promise<FlightInstance[]>;
  /** Seat ids referenced by a live reservation on the flight. */
  heldSeatIds(flightId: string): Promise<Set<string>>;
  findLiveHolder(flightId: string, seatId: string): Promise<Reservation | null>;
  referenceExists(bookingReference: string): Promise<boolean>;
  findReservation(bookingReference: string, opts?: LockOption): Promise<Reservation | null>;
  listReservationsByPassenger(passengerId: string): Promise<Reservation[]>;
  listReservationsByFlight(
    flightId: string,
    opts?: LockOption & { statuses?: readonly ReservationStatus[] }
  ): Promise<Reservation[]>;
  manifest(flightId: string): Promise<ManifestEntry[]>;
  findPassenger(passengerId: string): Promise<Passenger | null>;
  findPassengerByEmail(email: string): Promise<Passenger | null>;
}

/** A single storage transaction. Writes are only possible through one of these. */
export interface StoreSession extends StoreReader {
  /** Transaction-scoped lock on a (flight, seat) pair. Re-entrant within the session. */
  lockSeatPair(flightId: string, seatId: string): Promise<void>;
  /**
   * Throws SeatUnavailableError when another live reservation already holds the
   * (flight, seat) pair, TransientStorageError when the booking reference was taken
   * concurrently.
   */
  insertReservation(draft: NewReservation): Promise<Reservation>;
  updateReservation(reservationId: string, patch: ReservationPatch): Promise<Reservation>;
  /** Returns the existing passenger when the email is already registered. */
  insertPassengerIfAbsent(draft: NewPassenger): Promise<Passenger>;
  recordSeatEvent(event: SeatEvent): Promise<void>;
  /** Runs once the transaction has committed; dropped on rollback. */
  afterCommit(task: () => Promise<void>): void;
}

export interface Store extends StoreReader {
  transaction<T>(work: (session: StoreSession) => Promise<T>): Promise<T>;
}

export async function runCommitTasks(tasks: Array<() => Promise<void>>, log: Logger): Promise<void> {
  const outcomes = await Promise.allSettled(tasks.map((task) => task()));
  for (const outcome of outcomes) {
    if (outcome.status === 'rejected') {
      log.warn({ err: outcome.reason }, 'post-commit task failed');
    }
  }
}
