import { DatabaseError, type QueryResult, type QueryResultRow } from 'pg';
import { NotFoundError, SeatUnavailableError, TransientStorageError, ValidationError } from './errors.js';
import type { Logger } from './logger.js';
import { runCommitTasks, type LockOption, type Store, type StoreSession } from './store.js';
import {
  LIVE_STATUSES,
  type Aircraft,
  type FlightInstance,
  type FlightSearchCriteria,
  type FlightStatus,
  type ManifestEntry,
  type NewPassenger,
  type NewReservation,
  type Passenger,
  type PaymentStatus,
  type Reservation,
  type ReservationPatch,
  type ReservationStatus,
  type Seat,
  type SeatClass,
  type SeatEvent
} from './types.js';

/** The slice of a pg PoolClient the store uses. */
export type PgClient = {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<Pick<QueryResult<R>, 'rows'>>;
  /** Passing an error makes the pool discard the connection. */
  release(err?: Error): void;
};

export type PgPool = {
  connect(): Promise<PgClient>;
};

export type PgStoreOptions = {
  logger: Logger;
  lockTimeoutMs: number;
  statementTimeoutMs: number;
};

// Names from migrations/001_init.sql
export const LIVE_SEAT_INDEX = 'reservations_live_seat_key';
export const BOOKING_REFERENCE_INDEX = 'reservations_booking_reference_key';
export const PASSPORT_NUMBER_INDEX = 'passengers_passport_number_key';

const UNIQUE_VIOLATION = '23505';
// serialization_failure, deadlock_detected, lock_not_available, query_canceled
const TRANSIENT_CODES = new Set(['40001', '40P01', '55P03', '57014']);

type AircraftRow = {
  aircraft_id: string;
  model: string;
  registration_number: string;
  total_seats: number;
  business_seats: number;
  economy_seats: number;
};

type SeatRow = {
  seat_id: string;
  aircraft_id: string;
  seat_code: string;
  seat_class: SeatClass;
};

type FlightRow = {
  flight_id: string;
  flight_number: string;
  aircraft_id: string;
  origin_code: string;
  destination_code: string;
  departure_time: Date;
  arrival_time: Date;
  base_price: string;
  status: FlightStatus;
};

type ReservationRow = {
  reservation_id: string;
  booking_reference: string;
  passenger_id: string;
  flight_id: string;
  seat_id: string | null;
  ticket_price: string;
  status: ReservationStatus;
  payment_status: PaymentStatus;
  created_at: Date;
};

type PassengerRow = {
  passenger_id: string;
  first_name: string;
  last_name: string;
  email: string;
  phone: string | null;
  date_of_birth: string | null;
  passport_number: string | null;
  nationality: string | null;
};

type ManifestRow = {
  booking_reference: string;
  status: ReservationStatus;
  payment_status: PaymentStatus;
  passenger_id: string;
  first_name: string;
  last_name: string;
  email: string;
  passport_number: string | null;
  seat_id: string | null;
  seat_code: string | null;
  seat_class: SeatClass | null;
};

const FLIGHT_COLUMNS = `flight_id, flight_number, aircraft_id, origin_code, destination_code,
  departure_time, arrival_time, base_price, status`;
const RESERVATION_FIELDS = [
  'reservation_id',
  'booking_reference',
  'passenger_id',
  'flight_id',
  'seat_id',
  'ticket_price',
  'status',
  'payment_status',
  'created_at'
];
const reservationColumns = (alias?: string) =>
  RESERVATION_FIELDS.map((field) => (alias ? `${alias}.${field}` : field)).join(', ');
const RESERVATION_COLUMNS = reservationColumns();
const PASSENGER_COLUMNS = `passenger_id, first_name, last_name, email, phone,
  to_char(date_of_birth, 'YYYY-MM-DD') AS date_of_birth, passport_number, nationality`;

const toAircraft = (r: AircraftRow): Aircraft => ({
  id: r.aircraft_id,
  model: r.model,
  registrationNumber: r.registration_number,
  totalSeats: r.total_seats,
  businessSeats: r.business_seats,
  economySeats: r.economy_seats
});

const toSeat = (r: SeatRow): Seat => ({
  id: r.seat_id,
  aircraftId: r.aircraft_id,
  code: r.seat_code,
  seatClass: r.seat_class
});

const toFlight = (r: FlightRow): FlightInstance => ({
  id: r.flight_id,
  flightNumber: r.flight_number,
  aircraftId: r.aircraft_id,
  originCode: r.origin_code,
  destinationCode: r.destination_code,
  departureTime: r.departure_time,
  arrivalTime: r.arrival_time,
  basePrice: Number(r.base_price),
  status: r.status
});

const toReservation = (r: ReservationRow): Reservation => ({
  id: r.reservation_id,
  bookingReference: r.booking_reference,
  passengerId: r.passenger_id,
  flightId: r.flight_id,
  seatId: r.seat_id,
  ticketPrice: Number(r.ticket_price),
  status: r.status,
  paymentStatus: r.payment_status,
  createdAt: r.created_at
});

const toPassenger = (r: PassengerRow): Passenger => ({
  id: r.passenger_id,
  firstName: r.first_name,
  lastName: r.last_name,
  email: r.email,
  phone: r.phone,
  dateOfBirth: r.date_of_birth,
  passportNumber: r.passport_number,
  nationality: r.nationality
});

const toManifestEntry = (r: ManifestRow): ManifestEntry => ({
  bookingReference: r.booking_reference,
  passenger: {
    id: r.passenger_id,
    firstName: r.first_name,
    lastName: r.last_name,
    email: r.email,
    passportNumber: r.passport_number
  },
  seat:
    r.seat_id !== null && r.seat_code !== null && r.seat_class !== null
      ? { id: r.seat_id, code: r.seat_code, seatClass: r.seat_class }
      : null,
  status: r.status,
  paymentStatus: r.payment_status
});

/** Maps driver errors that are safe to retry onto TransientStorageError. */
export function translateStorageError(err: unknown): unknown {
  if (err instanceof DatabaseError && err.code !== undefined && TRANSIENT_CODES.has(err.code)) {
    return new TransientStorageError(`Storage transaction aborted (${err.code}): ${err.message}`, { cause: err });
  }
  return err;
}

const forUpdate = (opts?: LockOption) => (opts?.lock ? ' FOR UPDATE' : '');

export class PgSession implements StoreSession {
  private readonly commitTasks: Array<() => Promise<void>> = [];

  constructor(private readonly client: PgClient) {}

  async findAircraft(aircraftId: string) {
    const { rows } = await this.client.query<AircraftRow>(
      `SELECT aircraft_id, model, registration_number, total_seats, business_seats, economy_seats
       FROM aircraft WHERE aircraft_id = $1`,
      [aircraftId]
    );
    return rows.length > 0 ? toAircraft(rows[0]) : null;
  }

  async listSeats(aircraftId: string) {
    const { rows } = await this.client.query<SeatRow>(
      'SELECT seat_id, aircraft_id, seat_code, seat_class FROM seats WHERE aircraft_id = $1',
      [aircraftId]
    );
    return rows.map(toSeat);
  }

  async findFlight(flightId: string, opts?: LockOption) {
    const { rows } = await this.client.query<FlightRow>(
      `SELECT ${FLIGHT_COLUMNS} FROM flights WHERE flight_id = $1${opts?.lock ? ' FOR SHARE' : ''}`,
      [flightId]
    );
    return rows.length > 0 ? toFlight(rows[0]) : null;
  }

  async searchFlights(criteria: FlightSearchCriteria) {
    const { rows } = await this.client.query<FlightRow>(
      `SELECT ${FLIGHT_COLUMNS} FROM flights
       WHERE origin_code = $1 AND destination_code = $2
         AND (departure_time AT TIME ZONE 'UTC')::date = $3::date
         AND status = $4
       ORDER BY departure_time`,
      [criteria.originCode, criteria.destinationCode, criteria.date, criteria.status]
    );
    return rows.map(toFlight);
  }

  async listFlightsByStatus(status: FlightStatus) {
    const { rows } = await this.client.query<FlightRow>(
      `SELECT ${FLIGHT_COLUMNS} FROM flights WHERE status = $1 ORDER BY departure_time`,
      [status]
    );
    return rows.map(toFlight);
  }

  async heldSeatIds(flightId: string) {
    const { rows } = await this.client.query<{ seat_id: string }>(
      `SELECT seat_id FROM reservations
       WHERE flight_id = $1 AND seat_id IS NOT NULL AND status = ANY($2)`,
      [flightId, LIVE_STATUSES]
    );
    return new Set(rows.map((r) => r.seat_id));
  }

  async findLiveHolder(flightId: string, seatId: string) {
    const { rows } = await this.client.query<ReservationRow>(
      `SELECT ${RESERVATION_COLUMNS} FROM reservations
       WHERE flight_id = $1 AND seat_id = $2 AND status = ANY($3)
       LIMIT 1`,
      [flightId, seatId, LIVE_STATUSES]
    );
    return rows.length > 0 ? toReservation(rows[0]) : null;
  }

  async referenceExists(bookingReference: string) {
    const { rows } = await this.client.query('SELECT 1 FROM reservations WHERE booking_reference = $1', [
      bookingReference
    ]);
    return rows.length > 0;
  }

  async findReservation(bookingReference: string, opts?: LockOption) {
    const { rows } = await this.client.query<ReservationRow>(
      `SELECT ${RESERVATION_COLUMNS} FROM reservations WHERE booking_reference = $1${forUpdate(opts)}`,
      [bookingReference]
    );
    return rows.length > 0 ? toReservation(rows[0]) : null;
  }

  async listReservationsByPassenger(passengerId: string) {
    const { rows } = await this.client.query<ReservationRow>(
      `SELECT ${reservationColumns('r')}
       FROM reservations r
       JOIN flights f ON f.flight_id = r.flight_id
       WHERE r.passenger_id = $1
       ORDER BY f.departure_time DESC, r.created_at DESC`,
      [passengerId]
    );
    return rows.map(toReservation);
  }

  async listReservationsByFlight(flightId: string, opts?: LockOption & { statuses?: readonly ReservationStatus[] }) {
    const statuses = opts?.statuses ?? null;
    const { rows } = await this.client.query<ReservationRow>(
      `SELECT ${RESERVATION_COLUMNS} FROM reservations
       WHERE flight_id = $1 AND ($2::text[] IS NULL OR status = ANY($2))
       ORDER BY created_at${forUpdate(opts)}`,
      [flightId, statuses]
    );
    return rows.map(toReservation);
  }

  async manifest(flightId: string) {
    const { rows } = await this.client.query<ManifestRow>(
      `SELECT r.booking_reference, r.status, r.payment_status,
              p.passenger_id, p.first_name, p.last_name, p.email, p.passport_number,
              s.seat_id, s.seat_code, s.seat_class
       FROM reservations r
       JOIN passengers p ON p.passenger_id = r.passenger_id
       LEFT JOIN seats s ON s.seat_id = r.seat_id
       WHERE r.flight_id = $1
       ORDER BY r.created_at`,
      [flightId]
    );
    return rows.map(toManifestEntry);
  }

  async findPassenger(passengerId: string) {
    const { rows } = await this.client.query<PassengerRow>(
      `SELECT ${PASSENGER_COLUMNS} FROM passengers WHERE passenger_id = $1`,
      [passengerId]
    );
    return rows.length > 0 ? toPassenger(rows[0]) : null;
  }

  async findPassengerByEmail(email: string) {
    const { rows } = await this.client.query<PassengerRow>(
      `SELECT ${PASSENGER_COLUMNS} FROM passengers WHERE email = lower($1)`,
      [email]
    );
    return rows.length > 0 ? toPassenger(rows[0]) : null;
  }

  async lockSeatPair(flightId: string, seatId: string) {
    await this.client.query('SELECT pg_advisory_xact_lock(hashtext($1), hashtext($2))', [flightId, seatId]);
  }

  async insertReservation(draft: NewReservation) {
    try {
      const { rows } = await this.client.query<ReservationRow>(
        `INSERT INTO reservations
           (booking_reference, passenger_id, flight_id, seat_id, ticket_price, status, payment_status)
         VALUES ($1, $2, $3, $4, $5, $6, $7)
         RETURNING ${RESERVATION_COLUMNS}`,
        [
          draft.bookingReference,
          draft.passengerId,
          draft.flightId,
          draft.seatId,
          draft.ticketPrice,
          draft.status,
          draft.paymentStatus
        ]
      );
      return toReservation(rows[0]);
    } catch (err) {
      if (err instanceof DatabaseError && err.code === UNIQUE_VIOLATION) {
        if (err.constraint === LIVE_SEAT_INDEX) {
          throw new SeatUnavailableError(draft.flightId, draft.seatId ?? 'unknown');
        }
        if (err.constraint === BOOKING_REFERENCE_INDEX) {
          throw new TransientStorageError(`Booking reference ${draft.bookingReference} was taken concurrently`, {
            cause: err
          });
        }
      }
      throw err;
    }
  }

  async updateReservation(reservationId: string, patch: ReservationPatch) {
    const { rows } = await this.client.query<ReservationRow>(
      `UPDATE reservations
       SET status = COALESCE($2, status), payment_status = COALESCE($3, payment_status), updated_at = now()
       WHERE reservation_id = $1
       RETURNING ${RESERVATION_COLUMNS}`,
      [reservationId, patch.status ?? null, patch.paymentStatus ?? null]
    );
    if (rows.length === 0) {
      throw new NotFoundError('Reservation', reservationId);
    }
    return toReservation(rows[0]);
  }

  async insertPassengerIfAbsent(draft: NewPassenger) {
    try {
      return await this.upsertPassenger(draft);
    } catch (err) {
      if (err instanceof DatabaseError && err.code === UNIQUE_VIOLATION && err.constraint === PASSPORT_NUMBER_INDEX) {
        throw new ValidationError(`passport number ${draft.passportNumber} is registered to another passenger`);
      }
      throw err;
    }
  }

  private async upsertPassenger(draft: NewPassenger) {
    // The no-op update makes RETURNING yield the existing row on conflict.
    const { rows } = await this.client.query<PassengerRow>(
      `INSERT INTO passengers
         (first_name, last_name, email, phone, date_of_birth, passport_number, nationality)
       VALUES ($1, $2, lower($3), $4, $5, $6, $7)
       ON CONFLICT (email) DO UPDATE SET email = EXCLUDED.email
       RETURNING ${PASSENGER_COLUMNS}`,
      [
        draft.firstName,
        draft.lastName,
        draft.email,
        draft.phone,
        draft.dateOfBirth,
        draft.passportNumber,
        draft.nationality
      ]
    );
    return toPassenger(rows[0]);
  }

  async recordSeatEvent(event: SeatEvent) {
    await this.client.query(
      'INSERT INTO seat_events(seat_id, flight_id, event_type, actor, metadata) VALUES ($1,$2,$3,$4,$5)',
      [event.seatId, event.flightId, event.eventType, event.actor, event.metadata]
    );
  }

  afterCommit(task: () => Promise<void>) {
    this.commitTasks.push(task);
  }

  takeCommitTasks() {
    return this.commitTasks.splice(0, this.commitTasks.length);
  }
}

export class PgStore implements Store {
  constructor(
    private readonly pool: PgPool,
    private readonly options: PgStoreOptions
  ) {}

  async transaction<T>(work: (session: StoreSession) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    const session = new PgSession(client);
    const result = await this.runInTransaction(client, session, work);
    await runCommitTasks(session.takeCommitTasks(), this.options.logger);
    return result;
  }

  private async runInTransaction<T>(
    client: PgClient,
    session: PgSession,
    work: (session: StoreSession) => Promise<T>
  ): Promise<T> {
    let broken: Error | undefined;
    try {
      await client.query('BEGIN');
      await client.query("SELECT set_config('lock_timeout', $1, true), set_config('statement_timeout', $2, true)", [
        String(this.options.lockTimeoutMs),
        String(this.options.statementTimeoutMs)
      ]);
      const result = await work(session);
      await client.query('COMMIT');
      return result;
    } catch (err) {
      broken = await this.rollback(client);
      throw translateStorageError(err);
    } finally {
      client.release(broken);
    }
  }

  /** Returns the rollback failure, if any, so the connection is not reused. */
  private async rollback(client: PgClient): Promise<Error | undefined> {
    try {
      await client.query('ROLLBACK');
      return undefined;
    } catch (rollbackErr) {
      this.options.logger.warn({ err: rollbackErr }, 'rollback failed, discarding connection');
      return rollbackErr instanceof Error ? rollbackErr : new Error(String(rollbackErr));
    }
  }

  private async read<T>(fn: (session: PgSession) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      return await fn(new PgSession(client));
    } catch (err) {
      throw translateStorageError(err);
    } finally {
      client.release();
    }
  }

  findAircraft(aircraftId: string) {
    return this.read((s) => s.findAircraft(aircraftId));
  }

  listSeats(aircraftId: string) {
    return this.read((s) => s.listSeats(aircraftId));
  }

  findFlight(flightId: string) {
    return this.read((s) => s.findFlight(flightId));
  }

  searchFlights(criteria: FlightSearchCriteria) {
    return this.read((s) => s.searchFlights(criteria));
  }

  listFlightsByStatus(status: FlightStatus) {
    return this.read((s) => s.listFlightsByStatus(status));
  }

  heldSeatIds(flightId: string) {
    return this.read((s) => s.heldSeatIds(flightId));
  }

  findLiveHolder(flightId: string, seatId: string) {
    return this.read((s) => s.findLiveHolder(flightId, seatId));
  }

  referenceExists(bookingReference: string) {
    return this.read((s) => s.referenceExists(bookingReference));
  }

  findReservation(bookingReference: string) {
    return this.read((s) => s.findReservation(bookingReference));
  }

  listReservationsByPassenger(passengerId: string) {
    return this.read((s) => s.listReservationsByPassenger(passengerId));
  }

  listReservationsByFlight(flightId: string, opts?: { statuses?: readonly ReservationStatus[] }) {
    return this.read((s) => s.listReservationsByFlight(flightId, { statuses: opts?.statuses }));
  }

  manifest(flightId: string) {
    return this.read((s) => s.manifest(flightId));
  }

  findPassenger(passengerId: string) {
    return this.read((s) => s.findPassenger(passengerId));
  }

  findPassengerByEmail(email: string) {
    return this.read((s) => s.findPassengerByEmail(email));
  }
}
