import { describe, it, expect, vi } from 'vitest';
import { NotFoundError, SeatUnavailableError, TransientStorageError, ValidationError } from '../errors.js';
import {
  BOOKING_REFERENCE_INDEX,
  LIVE_SEAT_INDEX,
  PASSPORT_NUMBER_INDEX,
  PgStore,
  translateStorageError
} from '../pg-store.js';
import { LIVE_STATUSES, type NewPassenger, type NewReservation } from '../types.js';
import { dbError, fakePool } from './helpers/fake-pg.js';
import { silentLogger } from './helpers/memory-store.js';

function setup() {
  const pool = fakePool();
  const client = pool.client;
  const store = new PgStore(pool, { logger: silentLogger, lockTimeoutMs: 2000, statementTimeoutMs: 5000 });
  return { client, pool, store };
}

const draft: NewReservation = {
  bookingReference: 'ABCDEFGH',
  passengerId: 'p1',
  flightId: 'F1',
  seatId: 'AC1-1B',
  ticketPrice: 300,
  status: 'confirmed',
  paymentStatus: 'paid'
};

describe('PgStore.transaction', () => {
  it('wraps the work in BEGIN and COMMIT with scoped timeouts, then runs commit tasks', async () => {
    const { client, store } = setup();
    let statementsBeforeTask = -1;
    const task = vi.fn(async () => {
      statementsBeforeTask = client.statements.length;
    });

    const exists = await store.transaction(async (session) => {
      session.afterCommit(task);
      return session.referenceExists('ABCDEFGH');
    });

    expect(exists).toBe(false);
    expect(client.texts()).toEqual([
      'BEGIN',
      "SELECT set_config('lock_timeout', $1, true), set_config('statement_timeout', $2, true)",
      'SELECT 1 FROM reservations WHERE booking_reference = $1',
      'COMMIT'
    ]);
    expect(client.statements[1].values).toEqual(['2000', '5000']);
    expect(task).toHaveBeenCalledTimes(1);
    expect(statementsBeforeTask).toBe(4);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('rolls back, releases the client and drops commit tasks on failure', async () => {
    const { client, store } = setup();
    const task = vi.fn(async () => undefined);

    await expect(
      store.transaction(async (session) => {
        session.afterCommit(task);
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(client.texts().at(-1)).toBe('ROLLBACK');
    expect(client.texts()).not.toContain('COMMIT');
    expect(task).not.toHaveBeenCalled();
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('surfaces a lock timeout as a transient error', async () => {
    const { client, store } = setup();
    const timeout = dbError('55P03');
    client.failOn('pg_advisory_xact_lock', timeout);

    const attempt = store.transaction((session) => session.lockSeatPair('F1', 'AC1-1B'));

    await expect(attempt).rejects.toBeInstanceOf(TransientStorageError);
    await expect(attempt).rejects.toHaveProperty('cause', timeout);
    expect(client.statements.find((s) => s.text.includes('pg_advisory_xact_lock'))?.values).toEqual(['F1', 'AC1-1B']);
  });

  it('keeps the original error and discards the connection when ROLLBACK fails', async () => {
    const { client, store } = setup();
    const timeout = dbError('55P03');
    const terminated = new Error('Connection terminated');
    client.failOn('pg_advisory_xact_lock', timeout);
    client.failOn('ROLLBACK', terminated);

    const attempt = store.transaction((session) => session.lockSeatPair('F1', 'AC1-1B'));

    await expect(attempt).rejects.toBeInstanceOf(TransientStorageError);
    await expect(attempt).rejects.toHaveProperty('cause', timeout);
    expect(client.texts().at(-1)).toBe('ROLLBACK');
    expect(client.release).toHaveBeenCalledTimes(1);
    expect(client.release).toHaveBeenCalledWith(terminated);
  });

  it('still commits when a commit task fails', async () => {
    const { client, store } = setup();

    const result = await store.transaction(async (session) => {
      session.afterCommit(async () => {
        throw new Error('cache down');
      });
      return 'done';
    });

    expect(result).toBe('done');
    expect(client.texts().at(-1)).toBe('COMMIT');
  });
});

describe('PgSession.insertReservation', () => {
  it('maps a live-seat conflict to SeatUnavailableError', async () => {
    const { client, store } = setup();
    client.failOn('INSERT INTO reservations', dbError('23505', LIVE_SEAT_INDEX));

    await expect(store.transaction((session) => session.insertReservation(draft))).rejects.toThrow(
      new SeatUnavailableError('F1', 'AC1-1B')
    );
  });

  it('maps a booking reference conflict to TransientStorageError', async () => {
    const { client, store } = setup();
    client.failOn('INSERT INTO reservations', dbError('23505', BOOKING_REFERENCE_INDEX));

    await expect(store.transaction((session) => session.insertReservation(draft))).rejects.toThrow(
      'Booking reference ABCDEFGH was taken concurrently'
    );
  });

  it('rethrows other constraint violations unchanged', async () => {
    const { client, store } = setup();
    const fkViolation = dbError('23503', 'reservations_passenger_id_fkey');
    client.failOn('INSERT INTO reservations', fkViolation);

    await expect(store.transaction((session) => session.insertReservation(draft))).rejects.toBe(fkViolation);
  });
});

describe('PgSession.insertPassengerIfAbsent', () => {
  const passengerDraft: NewPassenger = {
    firstName: 'Ada',
    lastName: 'Byron',
    email: 'ada@example.test',
    phone: null,
    dateOfBirth: null,
    passportNumber: 'X1234567',
    nationality: null
  };

  it('maps a passport number conflict to ValidationError', async () => {
    const { client, store } = setup();
    client.failOn('INSERT INTO passengers', dbError('23505', PASSPORT_NUMBER_INDEX));

    const attempt = store.transaction((session) => session.insertPassengerIfAbsent(passengerDraft));

    await expect(attempt).rejects.toBeInstanceOf(ValidationError);
    await expect(attempt).rejects.toThrow('passport number X1234567 is registered to another passenger');
  });

  it('rethrows other failures unchanged', async () => {
    const { client, store } = setup();
    const checkViolation = dbError('23514', 'passengers_email_check');
    client.failOn('INSERT INTO passengers', checkViolation);

    await expect(
      store.transaction((session) => session.insertPassengerIfAbsent(passengerDraft))
    ).rejects.toBe(checkViolation);
  });
});

describe('PgSession queries', () => {
  it('counts only live reservations as holding a seat', async () => {
    const { client, store } = setup();

    const held = await store.heldSeatIds('F1');

    expect(held.size).toBe(0);
    expect(client.statements[0].values).toEqual(['F1', LIVE_STATUSES]);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('adds row locks only when asked', async () => {
    const { client, store } = setup();

    await store.transaction(async (session) => {
      await session.findFlight('F1', { lock: true });
      await session.findReservation('ABCDEFGH', { lock: true });
      await session.findReservation('ABCDEFGH');
    });

    const [flight, lockedReservation, plainReservation] = client.texts().slice(2, 5);
    expect(flight.endsWith('FOR SHARE')).toBe(true);
    expect(lockedReservation.endsWith('FOR UPDATE')).toBe(true);
    expect(plainReservation.endsWith('booking_reference = $1')).toBe(true);
  });

  it('returns null for missing rows', async () => {
    const { store } = setup();

    expect(await store.findFlight('F404')).toBeNull();
    expect(await store.findReservation('ZZZZZZZZ')).toBeNull();
    expect(await store.findPassengerByEmail('nobody@example.test')).toBeNull();
  });

  it('throws NotFoundError when updating a missing reservation', async () => {
    const { store } = setup();

    await expect(
      store.transaction((session) => session.updateReservation('res-404', { status: 'cancelled' }))
    ).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe('translateStorageError', () => {
  it('wraps retryable SQLSTATEs', () => {
    for (const code of ['40001', '40P01', '55P03', '57014']) {
      expect(translateStorageError(dbError(code))).toBeInstanceOf(TransientStorageError);
    }
  });

  it('passes everything else through', () => {
    const plain = new Error('socket hang up');
    const unique = dbError('23505', LIVE_SEAT_INDEX);
    expect(translateStorageError(plain)).toBe(plain);
    expect(translateStorageError(unique)).toBe(unique);
  });
});
