import { createEngine, type ReservationEngine } from '../../engine.js';
import type { RandomIndex } from '../../reference-generator.js';
import { buildSeatLayout } from '../../seat-catalog.js';
import type { Clock, FlightInstance, Passenger } from '../../types.js';
import { MemoryAvailabilityCache, MemoryStore, silentLogger } from './memory-store.js';

export const NOW = new Date('2026-03-01T12:00:00.000Z');
const DAY_MS = 24 * 60 * 60 * 1000;

/** Departs 2026-03-08T12:00Z. */
export const F1: FlightInstance = {
  id: 'F1',
  flightNumber: 'SR100',
  aircraftId: 'AC1',
  originCode: 'JFK',
  destinationCode: 'LAX',
  departureTime: new Date(NOW.getTime() + 7 * DAY_MS),
  arrivalTime: new Date(NOW.getTime() + 7 * DAY_MS + 5 * 60 * 60 * 1000),
  basePrice: 300,
  status: 'scheduled'
};

export const SEAT_1A = 'AC1-1A';
export const SEAT_1B = 'AC1-1B';

export function passenger(id: string, overrides: Partial<Passenger> = {}): Passenger {
  return {
    id,
    firstName: `First-${id}`,
    lastName: `Last-${id}`,
    email: `${id}@example.test`,
    phone: null,
    dateOfBirth: null,
    passportNumber: null,
    nationality: null,
    ...overrides
  };
}

export type MutableClock = Clock & { set(at: Date): void };

export function mutableClock(start: Date = NOW): MutableClock {
  let current = start;
  return {
    now: () => current,
    set: (at) => {
      current = at;
    }
  };
}

export type TestEngineOptions = {
  clock?: Clock;
  randomIndex?: RandomIndex;
  referenceMaxAttempts?: number;
};

export type TestContext = {
  store: MemoryStore;
  cache: MemoryAvailabilityCache;
  engine: ReservationEngine;
};

/**
 * Aircraft AC1 with two seats (1A business, 1B economy), scheduled flight F1 on
 * it and passengers p1 to p3.
 */
export function twoSeatScenario(options: TestEngineOptions = {}): TestContext {
  const store = new MemoryStore(() => NOW);
  store.addAircraft(
    { id: 'AC1', model: 'Test Jet', registrationNumber: 'N-TEST1', totalSeats: 2, businessSeats: 1, economySeats: 1 },
    buildSeatLayout({ aircraftId: 'AC1', totalSeats: 2, businessSeats: 1 })
  );
  store.addFlight(F1);
  for (const id of ['p1', 'p2', 'p3']) {
    store.addPassenger(passenger(id));
  }
  const cache = new MemoryAvailabilityCache();
  const engine = createEngine({
    store,
    cache,
    logger: silentLogger,
    businessSurcharge: 200,
    clock: options.clock ?? mutableClock(),
    randomIndex: options.randomIndex,
    referenceMaxAttempts: options.referenceMaxAttempts
  });
  return { store, cache, engine };
}

export function addFlight(store: MemoryStore, overrides: Partial<FlightInstance> & Pick<FlightInstance, 'id'>): FlightInstance {
  const flight = { ...F1, ...overrides };
  store.addFlight(flight);
  return flight;
}

export const codes = (seats: Array<{ code: string }>) => seats.map((s) => s.code);
