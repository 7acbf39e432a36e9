import { NotFoundError, ValidationError } from './errors.js';
import type { InventoryLedger } from './inventory-ledger.js';
import { priceFor, type Pricing } from './reservation-lifecycle.js';
import { compareSeatCodes } from './seat-catalog.js';
import type { Store } from './store.js';
import type { FlightInstance, ManifestEntry, Seat, SeatClass } from './types.js';

export type PriceByClass = Record<SeatClass, number>;

export type FlightSearchResult = {
  flight: FlightInstance;
  availableSeats: number;
  priceByClass: PriceByClass;
};

export type FlightSeats = {
  flight: FlightInstance;
  availableSeats: Seat[];
  priceByClass: PriceByClass;
};

const ISO_DAY = /^\d{4}-\d{2}-\d{2}$/;

/** True for a real calendar day; `Date` rolls 2026-02-30 over to March. */
function isCalendarDay(date: string): boolean {
  if (!ISO_DAY.test(date)) {
    return false;
  }
  const parsed = new Date(`${date}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === date;
}

export class FlightQueries {
  constructor(
    private readonly store: Store,
    private readonly ledger: InventoryLedger,
    private readonly pricing: Pricing
  ) {}

  priceByClass(flight: Pick<FlightInstance, 'basePrice'>): PriceByClass {
    return {
      business: priceFor(flight, 'business', this.pricing),
      economy: priceFor(flight, 'economy', this.pricing)
    };
  }

  /** Scheduled flights on the route departing on the given UTC day, earliest first. */
  async search(originCode: string, destinationCode: string, date: string): Promise<FlightSearchResult[]> {
    if (!isCalendarDay(date)) {
      throw new ValidationError(`date must be YYYY-MM-DD, got "${date}"`);
    }
    const flights = await this.store.searchFlights({
      originCode: originCode.toUpperCase(),
      destinationCode: destinationCode.toUpperCase(),
      date,
      status: 'scheduled'
    });
    return Promise.all(
      flights.map(async (flight) => ({
        flight,
        availableSeats: await this.ledger.countAvailable(flight.id),
        priceByClass: this.priceByClass(flight)
      }))
    );
  }

  async seats(flightId: string): Promise<FlightSeats> {
    const flight = await this.store.findFlight(flightId);
    if (!flight) {
      throw new NotFoundError('Flight', flightId);
    }
    return {
      flight,
      availableSeats: await this.ledger.availableSeats(flightId),
      priceByClass: this.priceByClass(flight)
    };
  }

  /** Every reservation on the flight, seated ones in seat order, unseated last. */
  async manifest(flightId: string): Promise<ManifestEntry[]> {
    const flight = await this.store.findFlight(flightId);
    if (!flight) {
      throw new NotFoundError('Flight', flightId);
    }
    const entries = await this.store.manifest(flightId);
    return entries.sort((a, b) => {
      if (a.seat === null || b.seat === null) {
        return a.seat === b.seat ? 0 : a.seat === null ? 1 : -1;
      }
      return compareSeatCodes(a.seat.code, b.seat.code);
    });
  }
}
