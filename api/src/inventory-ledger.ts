import type { AvailabilityCache } from './availability-cache.js';
import { InvalidTransitionError, NotFoundError } from './errors.js';
import type { Logger } from './logger.js';
import type { SeatCatalog } from './seat-catalog.js';
import type { Store, StoreReader, StoreSession } from './store.js';
import type { FlightInstance, Seat } from './types.js';

export type ClaimResult =
  | { status: 'claimed'; seat: Seat }
  | { status: 'already_held'; seat: Seat; holderId: string };

export type ReleaseResult = { status: 'released'; reservationId: string } | { status: 'not_held' };

type FlightInventory = {
  flight: FlightInstance;
  seats: Seat[];
  held: Set<string>;
};

/**
 * Which seats of a flight are held. Holding is derived from live reservations at
 * read time; claims and releases happen inside the caller's store transaction.
 */
export class InventoryLedger {
  private readonly log: Logger;

  constructor(
    private readonly store: Store,
    private readonly catalog: SeatCatalog,
    private readonly cache: AvailabilityCache,
    logger: Logger
  ) {
    this.log = logger.child({ component: 'inventory-ledger' });
  }

  private async inventory(flightId: string, reader: StoreReader): Promise<FlightInventory> {
    const flight = await reader.findFlight(flightId);
    if (!flight) {
      throw new NotFoundError('Flight', flightId);
    }
    const seats = await this.catalog.seatsFor(flight.aircraftId, reader);
    const held = await reader.heldSeatIds(flightId);
    return { flight, seats, held };
  }

  async availableSeats(flightId: string, reader: StoreReader = this.store): Promise<Seat[]> {
    const { seats, held } = await this.inventory(flightId, reader);
    return seats.filter((seat) => !held.has(seat.id));
  }

  async heldSeats(flightId: string, reader: StoreReader = this.store): Promise<Seat[]> {
    const { seats, held } = await this.inventory(flightId, reader);
    return seats.filter((seat) => held.has(seat.id));
  }

  /** Cached count for search listings; recomputed on a miss. */
  async countAvailable(flightId: string): Promise<number> {
    const cached = await this.cache.get(flightId);
    if (cached !== null) {
      return cached;
    }
    return this.refreshCount(flightId);
  }

  /**
   * Recomputes the count and caches it unless a claim or release committed
   * while it was being computed.
   */
  async refreshCount(flightId: string): Promise<number> {
    const generation = await this.cache.generation(flightId);
    const count = (await this.availableSeats(flightId)).length;
    if (!(await this.cache.set(flightId, count, generation))) {
      this.log.debug({ flightId, generation }, 'availability changed while counting, count not cached');
    }
    return count;
  }

  async tryClaim(session: StoreSession, flightId: string, seatId: string, actor: string | null = null): Promise<ClaimResult> {
    const flight = await session.findFlight(flightId);
    if (!flight) {
      throw new NotFoundError('Flight', flightId);
    }
    const seat = await this.catalog.seatOf(flight.aircraftId, seatId, session);

    await session.lockSeatPair(flightId, seatId);
    const holder = await session.findLiveHolder(flightId, seatId);
    if (holder) {
      this.log.debug({ flightId, seat: seat.code, holder: holder.bookingReference }, 'seat already held');
      return { status: 'already_held', seat, holderId: holder.id };
    }

    await session.recordSeatEvent({ seatId, flightId, eventType: 'CLAIMED', actor, metadata: { seatCode: seat.code } });
    session.afterCommit(() => this.cache.invalidate(flightId));
    return { status: 'claimed', seat };
  }

  /** Idempotent: a seat with no live holder is left alone. */
  async release(
    session: StoreSession,
    flightId: string,
    seatId: string,
    actor: string | null = null,
    reason?: string
  ): Promise<ReleaseResult> {
    await session.lockSeatPair(flightId, seatId);
    const holder = await session.findLiveHolder(flightId, seatId);
    if (!holder) {
      return { status: 'not_held' };
    }
    if (holder.status === 'completed') {
      throw new InvalidTransitionError(holder.status, 'cancelled', 'the flight has been completed');
    }

    await session.updateReservation(holder.id, { status: 'cancelled' });
    await session.recordSeatEvent({
      seatId,
      flightId,
      eventType: 'RELEASED',
      actor,
      metadata: { bookingReference: holder.bookingReference, ...(reason ? { reason } : {}) }
    });
    session.afterCommit(() => this.cache.invalidate(flightId));
    return { status: 'released', reservationId: holder.id };
  }
}
