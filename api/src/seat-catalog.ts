import { NotFoundError, ValidationError } from './errors.js';
import type { StoreReader } from './store.js';
import type { Seat, SeatClass } from './types.js';

const CLASS_ORDER: Record<SeatClass, number> = { business: 0, economy: 1 };
const SEAT_CODE = /^(\d+)([A-Z]+)$/;

/** Row number numerically, then letter: 2A < 10A < 10B. */
export function compareSeatCodes(a: string, b: string): number {
  const left = SEAT_CODE.exec(a);
  const right = SEAT_CODE.exec(b);
  if (!left || !right) {
    return a.localeCompare(b);
  }
  const byRow = Number(left[1]) - Number(right[1]);
  return byRow !== 0 ? byRow : left[2].localeCompare(right[2]);
}

export function compareSeats(a: Seat, b: Seat): number {
  const byClass = CLASS_ORDER[a.seatClass] - CLASS_ORDER[b.seatClass];
  return byClass !== 0 ? byClass : compareSeatCodes(a.code, b.code);
}

export class SeatCatalog {
  constructor(private readonly store: StoreReader) {}

  /** Business first, then economy; natural seat-code order within each class. */
  async seatsFor(aircraftId: string, reader: StoreReader = this.store): Promise<Seat[]> {
    const aircraft = await reader.findAircraft(aircraftId);
    if (!aircraft) {
      throw new NotFoundError('Aircraft', aircraftId);
    }
    const seats = await reader.listSeats(aircraftId);
    return seats.sort(compareSeats);
  }

  async seatOf(aircraftId: string, seatId: string, reader: StoreReader = this.store): Promise<Seat> {
    const seat = (await this.seatsFor(aircraftId, reader)).find((s) => s.id === seatId);
    if (!seat) {
      throw new NotFoundError('Seat', `${seatId} on aircraft ${aircraftId}`);
    }
    return seat;
  }
}

export type SeatLayoutOptions = {
  aircraftId: string;
  totalSeats: number;
  businessSeats: number;
  letters?: string;
};

/**
 * Seat definitions for provisioning an aircraft: rows of lettered seats, the
 * first `businessSeats` in row order are business class.
 */
export function buildSeatLayout({ aircraftId, totalSeats, businessSeats, letters = 'ABCDEF' }: SeatLayoutOptions): Seat[] {
  if (!Number.isInteger(totalSeats) || totalSeats <= 0) {
    throw new ValidationError(`totalSeats must be a positive integer, got ${totalSeats}`);
  }
  if (!Number.isInteger(businessSeats) || businessSeats < 0 || businessSeats > totalSeats) {
    throw new ValidationError(`businessSeats must be between 0 and ${totalSeats}, got ${businessSeats}`);
  }
  if (!/^[A-Z]+$/.test(letters)) {
    throw new ValidationError(`letters must be uppercase A-Z, got "${letters}"`);
  }

  const seats: Seat[] = [];
  for (let index = 0; index < totalSeats; index++) {
    const row = Math.floor(index / letters.length) + 1;
    const code = `${row}${letters[index % letters.length]}`;
    seats.push({
      id: `${aircraftId}-${code}`,
      aircraftId,
      code,
      seatClass: index < businessSeats ? 'business' : 'economy'
    });
  }
  return seats;
}
