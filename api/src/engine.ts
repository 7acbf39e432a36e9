import type { AvailabilityCache } from './availability-cache.js';
import { FlightQueries } from './flight-queries.js';
import { InventoryLedger } from './inventory-ledger.js';
import type { Logger } from './logger.js';
import { PassengerDirectory } from './passenger-directory.js';
import { ReferenceGenerator, type RandomIndex } from './reference-generator.js';
import { ReservationManager } from './reservation-lifecycle.js';
import { SeatCatalog } from './seat-catalog.js';
import type { Store } from './store.js';
import type { Clock } from './types.js';

export type EngineOptions = {
  store: Store;
  cache: AvailabilityCache;
  logger: Logger;
  businessSurcharge: number;
  referenceMaxAttempts?: number;
  randomIndex?: RandomIndex;
  clock?: Clock;
};

export type ReservationEngine = {
  catalog: SeatCatalog;
  ledger: InventoryLedger;
  references: ReferenceGenerator;
  reservations: ReservationManager;
  flights: FlightQueries;
  passengers: PassengerDirectory;
};

export function createEngine(options: EngineOptions): ReservationEngine {
  const { store, cache, logger } = options;
  const pricing = { businessSurcharge: options.businessSurcharge };
  const catalog = new SeatCatalog(store);
  const ledger = new InventoryLedger(store, catalog, cache, logger);
  const references = new ReferenceGenerator({
    logger,
    maxAttempts: options.referenceMaxAttempts,
    randomIndex: options.randomIndex
  });
  const reservations = new ReservationManager({ store, ledger, references, pricing, logger, clock: options.clock });
  return {
    catalog,
    ledger,
    references,
    reservations,
    flights: new FlightQueries(store, ledger, pricing),
    passengers: new PassengerDirectory(store, logger)
  };
}
