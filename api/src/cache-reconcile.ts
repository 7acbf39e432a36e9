import type { InventoryLedger } from './inventory-ledger.js';
import type { Logger } from './logger.js';
import type { StoreReader } from './store.js';

/** Rebuilds the cached available-seat count of every scheduled flight. */
export async function reconcileAvailability(store: StoreReader, ledger: InventoryLedger): Promise<number> {
  const flights = await store.listFlightsByStatus('scheduled');
  for (const flight of flights) {
    await ledger.refreshCount(flight.id);
  }
  return flights.length;
}

export function startReconciler(store: StoreReader, ledger: InventoryLedger, intervalMs: number, log: Logger) {
  let timer: NodeJS.Timeout | undefined;
  let stopped = false;
  const run = async () => {
    try {
      const flights = await reconcileAvailability(store, ledger);
      log.debug({ flights }, 'availability cache reconciled');
    } catch (err) {
      log.error({ err }, 'Reconcile error');
    } finally {
      if (!stopped) {
        timer = setTimeout(() => void run(), intervalMs);
      }
    }
  };
  void run();
  return () => {
    stopped = true;
    clearTimeout(timer);
  };
}
