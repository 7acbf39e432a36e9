import { randomInt } from 'node:crypto';
import { ReferenceExhaustedError } from './errors.js';
import type { Logger } from './logger.js';
import type { StoreReader } from './store.js';

export const REFERENCE_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
export const REFERENCE_LENGTH = 8;
export const DEFAULT_MAX_ATTEMPTS = 20;

/** Returns an integer in [0, bound). */
export type RandomIndex = (bound: number) => number;

export type ReferenceGeneratorOptions = {
  logger: Logger;
  maxAttempts?: number;
  randomIndex?: RandomIndex;
};

export class ReferenceGenerator {
  private readonly log: Logger;
  private readonly maxAttempts: number;
  private readonly randomIndex: RandomIndex;

  constructor(options: ReferenceGeneratorOptions) {
    this.log = options.logger.child({ component: 'reference-generator' });
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.randomIndex = options.randomIndex ?? ((bound) => randomInt(bound));
  }

  candidate(): string {
    let reference = '';
    for (let i = 0; i < REFERENCE_LENGTH; i++) {
      reference += REFERENCE_ALPHABET[this.randomIndex(REFERENCE_ALPHABET.length)];
    }
    return reference;
  }

  /**
   * Draws candidates until one is absent from the store. The insert that follows
   * is still guarded by the unique index on booking_reference.
   */
  async newReference(reader: Pick<StoreReader, 'referenceExists'>): Promise<string> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const reference = this.candidate();
      if (!(await reader.referenceExists(reference))) {
        return reference;
      }
      this.log.warn({ attempt, reference }, 'booking reference collision');
    }
    this.log.error({ maxAttempts: this.maxAttempts }, 'booking reference generation exhausted its attempts');
    throw new ReferenceExhaustedError(this.maxAttempts);
  }
}
