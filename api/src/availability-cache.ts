import type { Redis } from 'ioredis';

/**
 * Per-flight available-seat counts for search results. Never the source of
 * truth: entries are dropped when a claim or release commits and can always be
 * rebuilt from the reservation store.
 *
 * Every invalidation bumps the flight's generation. A count computed from reads
 * taken under an older generation is discarded by `set`.
 */
export interface AvailabilityCache {
  get(flightId: string): Promise<number | null>;
  generation(flightId: string): Promise<number>;
  /** Stores the count only while the flight is still at `generation`. */
  set(flightId: string, count: number, generation: number): Promise<boolean>;
  invalidate(flightId: string): Promise<void>;
}

const cacheKey = (flightId: string) => `availability:${flightId}`;
const generationKey = (flightId: string) => `availability:gen:${flightId}`;

// KEYS[1] count, KEYS[2] generation; ARGV generation, count, ttl
const SET_IF_CURRENT = `
if (redis.call('GET', KEYS[2]) or '0') == ARGV[1] then
  redis.call('SET', KEYS[1], ARGV[2], 'EX', ARGV[3])
  return 1
end
return 0`;

export class RedisAvailabilityCache implements AvailabilityCache {
  constructor(
    private readonly redis: Redis,
    private readonly ttlSeconds: number
  ) {}

  async get(flightId: string) {
    const cached = await this.redis.get(cacheKey(flightId));
    if (cached === null) {
      return null;
    }
    const count = Number(cached);
    return Number.isInteger(count) ? count : null;
  }

  async generation(flightId: string) {
    const raw = await this.redis.get(generationKey(flightId));
    return raw === null ? 0 : Number(raw);
  }

  async set(flightId: string, count: number, generation: number) {
    const written = await this.redis.eval(
      SET_IF_CURRENT,
      2,
      cacheKey(flightId),
      generationKey(flightId),
      String(generation),
      String(count),
      String(this.ttlSeconds)
    );
    return written === 1;
  }

  async invalidate(flightId: string) {
    const results = await this.redis.multi().incr(generationKey(flightId)).del(cacheKey(flightId)).exec();
    const failure = results?.find(([err]) => err !== null);
    if (failure?.[0]) {
      throw failure[0];
    }
  }
}
