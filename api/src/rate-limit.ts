import type { FastifyInstance } from 'fastify';

export type BurstGuardOptions = {
  threshold: number;
  windowMs: number;
  blockMs: number;
  now?: () => number;
};

type BurstEntry = { count: number; first: number; blockedUntil: number };

// Simple burst detector: more than threshold requests from one address inside the
// window blocks that address for blockMs.
export function registerBurstGuard(app: FastifyInstance, opts: BurstGuardOptions) {
  const hits = new Map<string, BurstEntry>();
  const now = opts.now ?? Date.now;

  app.addHook('onRequest', async (req, reply) => {
    const key = req.ip || 'unknown';
    const at = now();
    const entry = hits.get(key) ?? { count: 0, first: at, blockedUntil: 0 };

    if (entry.blockedUntil > at) {
      reply.header('Retry-After', String(Math.ceil((entry.blockedUntil - at) / 1000)));
      return reply.code(429).send({ error: { code: 'TEMPORARILY_BLOCKED', message: 'temporarily blocked' } });
    }

    if (at - entry.first > opts.windowMs) {
      entry.count = 0;
      entry.first = at;
    }

    entry.count += 1;
    hits.set(key, entry);
    if (entry.count > opts.threshold) {
      entry.blockedUntil = at + opts.blockMs;
      req.log.warn({ ip: key, count: entry.count }, 'burst limit exceeded');
      return reply.code(429).send({ error: { code: 'BURST_LIMIT_EXCEEDED', message: 'burst limit exceeded' } });
    }
  });
}
