import Fastify from 'fastify';
import rateLimit from '@fastify/rate-limit';
import { cardRoutes } from '@/api/routes/card';
import { env } from '@/config/env';
import { ICardDisplayStore } from '@/contracts';

export interface BuildAppOptions {
  store: ICardDisplayStore;
  issuerName?: string;
}

export function buildApp(options: BuildAppOptions) {
  const fastify = Fastify({
    logger: {
      level: env.LOG_LEVEL,
    },
  });

  // Global rate limit: 60 req/min per IP, in-memory
  if (env.NODE_ENV !== 'test') {
    fastify.register(rateLimit, {
      global: true,
      max: 60,
      timeWindow: '1 minute',
      keyGenerator: (req) => req.ip ?? 'unknown',
      errorResponseBuilder: (_req, context) => ({
        statusCode: 429,
        error: 'rate_limit_exceeded',
        message: `Too many requests. Please retry after ${context.after}.`,
        retryAfter: context.ttl / 1000,
      }),
    });
  }

  // Routes go in after() so the rate-limit onRoute hook sees all of them
  fastify.after(() => {
    fastify.register(cardRoutes, {
      store: options.store,
      issuerName: options.issuerName ?? env.CARD_ISSUER_NAME,
    });

    fastify.get('/health', async () => ({ status: 'ok', timestamp: new Date().toISOString() }));
  });

  return fastify;
}
