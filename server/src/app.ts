import { Hono } from 'hono';
import { logger } from 'hono/logger';
import type { PatternRegistry } from './engine/pattern-registry.js';
import { ReviewEngine } from './engine/review-engine.js';
import { createHealthRoutes } from './routes/health.js';
import { createReviewRoutes } from './routes/review.js';
import { createRulesRoutes } from './routes/rules.js';

export interface AppOptions {
  registry: PatternRegistry;
  requestLogging?: boolean;
}

export function createApp({ registry, requestLogging = true }: AppOptions): Hono {
  const app = new Hono();

  if (requestLogging) {
    app.use('*', logger());
  }

  app.route('/', createHealthRoutes(registry));
  app.route('/', createReviewRoutes(new ReviewEngine(registry)));
  app.route('/', createRulesRoutes(registry));

  app.onError((err, c) => {
    console.error(`[api] ${c.req.method} ${c.req.path} failed:`, err.message);
    return c.json({ error: err.message }, 500);
  });

  return app;
}
