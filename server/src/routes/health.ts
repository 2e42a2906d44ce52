import { Hono } from 'hono';
import type { HealthResponse } from '../types.js';
import type { PatternRegistry } from '../engine/pattern-registry.js';
import { getFixProviderConfig } from '../config.js';

export const VERSION = '0.1.0';

export function createHealthRoutes(registry: PatternRegistry): Hono {
  const health = new Hono();

  health.get('/health', (c) => {
    const body: HealthResponse = {
      status: 'ok',
      version: VERSION,
      timestamp: new Date().toISOString(),
      rules: registry.size,
      fixProvider: getFixProviderConfig().effective,
    };
    return c.json(body);
  });

  return health;
}
