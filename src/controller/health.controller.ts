import { Request, Response } from 'express';
import type { RoutingCache } from '../services/routingCache';
import type { RoutingStore } from '../services/store/types';

export interface HealthControllerDeps {
  store: RoutingStore;
  cache: RoutingCache;
  version: string;
  environment: string;
}

export function createHealthController(deps: HealthControllerDeps) {
  async function checkStore(): Promise<boolean> {
    try {
      await deps.store.ping();
      return true;
    } catch (err) {
      console.error('[health] Store check failed:', err instanceof Error ? err.message : err);
      return false;
    }
  }

  /**
   * GET /health
   * Overall status for load balancers: "healthy", or "degraded" when the
   * store cannot be reached.
   */
  async function health(_req: Request, res: Response): Promise<void> {
    const storeHealthy = await checkStore();
    res.json({
      status: storeHealthy ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      version: deps.version,
      environment: deps.environment,
      checks: {
        store: storeHealthy ? 'healthy' : 'unhealthy',
        api: 'healthy',
      },
      cache: deps.cache.stats(),
    });
  }

  // GET /health/ready
  async function ready(_req: Request, res: Response): Promise<void> {
    if (await checkStore()) {
      res.json({ status: 'ready', timestamp: new Date().toISOString() });
      return;
    }
    res.status(503).json({ status: 'not ready', error: 'Store unavailable' });
  }

  // GET /health/live
  function live(_req: Request, res: Response): void {
    res.json({ status: 'alive', timestamp: new Date().toISOString() });
  }

  return { health, ready, live };
}
