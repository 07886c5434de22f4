import { Request, Response, NextFunction } from 'express';
import type { RoutingConfig } from '../config/routing';
import { calculateRoute } from '../services/routeBuilder';
import type { RoutingCache } from '../services/routingCache';
import type { RoutingStore } from '../services/store/types';
import { withTimeout } from '../utils/timeout';
import { parseId, parseRouteRequestBody } from './utils/validation';

export interface NavigationControllerDeps {
  store: RoutingStore;
  cache: RoutingCache;
  routing: RoutingConfig;
}

export function createNavigationController(deps: NavigationControllerDeps) {
  /**
   * POST /route
   * Calculates a navigation route from a coordinate on a floor to a POI.
   *
   * @param from - Starting floor id and coordinates ({ floorId, lat, lng }).
   * @param to - Destination POI ({ poiId }).
   * @param options - { accessible } (defaults to true: accessible edges only).
   * @returns The path grouped by floor, total distance in meters and steps.
   */
  async function getRoute(
    req: Request,
    res: Response,
    next: NextFunction,
  ): Promise<void> {
    try {
      const body = parseRouteRequestBody(req.body);
      const fromFloorId = parseId(body.from.floorId, 'floor');
      const toPoiId = parseId(body.to.poiId, 'POI');

      const route = await withTimeout(
        calculateRoute(
          { store: deps.store, cache: deps.cache, config: deps.routing },
          {
            fromFloorId,
            from: { latitude: body.from.lat, longitude: body.from.lng },
            toPoiId,
            accessible: body.options.accessible,
          },
        ),
        deps.routing.timeoutMs,
      );

      res.json(route);
    } catch (err) {
      next(err);
    }
  }

  return { getRoute };
}
