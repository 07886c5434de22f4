import express from 'express';
import { createFloorsController } from '../controller/floors.controller';
import type { RoutingStore } from '../services/store/types';

export function floorRoutes(store: RoutingStore) {
  const router = express.Router();
  const controller = createFloorsController(store);

  /**
   * @swagger
   * /{floorId}/map:
   *   get:
   *     summary: returns the floor's indoor map as a GeoJSON FeatureCollection
   */
  router.get('/:floorId/map', controller.getFloorMap);

  return router;
}

export function poiRoutes(store: RoutingStore) {
  const router = express.Router();
  const controller = createFloorsController(store);

  /**
   * @swagger
   * /floor/{floorId}:
   *   get:
   *     summary: returns the points of interest on a floor
   */
  router.get('/floor/:floorId', controller.getFloorPois);

  return router;
}
