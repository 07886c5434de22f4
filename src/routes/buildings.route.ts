import express from 'express';
import { createBuildingsController } from '../controller/buildings.controller';
import type { RoutingStore } from '../services/store/types';

export default function buildingRoutes(store: RoutingStore) {
  const router = express.Router();
  const controller = createBuildingsController(store);

  /**
   * @swagger
   * /{buildingId}:
   *   get:
   *     summary: returns a building by id
   */
  router.get('/:buildingId', controller.getBuilding);

  /**
   * @swagger
   * /{buildingId}/floors:
   *   get:
   *     summary: returns the floors of a building, lowest level first
   */
  router.get('/:buildingId/floors', controller.getBuildingFloors);

  return router;
}
