import { Request, Response, NextFunction } from 'express';
import { NotFoundError } from '../services/errors';
import type { RoutingStore } from '../services/store/types';
import { parseId } from './utils/validation';

export function createBuildingsController(store: RoutingStore) {
  /**
   * GET /:buildingId
   * Building details: name, description, floor count and footprint.
   */
  async function getBuilding(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const buildingId = parseId(req.params.buildingId, 'building');
      const building = await store.getBuilding(buildingId);
      if (!building) {
        throw new NotFoundError('Building not found');
      }
      res.json(building);
    } catch (err) {
      next(err);
    }
  }

  /**
   * GET /:buildingId/floors
   * Floors of a building ordered by level number.
   */
  async function getBuildingFloors(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const buildingId = parseId(req.params.buildingId, 'building');
      const building = await store.getBuilding(buildingId);
      if (!building) {
        throw new NotFoundError('Building not found');
      }
      res.json(await store.listFloorsByBuilding(buildingId));
    } catch (err) {
      next(err);
    }
  }

  return { getBuilding, getBuildingFloors };
}
