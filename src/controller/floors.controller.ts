import { Request, Response, NextFunction } from 'express';
import { NotFoundError } from '../services/errors';
import type { RoutingStore } from '../services/store/types';
import type { GeoJsonObject, JsonValue } from '../types/nodes';
import { parseId } from './utils/validation';

export interface FeatureCollection {
  type: 'FeatureCollection';
  features: JsonValue[];
}

/**
 * Normalises a stored floor document to a FeatureCollection: collections pass
 * through, other objects contribute their `features`, and a missing document
 * becomes an empty collection.
 */
export function toFeatureCollection(document: GeoJsonObject | null): FeatureCollection | GeoJsonObject {
  if (!document) {
    return { type: 'FeatureCollection', features: [] };
  }
  if (document.type === 'FeatureCollection') {
    return document;
  }
  const features = document.features;
  return {
    type: 'FeatureCollection',
    features: Array.isArray(features) ? features : [],
  };
}

export function createFloorsController(store: RoutingStore) {
  /**
   * GET /:floorId/map
   * The indoor map of a floor as a GeoJSON FeatureCollection, ready for a
   * map renderer.
   */
  async function getFloorMap(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const floorId = parseId(req.params.floorId, 'floor');
      const floor = await store.getFloor(floorId);
      if (!floor) {
        throw new NotFoundError('Floor not found');
      }
      res.json(toFeatureCollection(floor.floorGeojson));
    } catch (err) {
      next(err);
    }
  }

  // GET /floor/:floorId
  async function getFloorPois(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const floorId = parseId(req.params.floorId, 'floor');
      const floor = await store.getFloor(floorId);
      if (!floor) {
        throw new NotFoundError('Floor not found');
      }
      res.json(await store.listPoisByFloor(floorId));
    } catch (err) {
      next(err);
    }
  }

  return { getFloorMap, getFloorPois };
}
