import { Request, Response, NextFunction } from 'express';
import type { RoutingStore } from '../services/store/types';

export function createCatalogController(store: RoutingStore) {
  // GET /node-types
  async function listNodeTypes(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      res.json(await store.listNodeTypes());
    } catch (err) {
      next(err);
    }
  }

  // GET /edge-types
  async function listEdgeTypes(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      res.json(await store.listEdgeTypes());
    } catch (err) {
      next(err);
    }
  }

  return { listNodeTypes, listEdgeTypes };
}
