import express from 'express';
import { createCatalogController } from '../controller/catalog.controller';
import type { RoutingStore } from '../services/store/types';

export default function catalogRoutes(store: RoutingStore) {
  const router = express.Router();
  const controller = createCatalogController(store);

  // Node roles: hallway, door, stairwell, elevator, entrance, exit
  router.get('/node-types', controller.listNodeTypes);

  // Traversal modes with their accessibility flag
  router.get('/edge-types', controller.listEdgeTypes);

  return router;
}
