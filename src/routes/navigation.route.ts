import express from 'express';
import {
  createNavigationController,
  type NavigationControllerDeps,
} from '../controller/navigation.controller';

export default function navigationRoutes(deps: NavigationControllerDeps) {
  const router = express.Router();
  const controller = createNavigationController(deps);

  /**
   * @swagger
   * /route:
   *   post:
   *     summary: returns a route from a coordinate on a floor to a POI
   *     description: Path grouped by floor ([lng, lat] pairs), total distance in meters and step-by-step instructions.
   */
  router.post('/route', controller.getRoute);

  return router;
}
