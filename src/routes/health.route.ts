import express from 'express';
import {
  createHealthController,
  type HealthControllerDeps,
} from '../controller/health.controller';

export default function healthRoutes(deps: HealthControllerDeps) {
  const router = express.Router();
  const controller = createHealthController(deps);

  router.get('/', controller.health);
  router.get('/ready', controller.ready);
  router.get('/live', controller.live);

  return router;
}
