// src/api/routes/index.ts
import { Router } from 'express';
import { CheckController } from '../controllers/check.controller';

export function createApiRouter(controller: CheckController): Router {
  const router = Router();

  router.post('/check', controller.checkToken);
  router.get('/recent-phishy', controller.getRecentPhishy);

  return router;
}
