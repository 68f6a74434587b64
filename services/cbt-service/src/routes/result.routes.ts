import { Router } from 'express';
import type { ResultController } from '../controllers/result.controller';
import type { AuthMiddleware } from '../middlewares/authMiddleware';

export function createResultRoutes(resultController: ResultController, auth: AuthMiddleware): Router {
  const router = Router();

  router.get('/attempt/:id', auth.requireAuth, resultController.getAttemptResult);
  router.get('/user/:id', auth.requireAuth, resultController.getUserResults);
  router.get('/test/:id/analytics', auth.requireAuth, resultController.getTestAnalytics);

  return router;
}
