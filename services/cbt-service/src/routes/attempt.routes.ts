import { Router } from 'express';
import type { AttemptController } from '../controllers/attempt.controller';
import type { AuthMiddleware } from '../middlewares/authMiddleware';

export function createAttemptRoutes(attemptController: AttemptController, auth: AuthMiddleware): Router {
  const router = Router();

  router.post('/start', auth.requireAuth, attemptController.startAttempt);
  router.post('/submit', auth.requireAuth, attemptController.submitAttempt);
  router.post('/practice', auth.requireAuth, attemptController.savePractice);

  router.get('/leaderboard/top', auth.requireAuth, attemptController.getLeaderboard);
  router.get('/user/:id', auth.requireAuth, attemptController.getUserAttempts);
  // Teachers and admins
  router.get('/student/:id', auth.requireStaff, attemptController.getStudentAttempts);
  router.get('/:id', auth.requireAuth, attemptController.getAttempt);

  return router;
}
