import { Router } from 'express';
import type { TestController } from '../controllers/test.controller';
import type { AuthMiddleware } from '../middlewares/authMiddleware';

export function createTestRoutes(testController: TestController, auth: AuthMiddleware): Router {
  const router = Router();

  router.post('/', auth.requireStaff, testController.createTest);
  router.get('/', auth.requireAuth, testController.listTests);
  router.get('/exam-type/:id', auth.requireAuth, testController.listByExamType);
  router.get('/subject/:id', auth.requireAuth, testController.listBySubject);
  router.get('/:id', auth.requireAuth, testController.getTest);
  router.get('/:id/with-questions', auth.requireAuth, testController.getWithQuestions);
  router.put('/:id', auth.requireStaff, testController.updateTest);
  router.delete('/:id', auth.requireStaff, testController.deleteTest);

  return router;
}
