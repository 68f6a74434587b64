import { Router } from 'express';
import type { QuestionController } from '../controllers/question.controller';
import type { AuthMiddleware } from '../middlewares/authMiddleware';
import type { UploadMiddleware } from '../middlewares/upload';

export function createQuestionRoutes(
  questionController: QuestionController,
  auth: AuthMiddleware,
  upload: UploadMiddleware
): Router {
  const router = Router();

  router.post('/', auth.requireAdmin, questionController.createQuestion);
  router.get('/', auth.requireAuth, questionController.listQuestions);
  router.post('/bulk', auth.requireAdmin, questionController.createBulk);

  router.get('/exam-type/:examTypeId/subject/:subjectId', auth.requireAuth, questionController.listByExamTypeAndSubject);
  router.get('/exam-type/:examTypeId', auth.requireAuth, questionController.listByExamType);
  router.get('/subject/:subjectId', auth.requireAuth, questionController.listBySubject);

  router.get('/:id', auth.requireAuth, questionController.getQuestion);
  router.put('/:id', auth.requireAdmin, questionController.updateQuestion);
  router.delete('/:id', auth.requireAdmin, questionController.deleteQuestion);

  // Images
  router.post('/:id/image', auth.requireAdmin, upload.imageFile, questionController.uploadQuestionImage);
  router.delete('/:id/image', auth.requireAdmin, questionController.deleteQuestionImage);
  router.post('/:id/explanation-image', auth.requireAdmin, upload.imageFile, questionController.uploadExplanationImage);
  router.delete('/:id/explanation-image', auth.requireAdmin, questionController.deleteExplanationImage);

  return router;
}
