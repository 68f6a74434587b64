import { Router } from 'express';
import type { NewsController } from '../controllers/news.controller';
import type { AuthMiddleware } from '../middlewares/authMiddleware';

export function createNewsRoutes(newsController: NewsController, auth: AuthMiddleware): Router {
  const router = Router();

  // Public reads
  router.get('/', newsController.listNews);
  router.get('/:id', newsController.getNews);

  router.post('/', auth.requireAdmin, newsController.createNews);
  router.put('/:id', auth.requireAdmin, newsController.updateNews);
  router.delete('/:id', auth.requireAdmin, newsController.deleteNews);

  return router;
}
