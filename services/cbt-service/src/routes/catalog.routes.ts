import { Router } from 'express';
import type { CatalogController, CatalogEntry } from '../controllers/catalog.controller';
import type { AuthMiddleware } from '../middlewares/authMiddleware';

/** Mounted at /exam-types and /subjects. */
export function createCatalogRoutes<T extends CatalogEntry>(
  controller: CatalogController<T>,
  auth: AuthMiddleware
): Router {
  const router = Router();

  router.post('/', auth.requireAdmin, controller.create);
  router.get('/', auth.requireAuth, controller.list);
  router.get('/:id', auth.requireAuth, controller.get);
  router.put('/:id', auth.requireAdmin, controller.update);
  router.delete('/:id', auth.requireAdmin, controller.delete);

  return router;
}
