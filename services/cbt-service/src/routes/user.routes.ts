import { Router } from 'express';
import type { UserController } from '../controllers/user.controller';
import type { AuthMiddleware } from '../middlewares/authMiddleware';
import type { UploadMiddleware } from '../middlewares/upload';

export function createUserRoutes(
  userController: UserController,
  auth: AuthMiddleware,
  upload: UploadMiddleware
): Router {
  const router = Router();

  // Public
  router.post('/register', userController.register);
  router.post('/login', userController.login);
  router.post('/refresh-token', userController.refreshToken);

  // Admin
  router.post('/bulk-upload', auth.requireAdmin, upload.spreadsheet, userController.bulkUpload);

  // Authenticated; update/delete are further limited to self or admin
  router.get('/', auth.requireAuth, userController.listUsers);
  router.get('/:id', auth.requireAuth, userController.getUser);
  router.put('/:id', auth.requireAuth, userController.updateUser);
  router.delete('/:id', auth.requireAuth, userController.deleteUser);

  return router;
}
