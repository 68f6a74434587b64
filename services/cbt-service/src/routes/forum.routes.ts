import { Router } from 'express';
import type { ForumController } from '../controllers/forum.controller';
import type { AuthMiddleware } from '../middlewares/authMiddleware';
import type { UploadMiddleware } from '../middlewares/upload';

export function createForumRoutes(
  forumController: ForumController,
  auth: AuthMiddleware,
  upload: UploadMiddleware
): Router {
  const router = Router();

  router.get('/posts', forumController.listPosts);
  router.post('/posts', auth.requireAuth, upload.forumImage, forumController.createPost);
  router.post('/posts/:id/like', auth.requireAuth, forumController.toggleLike);
  router.get('/posts/:id/replies', forumController.listReplies);
  router.post('/posts/:id/replies', auth.requireAuth, forumController.createReply);

  return router;
}
