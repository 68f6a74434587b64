import { Request, Response } from 'express';
import { asyncHandler, successResponse } from '@cbt/shared';
import { ForumService } from '../services/forum.service';
import { requireUser } from '../middlewares/authMiddleware';
import { getUploadedFile } from '../middlewares/upload';
import { IdParamsSchema } from '../schemas/common.schema';
import { ForumPostCreateSchema, ForumPostListQuerySchema, ForumReplyCreateSchema } from '../schemas/forum.schema';

export class ForumController {
  constructor(private readonly forumService: ForumService) {}

  /**
   * POST /forum/posts
   * multipart: title, content, subject and an optional `image`
   */
  createPost = asyncHandler(async (req: Request, res: Response) => {
    const body = ForumPostCreateSchema.parse(req.body);
    const post = await this.forumService.createPost(requireUser(req), body, getUploadedFile(req));
    return successResponse(res, { statusCode: 201, message: 'Post created successfully', data: { id: post.id } });
  });

  listPosts = asyncHandler(async (req: Request, res: Response) => {
    const { subject, page, limit, sort } = ForumPostListQuerySchema.parse(req.query);
    const result = await this.forumService.listPosts(subject, page, limit, sort);
    return successResponse(res, { message: 'Posts fetched successfully', data: result });
  });

  /**
   * POST /forum/posts/:id/like
   * Likes the post, or removes the like when the caller already liked it.
   */
  toggleLike = asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamsSchema.parse(req.params);
    const result = await this.forumService.toggleLike(requireUser(req), id);
    return successResponse(res, { message: result.message, data: result });
  });

  createReply = asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamsSchema.parse(req.params);
    const { content } = ForumReplyCreateSchema.parse(req.body);
    const reply = await this.forumService.createReply(requireUser(req), id, content);
    return successResponse(res, { statusCode: 201, message: 'Reply created successfully', data: reply });
  });

  listReplies = asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamsSchema.parse(req.params);
    const replies = await this.forumService.listReplies(id);
    return successResponse(res, { message: 'Replies fetched successfully', data: replies });
  });
}
