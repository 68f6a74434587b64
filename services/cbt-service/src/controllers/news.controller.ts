import { Request, Response } from 'express';
import { asyncHandler, successResponse } from '@cbt/shared';
import { NewsService } from '../services/news.service';
import { IdParamsSchema, PaginationQuerySchema } from '../schemas/common.schema';
import { NewsCreateSchema, NewsUpdateSchema } from '../schemas/news.schema';
import { toNewsResponse } from '../utils/serializers';

export class NewsController {
  constructor(private readonly newsService: NewsService) {}

  createNews = asyncHandler(async (req: Request, res: Response) => {
    const body = NewsCreateSchema.parse(req.body);
    const news = await this.newsService.create(body);
    return successResponse(res, { statusCode: 201, message: 'News created successfully', data: toNewsResponse(news) });
  });

  listNews = asyncHandler(async (req: Request, res: Response) => {
    const { skip, limit } = PaginationQuerySchema.parse(req.query);
    const items = await this.newsService.list(skip, limit);
    return successResponse(res, { message: 'News fetched successfully', data: items.map(toNewsResponse) });
  });

  getNews = asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamsSchema.parse(req.params);
    const news = await this.newsService.get(id);
    return successResponse(res, { message: 'News fetched successfully', data: toNewsResponse(news) });
  });

  updateNews = asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamsSchema.parse(req.params);
    const body = NewsUpdateSchema.parse(req.body);
    const news = await this.newsService.update(id, body);
    return successResponse(res, { message: 'News updated successfully', data: toNewsResponse(news) });
  });

  deleteNews = asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamsSchema.parse(req.params);
    await this.newsService.delete(id);
    res.status(204).end();
  });
}
