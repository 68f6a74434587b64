import { NotFoundError } from '@cbt/shared';
import { applyNewsPatch, News, NewsCreateInput, NewsPatch, NewsStore } from '../models/news.model';

export const MAX_NEWS_PAGE_SIZE = 100;

export class NewsService {
  constructor(private news: NewsStore) {}

  async create(input: NewsCreateInput): Promise<News> {
    return this.news.create(input);
  }

  /** Newest first; limit is capped at MAX_NEWS_PAGE_SIZE. */
  async list(skip: number, limit: number): Promise<News[]> {
    return this.news.list(skip, Math.min(limit, MAX_NEWS_PAGE_SIZE));
  }

  async get(id: number): Promise<News> {
    const item = await this.news.findById(id);
    if (!item) {
      throw new NotFoundError('News item not found');
    }
    return item;
  }

  async update(id: number, patch: NewsPatch): Promise<News> {
    const item = await this.get(id);
    return this.news.save(applyNewsPatch(item, patch));
  }

  async delete(id: number): Promise<void> {
    if (!(await this.news.delete(id))) {
      throw new NotFoundError('News item not found');
    }
  }
}
