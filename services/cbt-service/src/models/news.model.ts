/**
 * News Model - PostgreSQL Schema
 */

import type { Pool } from 'pg';

type NewsRow = {
  id: number;
  title: string;
  content: string;
  url: string;
  date: Date;
  created_at: Date;
  updated_at: Date;
};

export interface News {
  id: number;
  title: string;
  content: string;
  url: string;
  date: Date;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewsCreateInput {
  title: string;
  content: string;
  url: string;
  date: Date;
}

export type NewsPatch = Partial<NewsCreateInput>;

export function applyNewsPatch(news: News, patch: NewsPatch): News {
  return {
    ...news,
    title: patch.title ?? news.title,
    content: patch.content ?? news.content,
    url: patch.url ?? news.url,
    date: patch.date ?? news.date,
  };
}

export async function createNewsTable(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS news (
      id SERIAL PRIMARY KEY,
      title VARCHAR(500) NOT NULL,
      content TEXT NOT NULL,
      url VARCHAR(1000) NOT NULL,
      date TIMESTAMPTZ NOT NULL,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);

  await pool.query(`CREATE INDEX IF NOT EXISTS idx_news_date ON news(date DESC);`);
}

function rowToNews(row: NewsRow): News {
  return {
    id: row.id,
    title: row.title,
    content: row.content,
    url: row.url,
    date: row.date,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export interface NewsStore {
  create(input: NewsCreateInput): Promise<News>;
  findById(id: number): Promise<News | null>;
  /** Newest first. */
  list(skip: number, limit: number): Promise<News[]>;
  save(news: News): Promise<News>;
  delete(id: number): Promise<boolean>;
}

export class NewsRepository implements NewsStore {
  constructor(private pool: Pool) {}

  async create(input: NewsCreateInput): Promise<News> {
    const result = await this.pool.query<NewsRow>(
      'INSERT INTO news (title, content, url, date) VALUES ($1, $2, $3, $4) RETURNING *',
      [input.title, input.content, input.url, input.date]
    );
    return rowToNews(result.rows[0]);
  }

  async findById(id: number): Promise<News | null> {
    const result = await this.pool.query<NewsRow>('SELECT * FROM news WHERE id = $1', [id]);
    return result.rows.length > 0 ? rowToNews(result.rows[0]) : null;
  }

  async list(skip: number, limit: number): Promise<News[]> {
    const result = await this.pool.query<NewsRow>(
      'SELECT * FROM news ORDER BY date DESC, id DESC OFFSET $1 LIMIT $2',
      [skip, limit]
    );
    return result.rows.map(rowToNews);
  }

  async save(news: News): Promise<News> {
    const result = await this.pool.query<NewsRow>(
      `UPDATE news
       SET title = $2, content = $3, url = $4, date = $5, updated_at = NOW()
       WHERE id = $1
       RETURNING *`,
      [news.id, news.title, news.content, news.url, news.date]
    );
    return rowToNews(result.rows[0]);
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.pool.query('DELETE FROM news WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }
}
