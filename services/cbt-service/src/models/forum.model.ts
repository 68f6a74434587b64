/**
 * Forum Model - PostgreSQL Schema
 * Posts grouped by a free-text subject label, with likes and replies
 */

import type { Pool } from 'pg';

export type ForumSort = 'newest' | 'popular';

type ForumPostRow = {
  id: number;
  title: string;
  content: string;
  subject: string;
  image_url: string | null;
  author_id: number;
  created_at: Date;
  updated_at: Date;
  likes: number;
};

type ForumReplyRow = {
  id: number;
  post_id: number;
  user_id: number;
  content: string;
  created_at: Date;
  updated_at: Date;
};

export interface ForumPost {
  id: number;
  title: string;
  content: string;
  subject: string;
  imageUrl: string | null;
  authorId: number;
  likes: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface ForumReply {
  id: number;
  postId: number;
  userId: number;
  content: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface ForumPostCreateInput {
  title: string;
  content: string;
  subject: string;
  imageUrl: string | null;
  authorId: number;
}

export interface ForumReplyCreateInput {
  postId: number;
  userId: number;
  content: string;
}

export interface ForumPostQuery {
  subject: string;
  sort: ForumSort;
  offset: number;
  limit: number;
}

export async function createForumTables(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS forum_posts (
      id SERIAL PRIMARY KEY,
      title VARCHAR(255) NOT NULL,
      content TEXT NOT NULL,
      subject VARCHAR(100) NOT NULL,
      image_url VARCHAR(500),
      author_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS forum_likes (
      id SERIAL PRIMARY KEY,
      post_id INTEGER NOT NULL REFERENCES forum_posts(id) ON DELETE CASCADE,
      user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      CONSTRAINT unique_forum_like UNIQUE (post_id, user_id)
    );
  `);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS forum_replies (
      id SERIAL PRIMARY KEY,
      post_id INTEGER NOT NULL REFERENCES forum_posts(id) ON DELETE CASCADE,
      user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      content TEXT NOT NULL,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);

  await pool.query(`
    CREATE INDEX IF NOT EXISTS idx_forum_posts_subject ON forum_posts(subject, created_at DESC);
    CREATE INDEX IF NOT EXISTS idx_forum_replies_post_id ON forum_replies(post_id);
  `);
}

function rowToPost(row: ForumPostRow): ForumPost {
  return {
    id: row.id,
    title: row.title,
    content: row.content,
    subject: row.subject,
    imageUrl: row.image_url,
    authorId: row.author_id,
    likes: row.likes,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function rowToReply(row: ForumReplyRow): ForumReply {
  return {
    id: row.id,
    postId: row.post_id,
    userId: row.user_id,
    content: row.content,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

const POST_COLUMNS = `
  p.*,
  (SELECT COUNT(*)::int FROM forum_likes l WHERE l.post_id = p.id) AS likes
`;

export interface ForumStore {
  createPost(input: ForumPostCreateInput): Promise<ForumPost>;
  findPostById(id: number): Promise<ForumPost | null>;
  countPosts(subject: string): Promise<number>;
  listPosts(query: ForumPostQuery): Promise<ForumPost[]>;
  hasLike(postId: number, userId: number): Promise<boolean>;
  addLike(postId: number, userId: number): Promise<void>;
  removeLike(postId: number, userId: number): Promise<void>;
  countLikes(postId: number): Promise<number>;
  createReply(input: ForumReplyCreateInput): Promise<ForumReply>;
  /** Oldest first. */
  listReplies(postIds: number[]): Promise<ForumReply[]>;
}

export class ForumRepository implements ForumStore {
  constructor(private pool: Pool) {}

  async createPost(input: ForumPostCreateInput): Promise<ForumPost> {
    const result = await this.pool.query<ForumPostRow>(
      `INSERT INTO forum_posts (title, content, subject, image_url, author_id)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING *, 0 AS likes`,
      [input.title, input.content, input.subject, input.imageUrl, input.authorId]
    );
    return rowToPost(result.rows[0]);
  }

  async findPostById(id: number): Promise<ForumPost | null> {
    const result = await this.pool.query<ForumPostRow>(
      `SELECT ${POST_COLUMNS} FROM forum_posts p WHERE p.id = $1`,
      [id]
    );
    return result.rows.length > 0 ? rowToPost(result.rows[0]) : null;
  }

  async countPosts(subject: string): Promise<number> {
    const result = await this.pool.query<{ count: number }>(
      'SELECT COUNT(*)::int AS count FROM forum_posts WHERE subject = $1',
      [subject]
    );
    return result.rows[0].count;
  }

  async listPosts(query: ForumPostQuery): Promise<ForumPost[]> {
    const orderBy =
      query.sort === 'popular' ? 'likes DESC, p.created_at DESC, p.id DESC' : 'p.created_at DESC, p.id DESC';
    const result = await this.pool.query<ForumPostRow>(
      `SELECT ${POST_COLUMNS}
       FROM forum_posts p
       WHERE p.subject = $1
       ORDER BY ${orderBy}
       OFFSET $2 LIMIT $3`,
      [query.subject, query.offset, query.limit]
    );
    return result.rows.map(rowToPost);
  }

  async hasLike(postId: number, userId: number): Promise<boolean> {
    const result = await this.pool.query(
      'SELECT 1 FROM forum_likes WHERE post_id = $1 AND user_id = $2',
      [postId, userId]
    );
    return result.rows.length > 0;
  }

  async addLike(postId: number, userId: number): Promise<void> {
    await this.pool.query(
      'INSERT INTO forum_likes (post_id, user_id) VALUES ($1, $2) ON CONFLICT (post_id, user_id) DO NOTHING',
      [postId, userId]
    );
  }

  async removeLike(postId: number, userId: number): Promise<void> {
    await this.pool.query('DELETE FROM forum_likes WHERE post_id = $1 AND user_id = $2', [postId, userId]);
  }

  async countLikes(postId: number): Promise<number> {
    const result = await this.pool.query<{ count: number }>(
      'SELECT COUNT(*)::int AS count FROM forum_likes WHERE post_id = $1',
      [postId]
    );
    return result.rows[0].count;
  }

  async createReply(input: ForumReplyCreateInput): Promise<ForumReply> {
    const result = await this.pool.query<ForumReplyRow>(
      'INSERT INTO forum_replies (post_id, user_id, content) VALUES ($1, $2, $3) RETURNING *',
      [input.postId, input.userId, input.content]
    );
    return rowToReply(result.rows[0]);
  }

  async listReplies(postIds: number[]): Promise<ForumReply[]> {
    if (postIds.length === 0) {
      return [];
    }
    const result = await this.pool.query<ForumReplyRow>(
      'SELECT * FROM forum_replies WHERE post_id = ANY($1::int[]) ORDER BY created_at ASC, id ASC',
      [postIds]
    );
    return result.rows.map(rowToReply);
  }
}
