/**
 * Forum Service - subject boards with posts, likes and replies
 */

import { NotFoundError } from '@cbt/shared';
import { ForumPost, ForumReply, ForumSort, ForumStore } from '../models/forum.model';
import { User, UserStore } from '../models/user.model';
import { UploadedFile, UploadService } from './upload.service';

export interface ForumAuthor {
  id: number;
  name: string;
  avatar: string | null;
}

export interface ForumReplyView {
  id: number;
  postId: number;
  user: ForumAuthor;
  content: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface ForumPostView {
  id: number;
  title: string;
  content: string;
  subject: string;
  imageUrl: string | null;
  likes: number;
  replyCount: number;
  replies: ForumReplyView[];
  author: ForumAuthor;
  createdAt: Date;
  updatedAt: Date;
}

export interface ForumPostPage {
  posts: ForumPostView[];
  totalPages: number;
  currentPage: number;
}

export interface LikeToggleResult {
  postId: number;
  likes: number;
  liked: boolean;
  message: string;
}

export function toForumAuthor(user: User | undefined, fallbackId: number): ForumAuthor {
  return {
    id: user?.id ?? fallbackId,
    name: user ? user.fullName || user.username : 'Deleted user',
    avatar: null,
  };
}

export class ForumService {
  constructor(
    private forum: ForumStore,
    private users: UserStore,
    private uploads: UploadService
  ) {}

  async createPost(
    actor: User,
    input: { title: string; content: string; subject: string },
    image?: UploadedFile
  ): Promise<ForumPost> {
    const imageUrl = image ? `/${await this.uploads.saveImage('forum', image)}` : null;
    return this.forum.createPost({ ...input, imageUrl, authorId: actor.id });
  }

  async listPosts(subject: string, page: number, limit: number, sort: ForumSort): Promise<ForumPostPage> {
    const total = await this.forum.countPosts(subject);
    const posts = await this.forum.listPosts({ subject, sort, offset: (page - 1) * limit, limit });
    return {
      posts: await this.renderPosts(posts),
      totalPages: Math.ceil(total / limit),
      currentPage: page,
    };
  }

  async toggleLike(actor: User, postId: number): Promise<LikeToggleResult> {
    await this.requirePost(postId);

    const liked = !(await this.forum.hasLike(postId, actor.id));
    if (liked) {
      await this.forum.addLike(postId, actor.id);
    } else {
      await this.forum.removeLike(postId, actor.id);
    }

    return {
      postId,
      likes: await this.forum.countLikes(postId),
      liked,
      message: liked ? 'Post liked' : 'Post unliked',
    };
  }

  async createReply(actor: User, postId: number, content: string): Promise<ForumReplyView> {
    await this.requirePost(postId);
    const reply = await this.forum.createReply({ postId, userId: actor.id, content });
    return this.renderReply(reply, new Map([[actor.id, actor]]));
  }

  async listReplies(postId: number): Promise<ForumReplyView[]> {
    await this.requirePost(postId);
    const replies = await this.forum.listReplies([postId]);
    const users = await this.loadUsers(replies.map((reply) => reply.userId));
    return replies.map((reply) => this.renderReply(reply, users));
  }

  private async requirePost(postId: number): Promise<ForumPost> {
    const post = await this.forum.findPostById(postId);
    if (!post) {
      throw new NotFoundError('Post not found');
    }
    return post;
  }

  private async renderPosts(posts: ForumPost[]): Promise<ForumPostView[]> {
    const replies = await this.forum.listReplies(posts.map((post) => post.id));
    const users = await this.loadUsers([
      ...posts.map((post) => post.authorId),
      ...replies.map((reply) => reply.userId),
    ]);

    return posts.map((post) => {
      const postReplies = replies
        .filter((reply) => reply.postId === post.id)
        .map((reply) => this.renderReply(reply, users));
      return {
        id: post.id,
        title: post.title,
        content: post.content,
        subject: post.subject,
        imageUrl: post.imageUrl,
        likes: post.likes,
        replyCount: postReplies.length,
        replies: postReplies,
        author: toForumAuthor(users.get(post.authorId), post.authorId),
        createdAt: post.createdAt,
        updatedAt: post.updatedAt,
      };
    });
  }

  private renderReply(reply: ForumReply, users: Map<number, User>): ForumReplyView {
    return {
      id: reply.id,
      postId: reply.postId,
      user: toForumAuthor(users.get(reply.userId), reply.userId),
      content: reply.content,
      createdAt: reply.createdAt,
      updatedAt: reply.updatedAt,
    };
  }

  private async loadUsers(ids: number[]): Promise<Map<number, User>> {
    const users = await this.users.findByIds([...new Set(ids)]);
    return new Map(users.map((user) => [user.id, user]));
  }
}
