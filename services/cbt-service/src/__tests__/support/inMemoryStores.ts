/**
 * Map-backed store fakes for service tests. Ordering and uniqueness rules
 * follow the SQL in the repositories.
 */

import type { Queryable, TransactionRunner } from '@cbt/shared';
import type {
  Answer,
  AnswerInput,
  Attempt,
  AttemptOutcome,
  AttemptStartInput,
  AttemptStore,
  CompletedAttempt,
  CompletedAttemptFilter,
  InProgressAttempt,
  PracticeAttemptInput,
} from '../../models/attempt.model';
import type { ExamType, ExamTypeCreateInput, ExamTypeStore } from '../../models/examType.model';
import type {
  ForumPost,
  ForumPostCreateInput,
  ForumPostQuery,
  ForumReply,
  ForumReplyCreateInput,
  ForumStore,
} from '../../models/forum.model';
import type { News, NewsCreateInput, NewsStore } from '../../models/news.model';
import type { Question, QuestionCreateInput, QuestionFilter, QuestionStore } from '../../models/question.model';
import type { Subject, SubjectCreateInput, SubjectStore } from '../../models/subject.model';
import type { Test, TestCreateInput, TestStore } from '../../models/test.model';
import type { User, UserCreateInput, UserStore } from '../../models/user.model';

export const FIXED_DATE = new Date('2024-03-01T10:00:00.000Z');

const unusedDb: Queryable = {
  query: () => Promise.reject(new Error('not used')),
};

export const runInline: TransactionRunner = (handler) => handler(unusedDb);

interface Snapshottable {
  snapshot(): () => void;
}

/**
 * Runs one transaction at a time, like a row lock held until commit, and restores
 * the given stores when the handler throws.
 */
export function createSerialRunner(...stores: Snapshottable[]): TransactionRunner {
  let tail: Promise<unknown> = Promise.resolve();
  return <T>(handler: (db: Queryable) => Promise<T>): Promise<T> => {
    const run = tail.then(async () => {
      const restores = stores.map((store) => store.snapshot());
      try {
        return await handler(unusedDb);
      } catch (error) {
        restores.forEach((restore) => restore());
        throw error;
      }
    });
    tail = run.catch(() => undefined);
    return run;
  };
}

function uniqueViolation(): Error {
  return Object.assign(new Error('duplicate key value violates unique constraint'), { code: '23505' });
}

class Table<T extends { id: number }> {
  readonly rows = new Map<number, T>();
  private nextId = 1;

  insert<R extends T>(build: (id: number) => R): R {
    const row = build(this.nextId++);
    this.rows.set(row.id, row);
    return row;
  }

  all(): T[] {
    return [...this.rows.values()].sort((a, b) => a.id - b.id);
  }

  get(id: number): T | null {
    return this.rows.get(id) ?? null;
  }

  replace(row: T): T {
    if (!this.rows.has(row.id)) {
      throw new Error(`row ${row.id} does not exist`);
    }
    this.rows.set(row.id, row);
    return row;
  }

  remove(id: number): boolean {
    return this.rows.delete(id);
  }

  snapshot(): () => void {
    const rows = new Map(this.rows);
    const nextId = this.nextId;
    return () => {
      this.rows.clear();
      rows.forEach((row, id) => this.rows.set(id, row));
      this.nextId = nextId;
    };
  }
}

export class InMemoryUserStore implements UserStore {
  readonly table = new Table<User>();

  async create(input: UserCreateInput): Promise<User> {
    if (this.table.all().some((u) => u.username === input.username || u.email === input.email)) {
      throw uniqueViolation();
    }
    return this.table.insert((id) => ({ id, ...input, isActive: true, createdAt: FIXED_DATE }));
  }

  async findById(id: number): Promise<User | null> {
    return this.table.get(id);
  }

  async findByUsername(username: string): Promise<User | null> {
    return this.table.all().find((u) => u.username === username) ?? null;
  }

  async findByUsernameOrEmail(username: string, email: string): Promise<User | null> {
    return this.table.all().find((u) => u.username === username || u.email === email) ?? null;
  }

  async findByIds(ids: number[]): Promise<User[]> {
    return this.table.all().filter((u) => ids.includes(u.id));
  }

  async list(skip: number, limit: number): Promise<User[]> {
    return this.table.all().slice(skip, skip + limit);
  }

  async save(user: User): Promise<User> {
    return this.table.replace(user);
  }

  async delete(id: number): Promise<boolean> {
    return this.table.remove(id);
  }
}

export class InMemoryExamTypeStore implements ExamTypeStore {
  readonly table = new Table<ExamType>();

  async create(input: ExamTypeCreateInput): Promise<ExamType> {
    if (await this.findByName(input.name)) {
      throw uniqueViolation();
    }
    return this.table.insert((id) => ({ id, ...input, createdAt: FIXED_DATE }));
  }

  async findById(id: number): Promise<ExamType | null> {
    return this.table.get(id);
  }

  async findByName(name: string): Promise<ExamType | null> {
    return this.table.all().find((e) => e.name === name) ?? null;
  }

  async list(): Promise<ExamType[]> {
    return this.table.all().sort((a, b) => a.name.localeCompare(b.name));
  }

  async save(examType: ExamType): Promise<ExamType> {
    return this.table.replace(examType);
  }

  async delete(id: number): Promise<boolean> {
    return this.table.remove(id);
  }
}

export class InMemorySubjectStore implements SubjectStore {
  readonly table = new Table<Subject>();

  async create(input: SubjectCreateInput): Promise<Subject> {
    if (await this.findByName(input.name)) {
      throw uniqueViolation();
    }
    return this.table.insert((id) => ({ id, ...input, createdAt: FIXED_DATE }));
  }

  async findById(id: number): Promise<Subject | null> {
    return this.table.get(id);
  }

  async findByName(name: string): Promise<Subject | null> {
    return this.table.all().find((s) => s.name === name) ?? null;
  }

  async findByIds(ids: number[]): Promise<Subject[]> {
    return this.table.all().filter((s) => ids.includes(s.id));
  }

  async list(): Promise<Subject[]> {
    return this.table.all().sort((a, b) => a.name.localeCompare(b.name));
  }

  async save(subject: Subject): Promise<Subject> {
    return this.table.replace(subject);
  }

  async delete(id: number): Promise<boolean> {
    return this.table.remove(id);
  }
}

export class InMemoryQuestionStore implements QuestionStore {
  readonly table = new Table<Question>();

  async create(input: QuestionCreateInput): Promise<Question> {
    return this.table.insert((id) => ({
      id,
      ...input,
      questionImage: null,
      explanationImage: null,
      createdAt: FIXED_DATE,
    }));
  }

  async findById(id: number): Promise<Question | null> {
    return this.table.get(id);
  }

  async findByIds(ids: number[]): Promise<Question[]> {
    return this.table.all().filter((q) => ids.includes(q.id));
  }

  async list(filter: QuestionFilter): Promise<Question[]> {
    return this.table
      .all()
      .filter((q) => filter.examTypeId === undefined || q.examTypeId === filter.examTypeId)
      .filter((q) => filter.subjectId === undefined || q.subjectId === filter.subjectId)
      .slice(filter.skip, filter.skip + filter.limit);
  }

  async findByExamTypeAndSubject(examTypeId: number, subjectId: number): Promise<Question[]> {
    return this.table.all().filter((q) => q.examTypeId === examTypeId && q.subjectId === subjectId);
  }

  async save(question: Question): Promise<Question> {
    return this.table.replace(question);
  }

  async delete(id: number): Promise<boolean> {
    return this.table.remove(id);
  }
}

export class InMemoryTestStore implements TestStore {
  readonly table = new Table<Test>();

  /** Attempts whose testId is set to null on delete, as the foreign key does. */
  constructor(private readonly attempts?: InMemoryAttemptStore) {}

  async create(input: TestCreateInput): Promise<Test> {
    return this.table.insert((id) => ({ id, ...input, isActive: true, createdAt: FIXED_DATE }));
  }

  async findById(id: number): Promise<Test | null> {
    return this.table.get(id);
  }

  async findByIds(ids: number[]): Promise<Test[]> {
    return this.table.all().filter((t) => ids.includes(t.id));
  }

  async list(skip: number, limit: number): Promise<Test[]> {
    return this.table.all().slice(skip, skip + limit);
  }

  async listByExamType(examTypeId: number): Promise<Test[]> {
    return this.table.all().filter((t) => t.examTypeId === examTypeId);
  }

  async listBySubject(subjectId: number): Promise<Test[]> {
    return this.table.all().filter((t) => t.subjectId === subjectId);
  }

  async save(test: Test): Promise<Test> {
    return this.table.replace(test);
  }

  async delete(id: number): Promise<boolean> {
    const removed = this.table.remove(id);
    if (removed) {
      this.attempts?.detachTest(id);
    }
    return removed;
  }
}

export class InMemoryAttemptStore implements AttemptStore {
  readonly table = new Table<Attempt>();
  readonly answers = new Table<Answer>();

  async create(input: AttemptStartInput): Promise<InProgressAttempt> {
    return this.table.insert((id): InProgressAttempt => ({ id, ...input, isPractice: false, status: 'in_progress' }));
  }

  async createPractice(input: PracticeAttemptInput): Promise<CompletedAttempt> {
    return this.table.insert(
      (id): CompletedAttempt => ({ id, ...input, testId: null, isPractice: true, status: 'completed' })
    );
  }

  async findById(id: number): Promise<Attempt | null> {
    return this.table.get(id);
  }

  async findByIdForUpdate(id: number): Promise<Attempt | null> {
    return this.table.get(id);
  }

  async complete(id: number, outcome: AttemptOutcome): Promise<CompletedAttempt> {
    const attempt = this.table.get(id);
    if (!attempt || attempt.status !== 'in_progress') {
      throw new Error(`Attempt ${id} is not in progress`);
    }
    const completed: CompletedAttempt = {
      id: attempt.id,
      userId: attempt.userId,
      testId: attempt.testId,
      examTypeId: attempt.examTypeId,
      subjectId: attempt.subjectId,
      isPractice: attempt.isPractice,
      startTime: attempt.startTime,
      ...outcome,
      status: 'completed',
    };
    this.table.replace(completed);
    return completed;
  }

  async addAnswers(attemptId: number, answers: AnswerInput[]): Promise<Answer[]> {
    return answers.map((answer) => this.answers.insert((id) => ({ id, attemptId, ...answer })));
  }

  detachTest(testId: number): void {
    this.table
      .all()
      .filter((a) => a.testId === testId)
      .forEach((a) => this.table.replace({ ...a, testId: null }));
  }

  snapshot(): () => void {
    const restoreAttempts = this.table.snapshot();
    const restoreAnswers = this.answers.snapshot();
    return () => {
      restoreAttempts();
      restoreAnswers();
    };
  }

  async findAnswers(attemptId: number): Promise<Answer[]> {
    return this.answers.all().filter((a) => a.attemptId === attemptId);
  }

  async listByUser(userId: number): Promise<Attempt[]> {
    return this.table
      .all()
      .filter((a) => a.userId === userId)
      .sort((a, b) => b.startTime.getTime() - a.startTime.getTime());
  }

  async listCompleted(filter: CompletedAttemptFilter = {}): Promise<CompletedAttempt[]> {
    return this.table
      .all()
      .filter((a): a is CompletedAttempt => a.status === 'completed')
      .filter((a) => filter.testId === undefined || a.testId === filter.testId)
      .filter((a) => filter.userId === undefined || a.userId === filter.userId);
  }
}

export class InMemoryNewsStore implements NewsStore {
  readonly table = new Table<News>();

  async create(input: NewsCreateInput): Promise<News> {
    return this.table.insert((id) => ({ id, ...input, createdAt: FIXED_DATE, updatedAt: FIXED_DATE }));
  }

  async findById(id: number): Promise<News | null> {
    return this.table.get(id);
  }

  async list(skip: number, limit: number): Promise<News[]> {
    return this.table
      .all()
      .sort((a, b) => b.date.getTime() - a.date.getTime() || b.id - a.id)
      .slice(skip, skip + limit);
  }

  async save(news: News): Promise<News> {
    return this.table.replace(news);
  }

  async delete(id: number): Promise<boolean> {
    return this.table.remove(id);
  }
}

export class InMemoryForumStore implements ForumStore {
  readonly posts = new Table<Omit<ForumPost, 'likes'>>();
  readonly replies = new Table<ForumReply>();
  readonly likes = new Set<string>();
  private clock = FIXED_DATE.getTime();

  private tick(): Date {
    this.clock += 1000;
    return new Date(this.clock);
  }

  private withLikes(post: Omit<ForumPost, 'likes'>): ForumPost {
    return { ...post, likes: [...this.likes].filter((key) => key.startsWith(`${post.id}:`)).length };
  }

  async createPost(input: ForumPostCreateInput): Promise<ForumPost> {
    const now = this.tick();
    return this.withLikes(this.posts.insert((id) => ({ id, ...input, createdAt: now, updatedAt: now })));
  }

  async findPostById(id: number): Promise<ForumPost | null> {
    const post = this.posts.get(id);
    return post ? this.withLikes(post) : null;
  }

  async countPosts(subject: string): Promise<number> {
    return this.posts.all().filter((p) => p.subject === subject).length;
  }

  async listPosts(query: ForumPostQuery): Promise<ForumPost[]> {
    const byNewest = (a: ForumPost, b: ForumPost) => b.createdAt.getTime() - a.createdAt.getTime();
    return this.posts
      .all()
      .filter((p) => p.subject === query.subject)
      .map((p) => this.withLikes(p))
      .sort(query.sort === 'popular' ? (a, b) => b.likes - a.likes || byNewest(a, b) : byNewest)
      .slice(query.offset, query.offset + query.limit);
  }

  async hasLike(postId: number, userId: number): Promise<boolean> {
    return this.likes.has(`${postId}:${userId}`);
  }

  async addLike(postId: number, userId: number): Promise<void> {
    this.likes.add(`${postId}:${userId}`);
  }

  async removeLike(postId: number, userId: number): Promise<void> {
    this.likes.delete(`${postId}:${userId}`);
  }

  async countLikes(postId: number): Promise<number> {
    return [...this.likes].filter((key) => key.startsWith(`${postId}:`)).length;
  }

  async createReply(input: ForumReplyCreateInput): Promise<ForumReply> {
    const now = this.tick();
    return this.replies.insert((id) => ({ id, ...input, createdAt: now, updatedAt: now }));
  }

  async listReplies(postIds: number[]): Promise<ForumReply[]> {
    return this.replies.all().filter((r) => postIds.includes(r.postId));
  }
}

export function buildUser(overrides: Partial<User> = {}): User {
  return {
    id: 1,
    username: 'student1',
    email: 'student1@example.com',
    hashedPassword: 'hashed',
    fullName: 'Student One',
    role: 'student',
    isActive: true,
    createdAt: FIXED_DATE,
    ...overrides,
  };
}
