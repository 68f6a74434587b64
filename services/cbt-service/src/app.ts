/**
 * CBT Service Application
 * Wires repositories, services and controllers into the Express app
 */

import express from 'express';
import timeout from 'connect-timeout';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import type { Express } from 'express';
import {
  correlationIdMiddleware,
  createHealthCheckEndpoints,
  globalErrorHandler,
  requestLogger,
} from '@cbt/shared';
import type { CbtConfig } from './config';
import type { Database } from './config/database';
import { UserRepository } from './models/user.model';
import { ExamTypeRepository } from './models/examType.model';
import { SubjectRepository } from './models/subject.model';
import { QuestionRepository } from './models/question.model';
import { TestRepository } from './models/test.model';
import { AttemptRepository } from './models/attempt.model';
import { NewsRepository } from './models/news.model';
import { ForumRepository } from './models/forum.model';
import { CredentialService } from './services/credential.service';
import { UserService } from './services/user.service';
import { ExamTypeService } from './services/examType.service';
import { SubjectService } from './services/subject.service';
import { UploadService } from './services/upload.service';
import { QuestionService } from './services/question.service';
import { TestService } from './services/test.service';
import { AttemptDescriber } from './services/attemptDescriber';
import { AttemptService } from './services/attempt.service';
import { ResultService } from './services/result.service';
import { NewsService } from './services/news.service';
import { ForumService } from './services/forum.service';
import { UserController } from './controllers/user.controller';
import { CatalogController } from './controllers/catalog.controller';
import { QuestionController } from './controllers/question.controller';
import { TestController } from './controllers/test.controller';
import { AttemptController } from './controllers/attempt.controller';
import { ResultController } from './controllers/result.controller';
import { NewsController } from './controllers/news.controller';
import { ForumController } from './controllers/forum.controller';
import { createAuthMiddleware } from './middlewares/authMiddleware';
import { createUploadMiddleware } from './middlewares/upload';
import { createUserRoutes } from './routes/user.routes';
import { createCatalogRoutes } from './routes/catalog.routes';
import { createQuestionRoutes } from './routes/question.routes';
import { createTestRoutes } from './routes/test.routes';
import { createAttemptRoutes } from './routes/attempt.routes';
import { createResultRoutes } from './routes/result.routes';
import { createNewsRoutes } from './routes/news.routes';
import { createForumRoutes } from './routes/forum.routes';

export interface CbtServices {
  users: UserService;
  examTypes: ExamTypeService;
  subjects: SubjectService;
  questions: QuestionService;
  tests: TestService;
  attempts: AttemptService;
  results: ResultService;
  news: NewsService;
  forum: ForumService;
  uploads: UploadService;
}

export function createServices(config: CbtConfig, database: Database): CbtServices {
  const { pool, runInTransaction } = database;

  const userRepository = new UserRepository(pool);
  const examTypeRepository = new ExamTypeRepository(pool);
  const subjectRepository = new SubjectRepository(pool);
  const questionRepository = new QuestionRepository(pool);
  const testRepository = new TestRepository(pool);
  const attemptRepository = new AttemptRepository(pool);

  const uploads = new UploadService(config.uploads);
  const describer = new AttemptDescriber(testRepository, subjectRepository);

  return {
    users: new UserService(userRepository, new CredentialService(config.auth)),
    examTypes: new ExamTypeService(examTypeRepository),
    subjects: new SubjectService(subjectRepository),
    questions: new QuestionService(questionRepository, examTypeRepository, subjectRepository, uploads, runInTransaction),
    tests: new TestService(testRepository, examTypeRepository, subjectRepository, questionRepository),
    attempts: new AttemptService(
      attemptRepository,
      testRepository,
      questionRepository,
      examTypeRepository,
      subjectRepository,
      userRepository,
      describer,
      runInTransaction
    ),
    results: new ResultService(attemptRepository, testRepository, questionRepository, describer),
    news: new NewsService(new NewsRepository(pool)),
    forum: new ForumService(new ForumRepository(pool), userRepository, uploads),
    uploads,
  };
}

export function createApp(config: CbtConfig, database: Database, services: CbtServices = createServices(config, database)): Express {
  const app: Express = express();

  // Security & performance middlewares
  app.use(helmet({ crossOriginResourcePolicy: { policy: 'cross-origin' } }));
  app.use(compression());
  app.use(
    cors({
      origin: config.corsOrigin.includes('*') ? true : config.corsOrigin,
      credentials: true,
    })
  );
  app.use(correlationIdMiddleware);

  // Request timeout middleware (30 seconds)
  app.use(timeout('30s'));

  // Timeout handler - must be after timeout middleware
  app.use((req, _res, next) => {
    if (!req.timedout) next();
  });

  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true }));
  app.use(requestLogger);

  // Health check endpoints with dependency checks
  const { healthHandler, readyHandler } = createHealthCheckEndpoints({
    serviceName: config.serviceName,
    postgresPool: database.pool,
  });
  app.get('/health', healthHandler);
  app.get('/ready', readyHandler);

  // Uploaded images, served from the paths stored on questions and forum posts
  for (const kind of ['question', 'explanation', 'forum'] as const) {
    const dir = services.uploads.directoryFor(kind);
    app.use(`/${dir}`, express.static(dir));
  }

  const auth = createAuthMiddleware(services.users);
  const upload = createUploadMiddleware(config.uploads);
  const api = express.Router();

  api.use('/users', createUserRoutes(new UserController(services.users), auth, upload));
  api.use('/exam-types', createCatalogRoutes(new CatalogController(services.examTypes, 'Exam type'), auth));
  api.use('/subjects', createCatalogRoutes(new CatalogController(services.subjects, 'Subject'), auth));
  api.use('/questions', createQuestionRoutes(new QuestionController(services.questions), auth, upload));
  api.use('/tests', createTestRoutes(new TestController(services.tests), auth));
  api.use('/attempts', createAttemptRoutes(new AttemptController(services.attempts), auth));
  api.use('/results', createResultRoutes(new ResultController(services.results), auth));
  api.use('/news', createNewsRoutes(new NewsController(services.news), auth));
  api.use('/forum', createForumRoutes(new ForumController(services.forum), auth, upload));

  app.use(config.apiPrefix, api);

  app.use(globalErrorHandler);

  return app;
}
