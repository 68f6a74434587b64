import express, { Request, RequestHandler, Response } from 'express';
import { createTestRoutes } from '../test.routes';
import { TestController } from '../../controllers/test.controller';
import type { AuthMiddleware } from '../../middlewares/authMiddleware';
import { TestService } from '../../services/test.service';
import {
  InMemoryExamTypeStore,
  InMemoryQuestionStore,
  InMemorySubjectStore,
  InMemoryTestStore,
} from '../../__tests__/support/inMemoryStores';

/** Each guard stops the chain with its own name so the test sees which one ran. */
const stopWith =
  (name: string): RequestHandler =>
  (_req, _res, next) =>
    next(new Error(name));

const auth: AuthMiddleware = {
  requireAuth: stopWith('requireAuth'),
  requireAdmin: stopWith('requireAdmin'),
  requireStaff: stopWith('requireStaff'),
};

function guardFor(method: string, url: string): Promise<unknown> {
  const controller = new TestController(
    new TestService(
      new InMemoryTestStore(),
      new InMemoryExamTypeStore(),
      new InMemorySubjectStore(),
      new InMemoryQuestionStore()
    )
  );
  const router = createTestRoutes(controller, auth);
  const req: Request = Object.create(express.request);
  req.method = method;
  req.url = url;
  req.headers = {};
  const res: Response = Object.create(express.response);
  return new Promise((resolve) =>
    router(req, res, (err?: unknown) => resolve(err instanceof Error ? err.message : err))
  );
}

describe('test routes', () => {
  it.each([
    ['POST', '/'],
    ['PUT', '/1'],
    ['DELETE', '/1'],
  ])('lets teachers and admins %s %s', async (method, url) => {
    expect(await guardFor(method, url)).toBe('requireStaff');
  });

  it.each([
    ['GET', '/'],
    ['GET', '/1'],
    ['GET', '/1/with-questions'],
    ['GET', '/subject/1'],
  ])('lets any signed-in user %s %s', async (method, url) => {
    expect(await guardFor(method, url)).toBe('requireAuth');
  });
});
