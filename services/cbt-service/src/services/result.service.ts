/**
 * Result Service - graded results and per-test analytics over completed attempts
 */

import { InvalidStateError, NotFoundError } from '@cbt/shared';
import { AttemptStore } from '../models/attempt.model';
import { QuestionStore } from '../models/question.model';
import { TestStore } from '../models/test.model';
import { User } from '../models/user.model';
import { assertSelfOrStaff } from '../utils/access';
import { AttemptResult, buildAttemptResult } from '../utils/attemptResult';
import { summarizeTestAttempts, TestAnalytics } from '../utils/analytics';
import { AttemptDescriber } from './attemptDescriber';

export interface ResultSummary {
  attemptId: number;
  testTitle: string;
  score: number;
  percentage: number;
  passed: boolean;
  completedAt: Date;
}

export class ResultService {
  constructor(
    private attempts: AttemptStore,
    private tests: TestStore,
    private questions: QuestionStore,
    private describer: AttemptDescriber
  ) {}

  async getAttemptResult(actor: User, attemptId: number): Promise<AttemptResult> {
    const attempt = await this.attempts.findById(attemptId);
    if (!attempt) {
      throw new NotFoundError('Attempt not found');
    }
    assertSelfOrStaff(attempt.userId, actor);
    if (attempt.status !== 'completed') {
      throw new InvalidStateError('Attempt not completed yet');
    }

    const answers = await this.attempts.findAnswers(attempt.id);
    const questionIds = answers.map((answer) => answer.questionId).filter((id): id is number => id !== null);
    const questions = await this.questions.findByIds([...new Set(questionIds)]);
    const { test } = await this.describer.describeOne(attempt);

    return buildAttemptResult(
      attempt,
      test,
      answers,
      new Map(questions.map((question) => [question.id, question]))
    );
  }

  /** Completed attempts of a user, most recent first. */
  async getUserResults(actor: User, userId: number): Promise<ResultSummary[]> {
    assertSelfOrStaff(userId, actor);
    const described = await this.describer.describe(await this.attempts.listCompleted({ userId }));

    return described
      .map(({ attempt, test }) => ({
        attemptId: attempt.id,
        testTitle: test.title,
        score: attempt.score,
        percentage: attempt.percentage,
        passed: attempt.passed,
        completedAt: attempt.endTime,
      }))
      .sort((a, b) => b.completedAt.getTime() - a.completedAt.getTime());
  }

  async getTestAnalytics(testId: number): Promise<TestAnalytics> {
    if (!(await this.tests.findById(testId))) {
      throw new NotFoundError('Test not found');
    }
    return summarizeTestAttempts(testId, await this.attempts.listCompleted({ testId }));
  }
}
