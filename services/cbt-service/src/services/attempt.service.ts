/**
 * Attempt Service - attempt lifecycle, grading and leaderboard
 *
 * in_progress -> completed is the only transition. Submission locks the attempt
 * row, grades, writes answers and stamps the outcome in one transaction, so a
 * second submit (concurrent or later) sees `completed` and is rejected.
 */

import { differenceInSeconds, subSeconds } from 'date-fns';
import { InvalidStateError, NotFoundError, TransactionRunner } from '@cbt/shared';
import logger from '@cbt/shared/config/logger';
import {
  AnswerInput,
  Attempt,
  AttemptStore,
  CompletedAttempt,
  InProgressAttempt,
} from '../models/attempt.model';
import { ExamTypeStore } from '../models/examType.model';
import { Question, QuestionStore } from '../models/question.model';
import { SubjectStore } from '../models/subject.model';
import { TestStore } from '../models/test.model';
import { User, UserStore } from '../models/user.model';
import { assertSelfOrAdmin, assertSelfOrStaff } from '../utils/access';
import { AttemptResult, buildAttemptResult, describeTest } from '../utils/attemptResult';
import { aggregatePracticeScore, aggregateTestScore, isCorrectAnswer } from '../utils/grading';
import { rankByAveragePercentage } from '../utils/leaderboard';
import { AttemptDescriber, DescribedAttempt } from './attemptDescriber';
import { Clock } from './credential.service';

export interface SubmittedAnswer {
  questionId: number;
  answerText: string;
  timeSpent: number | null;
}

export interface PracticeAnswer extends SubmittedAnswer {
  isCorrect: boolean;
}

export interface PracticeSubmission {
  examTypeId: number;
  subjectId: number;
  score: number;
  totalQuestions: number;
  /** Seconds the session took. */
  timeSpent: number;
  answers: PracticeAnswer[];
}

export interface LeaderboardEntry {
  rank: number;
  userId: number;
  username: string;
  fullName: string | null;
  averagePercentage: number;
  attemptCount: number;
  latestTitle: string;
}

function indexById(questions: Question[]): Map<number, Question> {
  return new Map(questions.map((question) => [question.id, question]));
}

export class AttemptService {
  constructor(
    private attempts: AttemptStore,
    private tests: TestStore,
    private questions: QuestionStore,
    private examTypes: ExamTypeStore,
    private subjects: SubjectStore,
    private users: UserStore,
    private describer: AttemptDescriber,
    private runInTransaction: TransactionRunner,
    private clock: Clock = () => new Date()
  ) {}

  /**
   * `userId` lets an admin open an attempt for someone else; everyone else may only start their own.
   */
  async start(actor: User, testId: number, userId: number = actor.id): Promise<DescribedAttempt<InProgressAttempt>> {
    assertSelfOrAdmin(userId, actor);

    const test = await this.tests.findById(testId);
    if (!test) {
      throw new NotFoundError('Test not found');
    }

    const attempt = await this.attempts.create({
      userId,
      testId: test.id,
      examTypeId: test.examTypeId,
      subjectId: test.subjectId,
      startTime: this.clock(),
    });
    logger.info('Attempt started', { attemptId: attempt.id, userId, testId });
    return { attempt, test: describeTest(test) };
  }

  /**
   * Answers whose question no longer exists are skipped, not rejected. Only the
   * first answer to each question is graded.
   */
  async submit(actor: User, attemptId: number, answers: SubmittedAnswer[]): Promise<AttemptResult> {
    const result = await this.runInTransaction(async (db) => {
      const attempt = await this.attempts.findByIdForUpdate(attemptId, db);
      if (!attempt) {
        throw new NotFoundError('Attempt not found');
      }
      assertSelfOrAdmin(attempt.userId, actor);
      if (attempt.status !== 'in_progress') {
        throw new InvalidStateError('Attempt already completed');
      }
      // testId is nulled when the test is deleted
      const test = attempt.testId === null ? null : await this.tests.findById(attempt.testId);
      if (!test) {
        throw new NotFoundError('Test not found');
      }

      const questionsById = indexById(
        await this.questions.findByIds([...new Set(answers.map((a) => a.questionId))], db)
      );

      const graded: AnswerInput[] = [];
      const seen = new Set<number>();
      for (const answer of answers) {
        const question = questionsById.get(answer.questionId);
        if (!question || seen.has(question.id)) {
          continue;
        }
        seen.add(question.id);
        const correct = isCorrectAnswer(answer.answerText, question.correctAnswer);
        graded.push({
          questionId: question.id,
          answerText: answer.answerText,
          isCorrect: correct,
          marksObtained: correct ? 1 : 0,
          timeSpent: answer.timeSpent,
        });
      }

      const saved = await this.attempts.addAnswers(attempt.id, graded, db);
      const score = saved.reduce((total, answer) => total + answer.marksObtained, 0);
      const endTime = this.clock();

      const completed = await this.attempts.complete(
        attempt.id,
        {
          ...aggregateTestScore(score, test.totalMarks, test.passingMarks),
          endTime,
          timeTaken: Math.max(0, differenceInSeconds(endTime, attempt.startTime)),
        },
        db
      );

      return buildAttemptResult(completed, describeTest(test), saved, questionsById);
    });

    logger.info('Attempt submitted', {
      attemptId,
      score: result.score,
      percentage: result.percentage,
      skipped: answers.length - result.totalQuestions,
    });
    return result;
  }

  /**
   * Self-graded practice session, stored directly as completed.
   */
  async savePractice(actor: User, submission: PracticeSubmission): Promise<DescribedAttempt<CompletedAttempt>> {
    if (!(await this.examTypes.findById(submission.examTypeId))) {
      throw new NotFoundError('Exam type not found');
    }
    if (!(await this.subjects.findById(submission.subjectId))) {
      throw new NotFoundError('Subject not found');
    }

    const endTime = this.clock();
    const aggregate = aggregatePracticeScore(submission.score, submission.totalQuestions);

    const attempt = await this.runInTransaction(async (db) => {
      const created = await this.attempts.createPractice(
        {
          userId: actor.id,
          examTypeId: submission.examTypeId,
          subjectId: submission.subjectId,
          startTime: subSeconds(endTime, submission.timeSpent),
          endTime,
          timeTaken: submission.timeSpent,
          ...aggregate,
        },
        db
      );

      const existing = indexById(
        await this.questions.findByIds([...new Set(submission.answers.map((a) => a.questionId))], db)
      );
      const answers: AnswerInput[] = submission.answers
        .filter((answer) => existing.has(answer.questionId))
        .map((answer) => ({
          questionId: answer.questionId,
          answerText: answer.answerText,
          isCorrect: answer.isCorrect,
          marksObtained: answer.isCorrect ? 1 : 0,
          timeSpent: answer.timeSpent,
        }));
      await this.attempts.addAnswers(created.id, answers, db);
      return created;
    });

    logger.info('Practice attempt saved', { attemptId: attempt.id, userId: actor.id, percentage: attempt.percentage });
    return this.describer.describeOne(attempt);
  }

  async getAttempt(actor: User, attemptId: number): Promise<DescribedAttempt> {
    const attempt = await this.attempts.findById(attemptId);
    if (!attempt) {
      throw new NotFoundError('Attempt not found');
    }
    assertSelfOrStaff(attempt.userId, actor);
    return this.describer.describeOne(attempt);
  }

  /** Every attempt of the user, in progress ones included. */
  async getUserAttempts(actor: User, userId: number): Promise<DescribedAttempt[]> {
    assertSelfOrStaff(userId, actor);
    return this.describer.describe(await this.attempts.listByUser(userId));
  }

  /** Completed attempts only; staff view of a student's history. */
  async getStudentAttempts(studentId: number): Promise<DescribedAttempt[]> {
    const attempts: Attempt[] = (await this.attempts.listByUser(studentId)).filter(
      (attempt) => attempt.status === 'completed'
    );
    return this.describer.describe(attempts);
  }

  async getLeaderboard(): Promise<LeaderboardEntry[]> {
    const described = await this.describer.describe(await this.attempts.listCompleted());
    const standings = rankByAveragePercentage(
      described.map(({ attempt, test }) => ({
        userId: attempt.userId,
        percentage: attempt.percentage,
        endTime: attempt.endTime,
        title: test.title,
      }))
    );

    const users = new Map(
      (await this.users.findByIds(standings.map((s) => s.userId))).map((user) => [user.id, user])
    );

    return standings.map((standing) => {
      const user = users.get(standing.userId);
      return {
        ...standing,
        username: user?.username ?? 'unknown',
        fullName: user?.fullName ?? null,
      };
    });
  }
}
