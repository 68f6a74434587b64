import { ForbiddenError, InvalidStateError, NotFoundError } from '@cbt/shared';
import type { TransactionRunner } from '@cbt/shared';
import { AttemptService } from '../attempt.service';
import { AttemptDescriber } from '../attemptDescriber';
import type { User } from '../../models/user.model';
import {
  InMemoryAttemptStore,
  InMemoryExamTypeStore,
  InMemoryQuestionStore,
  InMemorySubjectStore,
  InMemoryTestStore,
  InMemoryUserStore,
  createSerialRunner,
  runInline,
} from '../../__tests__/support/inMemoryStores';

describe('AttemptService', () => {
  let attempts: InMemoryAttemptStore;
  let tests: InMemoryTestStore;
  let questions: InMemoryQuestionStore;
  let users: InMemoryUserStore;
  let examTypes: InMemoryExamTypeStore;
  let subjects: InMemorySubjectStore;
  let service: AttemptService;
  let now: Date;
  let student: User;
  let otherStudent: User;

  const advance = (seconds: number) => {
    now = new Date(now.getTime() + seconds * 1000);
  };

  const buildService = (runner: TransactionRunner) =>
    new AttemptService(
      attempts,
      tests,
      questions,
      examTypes,
      subjects,
      users,
      new AttemptDescriber(tests, subjects),
      runner,
      () => now
    );

  beforeEach(async () => {
    attempts = new InMemoryAttemptStore();
    tests = new InMemoryTestStore(attempts);
    questions = new InMemoryQuestionStore();
    users = new InMemoryUserStore();
    examTypes = new InMemoryExamTypeStore();
    subjects = new InMemorySubjectStore();
    now = new Date('2024-03-01T10:00:00.000Z');

    await examTypes.create({ name: 'WAEC', description: null });
    await subjects.create({ name: 'Mathematics', description: null });
    student = await users.create({
      username: 'student1',
      email: 'student1@example.com',
      hashedPassword: 'hashed',
      fullName: 'Student One',
      role: 'student',
    });
    otherStudent = await users.create({
      username: 'student2',
      email: 'student2@example.com',
      hashedPassword: 'hashed',
      fullName: null,
      role: 'student',
    });

    for (const [questionText, correctAnswer] of [
      ['2 + 2 = ?', 'B'],
      ['Capital of France?', 'Paris'],
      ['Square root of 16?', '4'],
    ]) {
      await questions.create({
        examTypeId: 1,
        subjectId: 1,
        questionText,
        questionType: 'multiple_choice',
        options: null,
        correctAnswer,
        explanation: null,
      });
    }

    await tests.create({
      title: 'WAEC Mathematics Test',
      examTypeId: 1,
      subjectId: 1,
      durationMinutes: 30,
      questionCount: 3,
      totalMarks: 3,
      passingMarks: 1,
      createdBy: student.id,
    });

    service = buildService(runInline);
  });

  describe('start', () => {
    it('opens an in-progress attempt copying the test keys', async () => {
      const { attempt, test } = await service.start(student, 1);

      expect(attempt).toEqual({
        id: 1,
        userId: student.id,
        testId: 1,
        examTypeId: 1,
        subjectId: 1,
        isPractice: false,
        startTime: new Date('2024-03-01T10:00:00.000Z'),
        status: 'in_progress',
      });
      expect(test.title).toBe('WAEC Mathematics Test');
    });

    it('rejects a missing test', async () => {
      await expect(service.start(student, 42)).rejects.toThrow(NotFoundError);
    });

    it('does not let a student start an attempt for someone else', async () => {
      await expect(service.start(student, 1, otherStudent.id)).rejects.toThrow(ForbiddenError);
    });

    it('allows several in-progress attempts on the same test', async () => {
      await service.start(student, 1);
      await service.start(student, 1);

      const mine = await attempts.listByUser(student.id);
      expect(mine.map((a) => a.status)).toEqual(['in_progress', 'in_progress']);
    });
  });

  describe('submit', () => {
    it('grades trimmed, case-insensitive answers and completes the attempt', async () => {
      const { attempt } = await service.start(student, 1);
      advance(95);

      const result = await service.submit(student, attempt.id, [
        { questionId: 1, answerText: ' b ', timeSpent: 30 },
        { questionId: 2, answerText: 'paris', timeSpent: 40 },
        { questionId: 3, answerText: '5', timeSpent: null },
      ]);

      expect(result.totalQuestions).toBe(3);
      expect(result.correctAnswers).toBe(2);
      expect(result.score).toBe(2);
      expect(result.percentage).toBe((2 / 3) * 100);
      expect(result.passed).toBe(true);
      expect(result.timeTaken).toBe(95);
      expect(result.testTitle).toBe('WAEC Mathematics Test');
      expect(result.answers[0]).toEqual({
        questionId: 1,
        questionText: '2 + 2 = ?',
        userAnswer: ' b ',
        correctAnswer: 'B',
        isCorrect: true,
        marksObtained: 1,
        totalMarks: 1,
        explanation: null,
        explanationImage: null,
      });

      const stored = await attempts.findById(attempt.id);
      expect(stored?.status).toBe('completed');
    });

    it('skips answers whose question no longer exists', async () => {
      const { attempt } = await service.start(student, 1);

      const result = await service.submit(student, attempt.id, [
        { questionId: 1, answerText: 'B', timeSpent: null },
        { questionId: 99, answerText: 'A', timeSpent: null },
      ]);

      expect(result.totalQuestions).toBe(1);
      expect(result.score).toBe(1);
      expect(await attempts.findAnswers(attempt.id)).toHaveLength(1);
    });

    it('rejects a second submission', async () => {
      const { attempt } = await service.start(student, 1);
      await service.submit(student, attempt.id, [{ questionId: 1, answerText: 'B', timeSpent: null }]);

      await expect(
        service.submit(student, attempt.id, [{ questionId: 2, answerText: 'Paris', timeSpent: null }])
      ).rejects.toThrow(new InvalidStateError('Attempt already completed'));
      expect(await attempts.findAnswers(attempt.id)).toHaveLength(1);
    });

    it('reports 0 percent when the test has no marks', async () => {
      await tests.create({
        title: 'Empty',
        examTypeId: 1,
        subjectId: 1,
        durationMinutes: 10,
        questionCount: 0,
        totalMarks: 0,
        passingMarks: 0,
        createdBy: student.id,
      });
      const { attempt } = await service.start(student, 2);

      const result = await service.submit(student, attempt.id, [{ questionId: 1, answerText: 'B', timeSpent: null }]);

      expect(result.score).toBe(1);
      expect(result.percentage).toBe(0);
      expect(result.passed).toBe(true);
    });

    it('rejects an unknown attempt', async () => {
      await expect(service.submit(student, 7, [])).rejects.toThrow(new NotFoundError('Attempt not found'));
    });

    it('grades only the first answer to a repeated question', async () => {
      const { attempt } = await service.start(student, 1);

      const result = await service.submit(student, attempt.id, [
        { questionId: 1, answerText: 'B', timeSpent: null },
        { questionId: 1, answerText: 'A', timeSpent: null },
        { questionId: 1, answerText: 'B', timeSpent: null },
        { questionId: 2, answerText: 'Paris', timeSpent: null },
      ]);

      expect(result.totalQuestions).toBe(2);
      expect(result.correctAnswers).toBe(2);
      expect(result.score).toBe(2);
      expect(result.percentage).toBe((2 / 3) * 100);
      expect(await attempts.findAnswers(attempt.id)).toHaveLength(2);
    });

    it('reports a missing test when the test was deleted after the attempt started', async () => {
      const { attempt } = await service.start(student, 1);
      await tests.delete(1);

      expect((await attempts.findById(attempt.id))?.testId).toBeNull();
      await expect(
        service.submit(student, attempt.id, [{ questionId: 1, answerText: 'B', timeSpent: null }])
      ).rejects.toThrow(new NotFoundError('Test not found'));
      expect(await attempts.findAnswers(attempt.id)).toHaveLength(0);
    });

    describe('in serialized transactions', () => {
      beforeEach(() => {
        service = buildService(createSerialRunner(attempts));
      });

      it('completes an attempt once when two submissions race', async () => {
        const { attempt } = await service.start(student, 1);

        const [first, second] = await Promise.allSettled([
          service.submit(student, attempt.id, [{ questionId: 1, answerText: 'B', timeSpent: null }]),
          service.submit(student, attempt.id, [{ questionId: 2, answerText: 'Paris', timeSpent: null }]),
        ]);

        expect(first.status).toBe('fulfilled');
        expect(second).toEqual({ status: 'rejected', reason: new InvalidStateError('Attempt already completed') });
        const answers = await attempts.findAnswers(attempt.id);
        expect(answers.map((a) => a.questionId)).toEqual([1]);
      });

      it('discards stored answers when completing the attempt fails', async () => {
        const { attempt } = await service.start(student, 1);
        jest.spyOn(attempts, 'complete').mockRejectedValueOnce(new Error('connection lost'));

        await expect(
          service.submit(student, attempt.id, [{ questionId: 1, answerText: 'B', timeSpent: null }])
        ).rejects.toThrow('connection lost');
        expect(await attempts.findAnswers(attempt.id)).toHaveLength(0);
        expect((await attempts.findById(attempt.id))?.status).toBe('in_progress');

        const result = await service.submit(student, attempt.id, [{ questionId: 1, answerText: 'B', timeSpent: null }]);
        expect(result.score).toBe(1);
      });
    });
  });

  describe('savePractice', () => {
    it('stores a completed practice attempt from client grading', async () => {
      const saved = await service.savePractice(student, {
        examTypeId: 1,
        subjectId: 1,
        score: 3,
        totalQuestions: 4,
        timeSpent: 120,
        answers: [
          { questionId: 1, answerText: 'B', isCorrect: true, timeSpent: null },
          { questionId: 99, answerText: 'C', isCorrect: false, timeSpent: null },
        ],
      });

      expect(saved.attempt.isPractice).toBe(true);
      expect(saved.attempt.testId).toBeNull();
      expect(saved.attempt.percentage).toBe(75);
      expect(saved.attempt.passed).toBe(true);
      expect(saved.attempt.startTime).toEqual(new Date('2024-03-01T09:58:00.000Z'));
      expect(saved.attempt.timeTaken).toBe(120);
      expect(saved.test).toEqual({
        id: null,
        title: 'Mathematics Practice',
        totalMarks: 4,
        passingMarks: 50,
        durationMinutes: null,
      });
      expect(await attempts.findAnswers(saved.attempt.id)).toHaveLength(1);
    });

    it('fails below 50 percent', async () => {
      const saved = await service.savePractice(student, {
        examTypeId: 1,
        subjectId: 1,
        score: 1,
        totalQuestions: 4,
        timeSpent: 10,
        answers: [],
      });

      expect(saved.attempt.percentage).toBe(25);
      expect(saved.attempt.passed).toBe(false);
    });
  });

  describe('reads', () => {
    it('labels attempts of a deleted test', async () => {
      const { attempt } = await service.start(student, 1);
      await tests.delete(1);

      const described = await service.getAttempt(student, attempt.id);

      expect(described.attempt.testId).toBeNull();
      expect(described.test).toEqual({
        id: null,
        title: 'Deleted Test',
        totalMarks: 0,
        passingMarks: 0,
        durationMinutes: null,
      });
    });

    it('hides other students attempts', async () => {
      const { attempt } = await service.start(student, 1);
      await expect(service.getAttempt(otherStudent, attempt.id)).rejects.toThrow(ForbiddenError);
    });

    it('returns only completed attempts in the student view', async () => {
      const { attempt } = await service.start(student, 1);
      await service.start(student, 1);
      await service.submit(student, attempt.id, []);

      const history = await service.getStudentAttempts(student.id);

      expect(history.map((d) => d.attempt.id)).toEqual([attempt.id]);
    });
  });

  describe('getLeaderboard', () => {
    it('ranks users by mean percentage across their completed attempts', async () => {
      const practice = (score: number) => ({
        examTypeId: 1,
        subjectId: 1,
        score,
        totalQuestions: 10,
        timeSpent: 60,
        answers: [],
      });
      await service.savePractice(student, practice(8));
      await service.savePractice(otherStudent, practice(7));
      advance(60);
      await service.savePractice(student, practice(9));

      const board = await service.getLeaderboard();

      expect(board).toHaveLength(2);
      expect(board[0]).toMatchObject({
        rank: 1,
        userId: student.id,
        username: 'student1',
        fullName: 'Student One',
        attemptCount: 2,
        latestTitle: 'Mathematics Practice',
      });
      expect(board[0].averagePercentage).toBeCloseTo(85);
      expect(board[1]).toMatchObject({ rank: 2, userId: otherStudent.id, username: 'student2', fullName: null, attemptCount: 1 });
      expect(board[1].averagePercentage).toBeCloseTo(70);
    });
  });
});
