import { ForbiddenError, InvalidStateError, NotFoundError } from '@cbt/shared';
import { ResultService } from '../result.service';
import { AttemptDescriber } from '../attemptDescriber';
import type { CompletedAttempt } from '../../models/attempt.model';
import {
  InMemoryAttemptStore,
  InMemoryQuestionStore,
  InMemorySubjectStore,
  InMemoryTestStore,
  buildUser,
} from '../../__tests__/support/inMemoryStores';

describe('ResultService', () => {
  let attempts: InMemoryAttemptStore;
  let tests: InMemoryTestStore;
  let questions: InMemoryQuestionStore;
  let service: ResultService;

  const student = buildUser({ id: 1 });
  const otherStudent = buildUser({ id: 2, username: 'student2', email: 'student2@example.com' });
  const teacher = buildUser({ id: 3, username: 'teacher', email: 'teacher@example.com', role: 'teacher' });

  const finish = async (userId: number, score: number, endTime: string): Promise<CompletedAttempt> => {
    const attempt = await attempts.create({
      userId,
      testId: 1,
      examTypeId: 1,
      subjectId: 1,
      startTime: new Date('2024-03-01T09:00:00.000Z'),
    });
    return attempts.complete(attempt.id, {
      endTime: new Date(endTime),
      score,
      percentage: (score / 4) * 100,
      passed: score >= 2,
      timeTaken: 300,
    });
  };

  beforeEach(async () => {
    attempts = new InMemoryAttemptStore();
    tests = new InMemoryTestStore(attempts);
    questions = new InMemoryQuestionStore();
    const subjects = new InMemorySubjectStore();
    await subjects.create({ name: 'Biology', description: null });
    await tests.create({
      title: 'NECO Biology Test',
      examTypeId: 1,
      subjectId: 1,
      durationMinutes: 20,
      questionCount: 4,
      totalMarks: 4,
      passingMarks: 2,
      createdBy: 3,
    });
    for (const [questionText, correctAnswer] of [
      ['Powerhouse of the cell?', 'Mitochondria'],
      ['Basic unit of life?', 'Cell'],
    ]) {
      await questions.create({
        examTypeId: 1,
        subjectId: 1,
        questionText,
        questionType: 'short_answer',
        options: null,
        correctAnswer,
        explanation: 'See chapter 1',
      });
    }
    service = new ResultService(attempts, tests, questions, new AttemptDescriber(tests, subjects));
  });

  describe('getAttemptResult', () => {
    it('builds the graded breakdown and marks deleted questions', async () => {
      const attempt = await finish(student.id, 1, '2024-03-01T09:05:00.000Z');
      await attempts.addAnswers(attempt.id, [
        { questionId: 1, answerText: 'mitochondria', isCorrect: true, marksObtained: 1, timeSpent: 20 },
        { questionId: 2, answerText: 'Atom', isCorrect: false, marksObtained: 0, timeSpent: 15 },
      ]);
      await questions.delete(2);

      const result = await service.getAttemptResult(student, attempt.id);

      expect(result.testTitle).toBe('NECO Biology Test');
      expect(result.totalQuestions).toBe(2);
      expect(result.correctAnswers).toBe(1);
      expect(result.percentage).toBe(25);
      expect(result.answers[1]).toEqual({
        questionId: 2,
        questionText: '[deleted question]',
        userAnswer: 'Atom',
        correctAnswer: '',
        isCorrect: false,
        marksObtained: 0,
        totalMarks: 1,
        explanation: null,
        explanationImage: null,
      });
    });

    it('refuses an attempt still in progress', async () => {
      const attempt = await attempts.create({
        userId: student.id,
        testId: 1,
        examTypeId: 1,
        subjectId: 1,
        startTime: new Date('2024-03-01T09:00:00.000Z'),
      });

      await expect(service.getAttemptResult(student, attempt.id)).rejects.toThrow(
        new InvalidStateError('Attempt not completed yet')
      );
    });

    it('lets staff read any result but not other students', async () => {
      const attempt = await finish(student.id, 3, '2024-03-01T09:05:00.000Z');

      await expect(service.getAttemptResult(teacher, attempt.id)).resolves.toMatchObject({ score: 3 });
      await expect(service.getAttemptResult(otherStudent, attempt.id)).rejects.toThrow(ForbiddenError);
    });

    it('reports a missing attempt', async () => {
      await expect(service.getAttemptResult(student, 40)).rejects.toThrow(new NotFoundError('Attempt not found'));
    });
  });

  it('lists a user results most recent first', async () => {
    const early = await finish(student.id, 1, '2024-03-01T09:05:00.000Z');
    const late = await finish(student.id, 4, '2024-03-02T09:05:00.000Z');
    await finish(otherStudent.id, 2, '2024-03-03T09:05:00.000Z');

    const results = await service.getUserResults(student, student.id);

    expect(results).toEqual([
      {
        attemptId: late.id,
        testTitle: 'NECO Biology Test',
        score: 4,
        percentage: 100,
        passed: true,
        completedAt: new Date('2024-03-02T09:05:00.000Z'),
      },
      {
        attemptId: early.id,
        testTitle: 'NECO Biology Test',
        score: 1,
        percentage: 25,
        passed: false,
        completedAt: new Date('2024-03-01T09:05:00.000Z'),
      },
    ]);
  });

  describe('getTestAnalytics', () => {
    it('has no data before anyone finishes', async () => {
      expect(await service.getTestAnalytics(1)).toEqual({ hasData: false, testId: 1, totalAttempts: 0 });
    });

    it('aggregates completed attempts', async () => {
      await finish(student.id, 1, '2024-03-01T09:05:00.000Z');
      await finish(otherStudent.id, 3, '2024-03-01T09:06:00.000Z');

      expect(await service.getTestAnalytics(1)).toEqual({
        hasData: true,
        testId: 1,
        totalAttempts: 2,
        passedAttempts: 1,
        passRate: 50,
        averageScore: 2,
        averagePercentage: 50,
        highestScore: 3,
        lowestScore: 1,
      });
    });

    it('reports a missing test', async () => {
      await expect(service.getTestAnalytics(8)).rejects.toThrow(new NotFoundError('Test not found'));
    });
  });
});
