import { Answer, Attempt, CompletedAttempt } from '../models/attempt.model';
import { Question } from '../models/question.model';
import { Test } from '../models/test.model';
import { backComputeTotalMarks, PRACTICE_PASS_PERCENTAGE } from './grading';

export const DELETED_QUESTION_TEXT = '[deleted question]';
export const DELETED_TEST_TITLE = 'Deleted Test';
export const UNKNOWN_SUBJECT_NAME = 'Unknown Subject';

/**
 * What an attempt was taken against: a real test, or a synthesized
 * descriptor for practice sessions and tests that have since been deleted.
 */
export interface TestDescriptor {
  id: number | null;
  title: string;
  totalMarks: number;
  passingMarks: number;
  durationMinutes: number | null;
}

export interface AnswerDetail {
  questionId: number | null;
  questionText: string;
  userAnswer: string;
  correctAnswer: string;
  isCorrect: boolean;
  marksObtained: number;
  totalMarks: number;
  explanation: string | null;
  explanationImage: string | null;
}

export interface AttemptResult {
  attemptId: number;
  userId: number;
  testId: number | null;
  testTitle: string;
  startTime: Date;
  endTime: Date;
  timeTaken: number;
  totalQuestions: number;
  correctAnswers: number;
  score: number;
  percentage: number;
  passed: boolean;
  answers: AnswerDetail[];
}

export function describeTest(test: Test): TestDescriptor {
  return {
    id: test.id,
    title: test.title,
    totalMarks: test.totalMarks,
    passingMarks: test.passingMarks,
    durationMinutes: test.durationMinutes,
  };
}

export function practiceTitle(subjectName: string | undefined): string {
  return `${subjectName ?? UNKNOWN_SUBJECT_NAME} Practice`;
}

/**
 * Descriptor for an attempt whose test row is unavailable.
 */
export function describeWithoutTest(attempt: Attempt, subjectName: string | undefined): TestDescriptor {
  if (!attempt.isPractice) {
    return { id: attempt.testId, title: DELETED_TEST_TITLE, totalMarks: 0, passingMarks: 0, durationMinutes: null };
  }
  return {
    id: null,
    title: practiceTitle(subjectName),
    totalMarks: attempt.status === 'completed' ? backComputeTotalMarks(attempt.score, attempt.percentage) : 0,
    passingMarks: PRACTICE_PASS_PERCENTAGE,
    durationMinutes: null,
  };
}

export function buildAnswerDetail(answer: Answer, question: Question | undefined): AnswerDetail {
  return {
    questionId: answer.questionId,
    questionText: question?.questionText ?? DELETED_QUESTION_TEXT,
    userAnswer: answer.answerText,
    correctAnswer: question?.correctAnswer ?? '',
    isCorrect: answer.isCorrect,
    marksObtained: answer.marksObtained,
    totalMarks: 1,
    explanation: question?.explanation ?? null,
    explanationImage: question?.explanationImage ?? null,
  };
}

export function buildAttemptResult(
  attempt: CompletedAttempt,
  descriptor: TestDescriptor,
  answers: readonly Answer[],
  questionsById: ReadonlyMap<number, Question>
): AttemptResult {
  const details = answers.map((answer) =>
    buildAnswerDetail(answer, answer.questionId !== null ? questionsById.get(answer.questionId) : undefined)
  );

  return {
    attemptId: attempt.id,
    userId: attempt.userId,
    testId: attempt.testId,
    testTitle: descriptor.title,
    startTime: attempt.startTime,
    endTime: attempt.endTime,
    timeTaken: attempt.timeTaken,
    totalQuestions: details.length,
    correctAnswers: details.filter((detail) => detail.isCorrect).length,
    score: attempt.score,
    percentage: attempt.percentage,
    passed: attempt.passed,
    answers: details,
  };
}
