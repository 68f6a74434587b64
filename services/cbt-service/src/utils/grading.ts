/**
 * Scoring rules for attempts. One mark per question, no partial credit.
 */

export const PRACTICE_PASS_PERCENTAGE = 50;

export function normalizeAnswer(value: string): string {
  return value.trim().toLowerCase();
}

export function isCorrectAnswer(submitted: string, correct: string): boolean {
  return normalizeAnswer(submitted) === normalizeAnswer(correct);
}

export interface TestAggregate {
  score: number;
  percentage: number;
  passed: boolean;
}

export function aggregateTestScore(score: number, totalMarks: number, passingMarks: number): TestAggregate {
  return {
    score,
    percentage: totalMarks > 0 ? (score / totalMarks) * 100 : 0,
    passed: score >= passingMarks,
  };
}

/**
 * Practice sessions are graded by the client; pass mark is a fixed percentage.
 */
export function aggregatePracticeScore(score: number, totalQuestions: number): TestAggregate {
  const percentage = totalQuestions > 0 ? (score / totalQuestions) * 100 : 0;
  return {
    score,
    percentage,
    passed: percentage >= PRACTICE_PASS_PERCENTAGE,
  };
}

/**
 * title/total/passing marks derived from exam type, subject and question count.
 */
export function deriveTestMarks(questionCount: number): { totalMarks: number; passingMarks: number } {
  const totalMarks = questionCount;
  return { totalMarks, passingMarks: Math.floor(totalMarks * 0.5) };
}

export function buildTestTitle(examTypeName: string, subjectName: string): string {
  return `${examTypeName} ${subjectName} Test`;
}

/**
 * Practice attempts store only score and percentage; recover the question count from them.
 */
export function backComputeTotalMarks(score: number, percentage: number): number {
  if (score > 0 && percentage > 0) {
    return Math.round((score * 100) / percentage);
  }
  return 0;
}
