export interface GradedOutcome {
  score: number;
  percentage: number;
  passed: boolean;
}

export type TestAnalytics =
  | {
      hasData: true;
      testId: number;
      totalAttempts: number;
      passedAttempts: number;
      passRate: number;
      averageScore: number;
      averagePercentage: number;
      highestScore: number;
      lowestScore: number;
    }
  | {
      hasData: false;
      testId: number;
      totalAttempts: 0;
    };

export function summarizeTestAttempts(testId: number, outcomes: readonly GradedOutcome[]): TestAnalytics {
  if (outcomes.length === 0) {
    return { hasData: false, testId, totalAttempts: 0 };
  }

  const scores = outcomes.map((o) => o.score);
  const passedAttempts = outcomes.filter((o) => o.passed).length;
  const sum = (values: number[]) => values.reduce((total, value) => total + value, 0);

  return {
    hasData: true,
    testId,
    totalAttempts: outcomes.length,
    passedAttempts,
    passRate: (passedAttempts / outcomes.length) * 100,
    averageScore: sum(scores) / outcomes.length,
    averagePercentage: sum(outcomes.map((o) => o.percentage)) / outcomes.length,
    highestScore: Math.max(...scores),
    lowestScore: Math.min(...scores),
  };
}
