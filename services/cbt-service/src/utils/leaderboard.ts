export const LEADERBOARD_SIZE = 10;

export interface ScoredAttempt {
  userId: number;
  percentage: number;
  endTime: Date;
  /** Display title of the test or practice session. */
  title: string;
}

export interface LeaderboardStanding {
  rank: number;
  userId: number;
  averagePercentage: number;
  attemptCount: number;
  latestTitle: string;
}

interface Accumulator {
  userId: number;
  total: number;
  count: number;
  latest: ScoredAttempt;
}

/**
 * Mean percentage per user across every completed attempt, best first.
 * Users are grouped in order of first appearance and the sort is stable, so
 * equal averages keep that order.
 */
export function rankByAveragePercentage(attempts: readonly ScoredAttempt[], limit: number = LEADERBOARD_SIZE): LeaderboardStanding[] {
  const byUser = new Map<number, Accumulator>();

  for (const attempt of attempts) {
    const acc = byUser.get(attempt.userId);
    if (!acc) {
      byUser.set(attempt.userId, { userId: attempt.userId, total: attempt.percentage, count: 1, latest: attempt });
      continue;
    }
    acc.total += attempt.percentage;
    acc.count += 1;
    if (attempt.endTime.getTime() >= acc.latest.endTime.getTime()) {
      acc.latest = attempt;
    }
  }

  return [...byUser.values()]
    .map((acc) => ({ acc, average: acc.total / acc.count }))
    .sort((a, b) => b.average - a.average)
    .slice(0, limit)
    .map(({ acc, average }, index) => ({
      rank: index + 1,
      userId: acc.userId,
      averagePercentage: average,
      attemptCount: acc.count,
      latestTitle: acc.latest.title,
    }));
}
