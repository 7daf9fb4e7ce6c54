import {
  Attempt,
  BestSnapshot,
  LeaderboardEntry,
  Ranking,
} from '../../common/interfaces/attempt.interface';

function isBetter(candidate: Attempt, current: Attempt): boolean {
  return (
    candidate.correctCount > current.correctCount ||
    (candidate.correctCount === current.correctCount &&
      candidate.durationSeconds < current.durationSeconds)
  );
}

/** Most correct answers, ties broken by the shorter duration. */
export function pickBestAttempt(attempts: Attempt[]): Attempt | null {
  let best: Attempt | null = null;
  for (const attempt of attempts) {
    if (!best || isBetter(attempt, best)) best = attempt;
  }
  return best;
}

function snapshotOf(attempt: Attempt): BestSnapshot {
  return {
    bestCorrect: attempt.correctCount,
    bestWrong: attempt.wrongCount,
    bestSkipped: attempt.skippedCount,
    bestDuration: attempt.durationSeconds,
  };
}

/**
 * Best-attempt snapshot for `attempt` given the user's earlier completed
 * attempts of the same quiz. `attempt` must already carry its final counters
 * and duration.
 */
export function computeBestSnapshot(
  attempt: Attempt,
  priorAttempts: Attempt[],
): BestSnapshot {
  const priorBest = pickBestAttempt(priorAttempts);
  if (!priorBest || isBetter(attempt, priorBest)) return snapshotOf(attempt);
  return snapshotOf(priorBest);
}

export function computeRanking(
  correctCount: number,
  completedAttempts: Attempt[],
): Ranking {
  const totalParticipants = completedAttempts.length;
  const betterCount = completedAttempts.filter(
    (other) => other.correctCount > correctCount,
  ).length;

  return {
    position: betterCount + 1,
    betterCount,
    totalParticipants,
    percentile:
      totalParticipants > 0
        ? ((totalParticipants - betterCount) / totalParticipants) * 100
        : 100,
  };
}

/** One row per user: their best attempt, strongest first. */
export function buildLeaderboard(
  completedAttempts: Attempt[],
  limit: number,
): LeaderboardEntry[] {
  const bestByUser = new Map<string, Attempt>();
  for (const attempt of completedAttempts) {
    const current = bestByUser.get(attempt.userId);
    if (!current || isBetter(attempt, current)) {
      bestByUser.set(attempt.userId, attempt);
    }
  }

  return [...bestByUser.values()]
    .sort(
      (a, b) =>
        b.correctCount - a.correctCount || a.durationSeconds - b.durationSeconds,
    )
    .slice(0, limit)
    .map((attempt, index) => ({
      rank: index + 1,
      userId: attempt.userId,
      attemptId: attempt.id,
      correctCount: attempt.correctCount,
      durationSeconds: attempt.durationSeconds,
    }));
}
