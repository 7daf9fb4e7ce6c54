import { Injectable, Logger } from '@nestjs/common';
import { QuizStore } from '../store/quiz.store';
import { QUIZ_CONFIG } from '../../common/constants/quiz.constants';
import { QuizNotFoundError } from '../../common/errors/quiz.errors';
import {
  Attempt,
  AttemptCounters,
  AttemptResult,
  LeaderboardEntry,
  RecordedAnswer,
} from '../../common/interfaces/attempt.interface';
import {
  buildLeaderboard,
  computeBestSnapshot,
  computeRanking,
} from './ranking';

export function countRecordedAnswers(
  recorded: RecordedAnswer[],
): AttemptCounters {
  const counters: AttemptCounters = {
    correctCount: 0,
    wrongCount: 0,
    skippedCount: 0,
  };
  for (const answer of recorded) {
    if (answer.isSkipped) counters.skippedCount++;
    else if (answer.isCorrect) counters.correctCount++;
    else counters.wrongCount++;
  }
  return counters;
}

@Injectable()
export class ScoringService {
  private readonly logger = new Logger(ScoringService.name);

  constructor(private readonly store: QuizStore) {}

  /**
   * Closes `attempt`: stamps duration and completion time, computes the best
   * snapshot and persists it, then ranks it among every completed attempt of
   * the quiz. Callers hold the attempt lock.
   */
  async finalize(attempt: Attempt, startedAt: number): Promise<AttemptResult> {
    const quiz = await this.store.getQuiz(attempt.quizId);
    if (!quiz) throw new QuizNotFoundError(attempt.quizId);

    const now = Date.now();
    const recorded = await this.store.listRecordedAnswers(attempt.id);
    const counters = countRecordedAnswers(recorded);

    if (
      counters.correctCount !== attempt.correctCount ||
      counters.wrongCount !== attempt.wrongCount ||
      counters.skippedCount !== attempt.skippedCount
    ) {
      this.logger.warn(
        `Counter drift on attempt ${attempt.id}: stored ${attempt.correctCount}/${attempt.wrongCount}/${attempt.skippedCount}, ` +
          `recorded ${counters.correctCount}/${counters.wrongCount}/${counters.skippedCount}`,
      );
    }

    const finished: Attempt = {
      ...attempt,
      ...counters,
      durationSeconds: Math.max(0, Math.floor((now - startedAt) / 1000)),
      completedAt: now,
    };

    const priorAttempts = (await this.store.listCompletedAttempts(quiz.id)).filter(
      (other) => other.userId === finished.userId && other.id !== finished.id,
    );
    Object.assign(finished, computeBestSnapshot(finished, priorAttempts));

    await this.store.saveAttempt(finished);

    const completed = await this.store.listCompletedAttempts(quiz.id);
    const ranking = computeRanking(finished.correctCount, completed);

    this.logger.log(
      `Attempt ${finished.id} completed: ${finished.correctCount}/${quiz.questionCount} in ${finished.durationSeconds}s`,
    );

    return {
      attemptId: finished.id,
      quizId: quiz.id,
      quizName: quiz.name,
      totalQuestions: quiz.questionCount,
      correctCount: finished.correctCount,
      wrongCount: finished.wrongCount,
      skippedCount: finished.skippedCount,
      durationSeconds: finished.durationSeconds,
      best: {
        correct: finished.bestCorrect,
        wrong: finished.bestWrong,
        skipped: finished.bestSkipped,
        durationSeconds: finished.bestDuration,
      },
      hasPreviousResults:
        priorAttempts.length > 0 || ranking.totalParticipants > 1,
      ranking,
    };
  }

  async leaderboard(
    quizId: string,
    limit: number = QUIZ_CONFIG.LEADERBOARD_SIZE,
  ): Promise<LeaderboardEntry[]> {
    const quiz = await this.store.getQuiz(quizId);
    if (!quiz) throw new QuizNotFoundError(quizId);

    const completed = await this.store.listCompletedAttempts(quizId);
    return buildLeaderboard(completed, limit);
  }
}
