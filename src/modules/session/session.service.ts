import { Injectable, Logger } from '@nestjs/common';
import { QuizStore } from '../store/quiz.store';
import { BillingService } from '../billing/billing.service';
import { ScoringService } from '../scoring/scoring.service';
import { calculateQuizCost } from '../billing/cost';
import { AnswerRandomizer } from './answer-randomizer';
import {
  AccessDeniedError,
  AnswerNotFoundError,
  AttemptAlreadyCompletedError,
  AttemptNotFoundError,
  AttemptOwnershipError,
  QuestionNotFoundError,
  QuizNotFoundError,
} from '../../common/errors/quiz.errors';
import { Question, Quiz } from '../../common/interfaces/quiz.interface';
import {
  AnswerCategory,
  Attempt,
  AttemptCounters,
  RecordedAnswer,
  SessionContext,
} from '../../common/interfaces/attempt.interface';
import {
  AdvanceResult,
  QuestionView,
  RecordAnswerResult,
  SessionStart,
} from '../../common/interfaces/session.interface';

const startLockKey = (userId: string, quizId: string) =>
  `start:${userId}:${quizId}`;
const attemptLockKey = (attemptId: string) => `attempt:${attemptId}`;

export function categoryOf(recorded: RecordedAnswer): AnswerCategory {
  if (recorded.isSkipped) return 'skipped';
  return recorded.isCorrect ? 'correct' : 'wrong';
}

const COUNTER_BY_CATEGORY: Record<AnswerCategory, keyof AttemptCounters> = {
  correct: 'correctCount',
  wrong: 'wrongCount',
  skipped: 'skippedCount',
};

/**
 * Moves one answer from `previous` to `next`. The old category never drops
 * below zero; identical categories leave the counters untouched.
 */
export function applyAnswerDelta(
  counters: AttemptCounters,
  previous: AnswerCategory | null,
  next: AnswerCategory,
): AttemptCounters {
  const updated: AttemptCounters = {
    correctCount: counters.correctCount,
    wrongCount: counters.wrongCount,
    skippedCount: counters.skippedCount,
  };
  if (previous === next) return updated;

  if (previous !== null) {
    const key = COUNTER_BY_CATEGORY[previous];
    updated[key] = Math.max(0, updated[key] - 1);
  }
  updated[COUNTER_BY_CATEGORY[next]] += 1;
  return updated;
}

@Injectable()
export class SessionService {
  private readonly logger = new Logger(SessionService.name);

  constructor(
    private readonly store: QuizStore,
    private readonly billingService: BillingService,
    private readonly scoringService: ScoringService,
    private readonly randomizer: AnswerRandomizer,
  ) {}

  async startOrResume(userId: string, quizId: string): Promise<SessionStart> {
    const quiz = await this.requireAccessibleQuiz(userId, quizId);

    return this.store.withLock(startLockKey(userId, quizId), () =>
      this.startLocked(userId, quiz),
    );
  }

  /** Abandons every in-progress attempt of the user on this quiz, then starts. */
  async restart(userId: string, quizId: string): Promise<SessionStart> {
    const quiz = await this.requireAccessibleQuiz(userId, quizId);

    return this.store.withLock(startLockKey(userId, quizId), async () => {
      const open = await this.store.listInProgressAttempts(userId, quizId);

      for (const { id } of open) {
        await this.store.withLock(attemptLockKey(id), async () => {
          const attempt = await this.store.getAttempt(id);
          if (!attempt || attempt.completedAt !== null) return;

          await this.store.saveAttempt({
            ...attempt,
            completedAt: Date.now(),
            abandoned: true,
          });
          await this.store.deleteSessionContext(id);
          this.logger.log(`Attempt ${id} abandoned by user ${userId}`);
        });
      }

      return this.startLocked(userId, quiz);
    });
  }

  async recordAnswer(
    userId: string,
    attemptId: string,
    questionId: string,
    answerId: string | null,
  ): Promise<RecordAnswerResult> {
    return this.store.withLock(attemptLockKey(attemptId), async () => {
      const attempt = await this.requireOpenAttempt(userId, attemptId);

      const question = await this.store.getQuestion(questionId);
      if (!question || question.quizId !== attempt.quizId) {
        throw new QuestionNotFoundError(questionId);
      }

      const answers = await this.store.getAnswers(questionId);
      let category: AnswerCategory = 'skipped';
      if (answerId !== null) {
        const chosen = answers.find((answer) => answer.id === answerId);
        if (!chosen) throw new AnswerNotFoundError(answerId);
        category = chosen.isCorrect ? 'correct' : 'wrong';
      }

      const previous = await this.store.getRecordedAnswer(
        attemptId,
        questionId,
      );
      const previousCategory = previous ? categoryOf(previous) : null;

      await this.store.upsertRecordedAnswer({
        attemptId,
        questionId,
        answerId,
        isCorrect: category === 'correct',
        isSkipped: category === 'skipped',
        answeredAt: Date.now(),
      });

      const updated: Attempt = {
        ...attempt,
        ...applyAnswerDelta(attempt, previousCategory, category),
      };
      await this.store.saveAttempt(updated);

      const correct = answers.find((answer) => answer.isCorrect);
      return {
        attempt: updated,
        category,
        previousCategory,
        correctAnswerText: correct ? correct.text : null,
      };
    });
  }

  /**
   * Moves past `answeredQuestionId`. Only the question at the current index
   * advances the attempt, so a repeated submit leaves the position as is.
   */
  async advance(
    userId: string,
    attemptId: string,
    answeredQuestionId: string,
  ): Promise<AdvanceResult> {
    return this.store.withLock(attemptLockKey(attemptId), async () => {
      const attempt = await this.requireOpenAttempt(userId, attemptId);
      const questions = await this.store.getQuestions(attempt.quizId);
      const context = await this.store.getSessionContext(attemptId);

      const current = context ? questions[context.currentIndex] : undefined;
      if (context && current?.id !== answeredQuestionId) {
        return {
          status: 'question',
          questionIndex: context.currentIndex,
          totalQuestions: questions.length,
        };
      }

      // An expired context resumes at the first unanswered question
      const nextIndex = context
        ? context.currentIndex + 1
        : await this.firstUnansweredIndex(attemptId, questions);
      const startedAt = context ? context.startedAt : attempt.createdAt;

      if (nextIndex >= questions.length) {
        const result = await this.scoringService.finalize(attempt, startedAt);
        await this.store.deleteSessionContext(attemptId);
        return { status: 'completed', result };
      }

      await this.store.saveSessionContext({
        attemptId,
        startedAt,
        currentIndex: nextIndex,
      });
      return {
        status: 'question',
        questionIndex: nextIndex,
        totalQuestions: questions.length,
      };
    });
  }

  async getQuestionView(
    userId: string,
    attemptId: string,
  ): Promise<QuestionView> {
    return this.store.withLock(attemptLockKey(attemptId), async () => {
      const attempt = await this.requireOpenAttempt(userId, attemptId);
      const questions = await this.store.getQuestions(attempt.quizId);

      let context = await this.store.getSessionContext(attemptId);
      if (!context) {
        const index = await this.firstUnansweredIndex(attemptId, questions);
        context = {
          attemptId,
          startedAt: Date.now(),
          currentIndex: Math.min(index, questions.length - 1),
        };
        await this.store.saveSessionContext(context);
      }

      const question = questions[context.currentIndex];
      if (!question) {
        throw new QuestionNotFoundError(`#${context.currentIndex + 1}`);
      }

      const answers = await this.store.getAnswers(question.id);
      const previous = await this.store.getRecordedAnswer(
        attemptId,
        question.id,
      );

      return {
        attemptId,
        quizId: attempt.quizId,
        questionId: question.id,
        questionNumber: question.number,
        index: context.currentIndex,
        total: questions.length,
        text: question.text,
        answers: this.randomizer.present(answers),
        previous: previous
          ? { answerId: previous.answerId, category: categoryOf(previous) }
          : null,
      };
    });
  }

  private async startLocked(userId: string, quiz: Quiz): Promise<SessionStart> {
    const questions = await this.store.getQuestions(quiz.id);
    const existing = await this.store.findInProgressAttempt(userId, quiz.id);

    if (existing) {
      const resumed = await this.store.withLock(
        attemptLockKey(existing.id),
        () => this.resumeLocked(existing.id, questions),
      );
      if (resumed) return resumed;
    }

    const attempt = await this.store.createAttempt(quiz.id, userId);
    await this.store.saveSessionContext({
      attemptId: attempt.id,
      startedAt: Date.now(),
      currentIndex: 0,
    });
    this.logger.log(
      `Attempt ${attempt.id} started on quiz ${quiz.id} by user ${userId}`,
    );

    return {
      status: 'started',
      attempt,
      questionIndex: 0,
      totalQuestions: questions.length,
    };
  }

  // Resolves null when the attempt closed while we waited for its lock
  private async resumeLocked(
    attemptId: string,
    questions: Question[],
  ): Promise<SessionStart | null> {
    const attempt = await this.store.getAttempt(attemptId);
    if (!attempt || attempt.completedAt !== null) return null;

    const index = await this.firstUnansweredIndex(attemptId, questions);
    const context = await this.store.getSessionContext(attemptId);

    if (index >= questions.length) {
      const startedAt = context ? context.startedAt : attempt.createdAt;
      const result = await this.scoringService.finalize(attempt, startedAt);
      await this.store.deleteSessionContext(attemptId);
      const finished = await this.store.getAttempt(attemptId);
      return { status: 'completed', attempt: finished ?? attempt, result };
    }

    const resumedContext: SessionContext = {
      attemptId,
      startedAt: context ? context.startedAt : Date.now(),
      currentIndex: index,
    };
    await this.store.saveSessionContext(resumedContext);

    return {
      status: 'resumed',
      attempt,
      questionIndex: index,
      totalQuestions: questions.length,
    };
  }

  private async firstUnansweredIndex(
    attemptId: string,
    questions: Question[],
  ): Promise<number> {
    const answered = new Set(
      await this.store.listRecordedAnswerQuestionIds(attemptId),
    );
    const index = questions.findIndex((question) => !answered.has(question.id));
    return index === -1 ? questions.length : index;
  }

  private async requireAccessibleQuiz(
    userId: string,
    quizId: string,
  ): Promise<Quiz> {
    const quiz = await this.store.getQuiz(quizId);
    if (!quiz) throw new QuizNotFoundError(quizId);

    const granted = await this.billingService.hasAccessGrant(userId, quizId);
    if (!granted) {
      throw new AccessDeniedError(
        quizId,
        calculateQuizCost(quiz.questionCount),
      );
    }
    return quiz;
  }

  private async requireOpenAttempt(
    userId: string,
    attemptId: string,
  ): Promise<Attempt> {
    const attempt = await this.store.getAttempt(attemptId);
    if (!attempt) throw new AttemptNotFoundError(attemptId);
    if (attempt.userId !== userId) throw new AttemptOwnershipError(attemptId);
    if (attempt.completedAt !== null) {
      throw new AttemptAlreadyCompletedError(attemptId);
    }
    return attempt;
  }
}
