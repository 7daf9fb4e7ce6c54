import { Injectable, Logger } from '@nestjs/common';
import { QuizStore } from '../store/quiz.store';
import { QuizNotFoundError } from '../../common/errors/quiz.errors';
import { calculateQuizCost } from './cost';

export interface QuizQuote {
  quizId: string;
  questionCount: number;
  cost: number;
}

@Injectable()
export class BillingService {
  private readonly logger = new Logger(BillingService.name);

  constructor(private readonly store: QuizStore) {}

  async quoteForQuiz(quizId: string): Promise<QuizQuote> {
    const quiz = await this.store.getQuiz(quizId);
    if (!quiz) throw new QuizNotFoundError(quizId);

    return {
      quizId,
      questionCount: quiz.questionCount,
      cost: calculateQuizCost(quiz.questionCount),
    };
  }

  async hasAccessGrant(userId: string, quizId: string): Promise<boolean> {
    return this.store.hasAccessGrant(userId, quizId);
  }

  // Idempotent; repeated grants leave the existing one in place
  async grantAccess(
    userId: string,
    quizId: string,
  ): Promise<{ userId: string; quizId: string; created: boolean }> {
    const quiz = await this.store.getQuiz(quizId);
    if (!quiz) throw new QuizNotFoundError(quizId);

    const created = await this.store.grantAccess(userId, quizId);
    if (created) {
      this.logger.log(`Granted access to quiz ${quizId} for user ${userId}`);
    }
    return { userId, quizId, created };
  }
}
