import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { QUIZ_CONFIG } from '../../common/constants/quiz.constants';
import { QuizPresenter } from '../../common/interfaces/presenter.interface';
import {
  AdvanceResult,
  SessionStart,
} from '../../common/interfaces/session.interface';
import { SessionService } from './session.service';

export interface BeginOptions {
  restart?: boolean;
}

export interface AnswerOptions {
  /** Pause between the feedback and the next question. */
  pacingMs?: number;
}

@Injectable()
export class QuizFlowService {
  private readonly feedbackDelayMs: number;

  constructor(
    private readonly sessionService: SessionService,
    configService: ConfigService,
  ) {
    this.feedbackDelayMs = Number(
      configService.get('FEEDBACK_DELAY_MS', QUIZ_CONFIG.FEEDBACK_DELAY_MS),
    );
  }

  async begin(
    presenter: QuizPresenter,
    userId: string,
    quizId: string,
    options: BeginOptions = {},
  ): Promise<SessionStart> {
    const start = options.restart
      ? await this.sessionService.restart(userId, quizId)
      : await this.sessionService.startOrResume(userId, quizId);

    if (start.status === 'completed') {
      await presenter.renderSummary(start.result);
    } else {
      await this.showCurrent(presenter, userId, start.attempt.id);
    }
    return start;
  }

  async answer(
    presenter: QuizPresenter,
    userId: string,
    attemptId: string,
    questionId: string,
    answerId: string | null,
    options: AnswerOptions = {},
  ): Promise<AdvanceResult> {
    const recorded = await this.sessionService.recordAnswer(
      userId,
      attemptId,
      questionId,
      answerId,
    );

    await presenter.acknowledge({
      attemptId,
      questionId,
      category: recorded.category,
      correctAnswerText: recorded.correctAnswerText,
      counters: {
        correctCount: recorded.attempt.correctCount,
        wrongCount: recorded.attempt.wrongCount,
        skippedCount: recorded.attempt.skippedCount,
      },
    });

    const pacingMs = options.pacingMs ?? this.feedbackDelayMs;
    if (pacingMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, pacingMs));
    }

    const next = await this.sessionService.advance(
      userId,
      attemptId,
      questionId,
    );
    if (next.status === 'completed') {
      await presenter.renderSummary(next.result);
    } else {
      await this.showCurrent(presenter, userId, attemptId);
    }
    return next;
  }

  async showCurrent(
    presenter: QuizPresenter,
    userId: string,
    attemptId: string,
  ): Promise<void> {
    const view = await this.sessionService.getQuestionView(userId, attemptId);
    await presenter.render(view);
  }
}
