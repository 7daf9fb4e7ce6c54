import { PresenterKind, QuizPresenter } from '../../../common/interfaces/presenter.interface';
import { AttemptResult } from '../../../common/interfaces/attempt.interface';
import {
  AnswerFeedback,
  QuestionView,
} from '../../../common/interfaces/session.interface';
import { formatFeedback, formatQuestion, formatSummary } from './message-format';

/**
 * Collects plain text messages in send order. The REST surface returns them
 * alongside the structured payload.
 */
export class MessageBufferPresenter implements QuizPresenter {
  readonly kind: PresenterKind = 'plain-message';
  readonly messages: string[] = [];
  lastView: QuestionView | null = null;
  lastResult: AttemptResult | null = null;

  async render(view: QuestionView): Promise<void> {
    this.lastView = view;
    this.messages.push(formatQuestion(view));
  }

  async renderSummary(result: AttemptResult): Promise<void> {
    this.lastResult = result;
    this.messages.push(formatSummary(result));
  }

  async acknowledge(feedback: AnswerFeedback): Promise<void> {
    this.messages.push(formatFeedback(feedback));
  }
}
