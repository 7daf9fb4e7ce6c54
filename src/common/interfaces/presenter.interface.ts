import { AttemptResult } from './attempt.interface';
import { AnswerFeedback, QuestionView } from './session.interface';

export type PresenterKind = 'interactive-reply' | 'plain-message';

/**
 * Output side of a quiz session. The flow service only talks to this
 * capability, never to a concrete transport.
 */
export interface QuizPresenter {
  readonly kind: PresenterKind;
  render(view: QuestionView): Promise<void>;
  renderSummary(result: AttemptResult): Promise<void>;
  acknowledge(feedback: AnswerFeedback): Promise<void>;
}
