import { Socket } from 'socket.io';
import { QUIZ_CONFIG } from '../../../common/constants/quiz.constants';
import { PresenterKind, QuizPresenter } from '../../../common/interfaces/presenter.interface';
import { AttemptResult } from '../../../common/interfaces/attempt.interface';
import {
  AnswerFeedback,
  QuestionView,
} from '../../../common/interfaces/session.interface';

export class SocketPresenter implements QuizPresenter {
  readonly kind: PresenterKind = 'interactive-reply';

  constructor(private readonly client: Pick<Socket, 'emit'>) {}

  async render(view: QuestionView): Promise<void> {
    this.client.emit(QUIZ_CONFIG.EVENTS.QUESTION, view);
  }

  async renderSummary(result: AttemptResult): Promise<void> {
    this.client.emit(QUIZ_CONFIG.EVENTS.QUIZ_SUMMARY, result);
  }

  async acknowledge(feedback: AnswerFeedback): Promise<void> {
    this.client.emit(QUIZ_CONFIG.EVENTS.ANSWER_FEEDBACK, feedback);
  }
}
