import {
  ConnectedSocket,
  MessageBody,
  OnGatewayConnection,
  OnGatewayDisconnect,
  SubscribeMessage,
  WebSocketGateway,
} from '@nestjs/websockets';
import { Logger, UseGuards, UsePipes, ValidationPipe } from '@nestjs/common';
import { Socket } from 'socket.io';
import { QUIZ_CONFIG } from '../../common/constants/quiz.constants';
import { toErrorPayload } from '../../common/errors/quiz.errors';
import { WsJwtGuard, getSocketUser } from '../auth/guards/ws-jwt.guard';
import { QuizFlowService } from './quiz-flow.service';
import { SocketPresenter } from './presenters/socket.presenter';
import {
  RequestQuestionDto,
  StartQuizMessageDto,
  SubmitAnswerMessageDto,
} from './dto/session.dto';

@WebSocketGateway({
  cors: {
    origin: '*',
    credentials: true,
  },
  transports: ['websocket', 'polling'],
  pingTimeout: 60000,
  pingInterval: 25000,
})
@UseGuards(WsJwtGuard)
@UsePipes(new ValidationPipe({ whitelist: true, transform: true }))
export class SessionGateway implements OnGatewayConnection, OnGatewayDisconnect {
  private readonly logger = new Logger(SessionGateway.name);

  constructor(private readonly quizFlowService: QuizFlowService) {}

  handleConnection(client: Socket) {
    this.logger.log(`Client connected: ${client.id}`);
  }

  handleDisconnect(client: Socket) {
    this.logger.log(`Client disconnected: ${client.id}`);
  }

  /**
   * START QUIZ - resumes an open attempt when there is one
   */
  @SubscribeMessage(QUIZ_CONFIG.EVENTS.START_QUIZ)
  async handleStartQuiz(
    @MessageBody() data: StartQuizMessageDto,
    @ConnectedSocket() client: Socket,
  ) {
    return this.begin(client, data.quizId, false);
  }

  /**
   * RESTART QUIZ
   */
  @SubscribeMessage(QUIZ_CONFIG.EVENTS.RESTART_QUIZ)
  async handleRestartQuiz(
    @MessageBody() data: StartQuizMessageDto,
    @ConnectedSocket() client: Socket,
  ) {
    return this.begin(client, data.quizId, true);
  }

  /**
   * SUBMIT ANSWER - no answerId means skip
   */
  @SubscribeMessage(QUIZ_CONFIG.EVENTS.SUBMIT_ANSWER)
  async handleSubmitAnswer(
    @MessageBody() data: SubmitAnswerMessageDto,
    @ConnectedSocket() client: Socket,
  ) {
    try {
      const user = getSocketUser(client);
      const next = await this.quizFlowService.answer(
        new SocketPresenter(client),
        user.userId,
        data.attemptId,
        data.questionId,
        data.answerId ?? null,
      );

      return { success: true, status: next.status };
    } catch (error) {
      return this.fail(client, 'submitting answer', error);
    }
  }

  /**
   * REQUEST QUESTION - re-sends the current question
   */
  @SubscribeMessage(QUIZ_CONFIG.EVENTS.REQUEST_QUESTION)
  async handleRequestQuestion(
    @MessageBody() data: RequestQuestionDto,
    @ConnectedSocket() client: Socket,
  ) {
    try {
      const user = getSocketUser(client);
      await this.quizFlowService.showCurrent(
        new SocketPresenter(client),
        user.userId,
        data.attemptId,
      );

      return { success: true };
    } catch (error) {
      return this.fail(client, 'sending question', error);
    }
  }

  private async begin(client: Socket, quizId: string, restart: boolean) {
    try {
      const user = getSocketUser(client);
      const session = await this.quizFlowService.begin(
        new SocketPresenter(client),
        user.userId,
        quizId,
        { restart },
      );

      this.logger.log(
        `Quiz ${quizId} ${session.status} for ${user.username} (attempt ${session.attempt.id})`,
      );
      return {
        success: true,
        status: session.status,
        attemptId: session.attempt.id,
      };
    } catch (error) {
      return this.fail(client, `starting quiz ${quizId}`, error);
    }
  }

  private fail(client: Socket, action: string, error: unknown) {
    const payload = toErrorPayload(error);
    this.logger.error(`Error ${action}: ${payload.message}`);
    client.emit(QUIZ_CONFIG.EVENTS.ERROR, payload);
    return { success: false, ...payload };
  }
}
