import {
  Body,
  Controller,
  Get,
  Param,
  Post,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { CurrentUser } from '../../common/decorators/current-user.decorator';
import { AuthenticatedUser } from '../auth/interfaces/authenticated-user.interface';
import { QuizFlowService } from './quiz-flow.service';
import { MessageBufferPresenter } from './presenters/message-buffer.presenter';
import { StartSessionDto, SubmitAnswerDto } from './dto/session.dto';

@Controller('sessions')
@UseGuards(AuthGuard('jwt'))
export class SessionController {
  constructor(private readonly quizFlowService: QuizFlowService) {}

  @Post()
  async start(
    @CurrentUser() user: AuthenticatedUser,
    @Body() dto: StartSessionDto,
  ) {
    const presenter = new MessageBufferPresenter();
    const session = await this.quizFlowService.begin(
      presenter,
      user.userId,
      dto.quizId,
      { restart: dto.restart },
    );

    return {
      status: session.status,
      attemptId: session.attempt.id,
      question: presenter.lastView,
      result: presenter.lastResult,
      messages: presenter.messages,
    };
  }

  // No pacing over HTTP: the client decides when to show the next question
  @Post(':attemptId/answers')
  async answer(
    @CurrentUser() user: AuthenticatedUser,
    @Param('attemptId') attemptId: string,
    @Body() dto: SubmitAnswerDto,
  ) {
    const presenter = new MessageBufferPresenter();
    const next = await this.quizFlowService.answer(
      presenter,
      user.userId,
      attemptId,
      dto.questionId,
      dto.answerId ?? null,
      { pacingMs: 0 },
    );

    return {
      status: next.status,
      question: presenter.lastView,
      result: presenter.lastResult,
      messages: presenter.messages,
    };
  }

  @Get(':attemptId/question')
  async currentQuestion(
    @CurrentUser() user: AuthenticatedUser,
    @Param('attemptId') attemptId: string,
  ) {
    const presenter = new MessageBufferPresenter();
    await this.quizFlowService.showCurrent(presenter, user.userId, attemptId);

    return {
      question: presenter.lastView,
      messages: presenter.messages,
    };
  }
}
