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
import { QuizService } from './quiz.service';
import { ScoringService } from '../scoring/scoring.service';
import { IngestionRoute } from '../rate-limit/ingestion-route.decorator';
import { CreateQuizDto, UploadQuizDocumentDto } from './dto/create-quiz.dto';

@Controller('quizzes')
export class QuizController {
  constructor(
    private readonly quizService: QuizService,
    private readonly scoringService: ScoringService,
  ) {}

  @Post()
  @UseGuards(AuthGuard('jwt'))
  @IngestionRoute()
  async create(
    @CurrentUser() user: AuthenticatedUser,
    @Body() dto: CreateQuizDto,
  ) {
    return this.quizService.createFromText(user.userId, dto.name, dto.text);
  }

  @Post('document')
  @UseGuards(AuthGuard('jwt'))
  @IngestionRoute()
  async upload(
    @CurrentUser() user: AuthenticatedUser,
    @Body() dto: UploadQuizDocumentDto,
  ) {
    return this.quizService.createFromDocument(
      user.userId,
      dto.name,
      Buffer.from(dto.content, 'base64'),
      dto.format,
      dto.fileName,
    );
  }

  @Get()
  async list() {
    return this.quizService.listQuizzes();
  }

  @Get(':id')
  async get(@Param('id') quizId: string) {
    return this.quizService.getQuiz(quizId);
  }

  @Get(':id/leaderboard')
  @UseGuards(AuthGuard('jwt'))
  async leaderboard(@Param('id') quizId: string) {
    return this.scoringService.leaderboard(quizId);
  }
}
