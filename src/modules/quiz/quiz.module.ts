import { Module } from '@nestjs/common';
import { StoreModule } from '../store/store.module';
import { ScoringModule } from '../scoring/scoring.module';
import { PlainTextExtractor, TextExtractor } from '../parser/text-extractor';
import { QuizService } from './quiz.service';
import { QuizController } from './quiz.controller';

@Module({
  imports: [StoreModule, ScoringModule],
  providers: [
    QuizService,
    { provide: TextExtractor, useClass: PlainTextExtractor },
  ],
  controllers: [QuizController],
  exports: [QuizService],
})
export class QuizModule {}
