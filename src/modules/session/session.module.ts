import { Module } from '@nestjs/common';
import { StoreModule } from '../store/store.module';
import { BillingModule } from '../billing/billing.module';
import { ScoringModule } from '../scoring/scoring.module';
import { AuthModule } from '../auth/auth.module';
import { AnswerRandomizer } from './answer-randomizer';
import { SessionService } from './session.service';
import { QuizFlowService } from './quiz-flow.service';
import { SessionController } from './session.controller';
import { SessionGateway } from './session.gateway';

@Module({
  imports: [StoreModule, BillingModule, ScoringModule, AuthModule],
  providers: [AnswerRandomizer, SessionService, QuizFlowService, SessionGateway],
  controllers: [SessionController],
  exports: [SessionService, QuizFlowService],
})
export class SessionModule {}
