import { Module } from '@nestjs/common';
import { StoreModule } from '../store/store.module';
import { BillingService } from './billing.service';
import { BillingController } from './billing.controller';
import { AdminGuard } from './guards/admin.guard';

@Module({
  imports: [StoreModule],
  providers: [BillingService, AdminGuard],
  controllers: [BillingController],
  exports: [BillingService],
})
export class BillingModule {}
