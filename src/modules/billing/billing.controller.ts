import { Body, Controller, Get, Param, Post, UseGuards } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { BillingService } from './billing.service';
import { AdminGuard } from './guards/admin.guard';
import { GrantAccessDto } from './dto/grant-access.dto';

@Controller('billing')
@UseGuards(AuthGuard('jwt'))
export class BillingController {
  constructor(private readonly billingService: BillingService) {}

  @Get('quizzes/:id')
  async getQuote(@Param('id') quizId: string) {
    return this.billingService.quoteForQuiz(quizId);
  }

  @Post('grants')
  @UseGuards(AdminGuard)
  async grant(@Body() dto: GrantAccessDto) {
    return this.billingService.grantAccess(dto.userId, dto.quizId);
  }
}
