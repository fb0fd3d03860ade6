import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Post,
  UseGuards,
} from '@nestjs/common';
import { API_PREFIX } from '../common/routes';
import { RateLimit } from '../rate-limit/rate-limit.decorator';
import { RateLimitGuard } from '../rate-limit/rate-limit.guard';
import { AskDto } from './advisor.dto';
import { AdvisorService } from './advisor.service';
import type { AskResult } from './advisor.types';

@Controller(API_PREFIX)
@UseGuards(RateLimitGuard)
export class AdvisorController {
  constructor(private readonly advisor: AdvisorService) {}

  @Post('ask')
  @HttpCode(HttpStatus.OK)
  @RateLimit('ai')
  async ask(@Body() dto: AskDto): Promise<AskResult> {
    return this.advisor.ask(dto.destination_id, dto.question);
  }
}
