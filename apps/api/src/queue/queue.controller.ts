import { Controller, Get, Param, UseGuards } from '@nestjs/common';
import { RateLimitGuard } from '../admission/rate-limit.guard';
import { ApiKeyGuard } from '../auth/api-key.guard';
import { parseOrThrow } from '../validation/parse-or-throw';
import { jobIdParamSchema } from '../validation/schemas';
import { QueueService } from './queue.service';

@Controller('queue')
@UseGuards(RateLimitGuard, ApiKeyGuard)
export class QueueController {
  constructor(private readonly queueService: QueueService) {}

  @Get('status')
  async getStatus() {
    return this.queueService.getStatus();
  }

  @Get('jobs/:id')
  async getJob(@Param('id') id: unknown) {
    const jobId = parseOrThrow(jobIdParamSchema, id);
    return this.queueService.getJob(jobId);
  }
}
