import { Body, Controller, HttpCode, Post, UseGuards } from '@nestjs/common';
import { RateLimitGuard } from '../admission/rate-limit.guard';
import { ApiKeyGuard } from '../auth/api-key.guard';
import { parseOrThrow } from '../validation/parse-or-throw';
import { sendEmailBodySchema } from '../validation/schemas';
import { EmailsService } from './emails.service';

@Controller('emails')
@UseGuards(RateLimitGuard, ApiKeyGuard)
export class EmailsController {
  constructor(private readonly emailsService: EmailsService) {}

  // 202: accepted for asynchronous delivery.
  @HttpCode(202)
  @Post()
  async send(@Body() body: unknown) {
    const request = parseOrThrow(sendEmailBodySchema, body);
    return this.emailsService.submit(request);
  }
}
