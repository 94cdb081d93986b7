import { Module } from '@nestjs/common';
import { createPool, JOB_STORE, PgJobStore } from '@mailq/queue';
import { APP_CONFIG, CLOCK, loadConfig, systemClock } from '@mailq/shared';
import type { AppConfig } from '@mailq/shared';
import { RateLimitGuard } from './admission/rate-limit.guard';
import {
  RATE_LIMITER,
  SlidingWindowLimiter,
} from './admission/sliding-window.limiter';
import { ApiKeyGuard } from './auth/api-key.guard';
import { EmailsController } from './emails/emails.controller';
import { EmailsService } from './emails/emails.service';
import { HealthController } from './health/health.controller';
import { QueueController } from './queue/queue.controller';
import { QueueService } from './queue/queue.service';

@Module({
  controllers: [HealthController, EmailsController, QueueController],
  providers: [
    { provide: APP_CONFIG, useFactory: () => loadConfig() },
    { provide: CLOCK, useValue: systemClock },
    {
      provide: JOB_STORE,
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig) =>
        new PgJobStore(createPool(config.database), {
          retryAttempts: config.database.retryAttempts,
        }),
    },
    {
      provide: RATE_LIMITER,
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig) =>
        new SlidingWindowLimiter(config.api.rateLimit),
    },
    RateLimitGuard,
    ApiKeyGuard,
    EmailsService,
    QueueService,
  ],
})
export class AppModule {}
