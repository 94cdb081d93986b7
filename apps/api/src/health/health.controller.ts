import {
  Controller,
  Get,
  Inject,
  ServiceUnavailableException,
} from '@nestjs/common';
import { JOB_STORE } from '@mailq/queue';
import type { JobStore } from '@mailq/queue';
import { APP_CONFIG, CLOCK } from '@mailq/shared';
import type { AppConfig, Clock } from '@mailq/shared';

@Controller('health')
export class HealthController {
  constructor(
    @Inject(JOB_STORE) private readonly store: JobStore,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  @Get()
  async check() {
    const health = await this.store.health();
    const timestamp = this.clock().toISOString();
    if (!health.ok) {
      throw new ServiceUnavailableException({
        status: 'unhealthy',
        db: health.error,
        version: this.config.version,
        timestamp,
      });
    }
    return {
      status: 'healthy',
      db: 'ok',
      version: this.config.version,
      timestamp,
    };
  }
}
