import { Module } from '@nestjs/common';
import { createPool, JOB_STORE, PgJobStore } from '@mailq/queue';
import { APP_CONFIG, CLOCK, loadConfig, systemClock } from '@mailq/shared';
import type { AppConfig } from '@mailq/shared';
import { FileTemplateRenderer } from './templates/file-template.renderer';
import { TEMPLATE_RENDERER } from './templates/template.renderer';
import { SmtpTransport } from './transport/smtp.transport';
import { TRANSPORT } from './transport/transport.types';
import { WORKER_OPTIONS, workerOptionsFrom } from './worker.options';
import { WorkerService } from './worker.service';

@Module({
  controllers: [],
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
      provide: TRANSPORT,
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig) =>
        new SmtpTransport({
          ...config.smtp,
          timeoutMs: config.worker.deliveryTimeoutMs,
        }),
    },
    {
      provide: TEMPLATE_RENDERER,
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig) =>
        new FileTemplateRenderer(config.templates.dir),
    },
    {
      provide: WORKER_OPTIONS,
      inject: [APP_CONFIG],
      useFactory: workerOptionsFrom,
    },
    WorkerService,
  ],
})
export class AppModule {}
