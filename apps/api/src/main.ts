import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { JOB_STORE, PgJobStore } from '@mailq/queue';
import type { JobStore } from '@mailq/queue';
import { APP_CONFIG, errorMessage, logger, onShutdown } from '@mailq/shared';
import type { AppConfig } from '@mailq/shared';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { logger: false });

  const config = app.get<AppConfig>(APP_CONFIG);
  const store = app.get<JobStore>(JOB_STORE);

  if (config.database.autoMigrate && store instanceof PgJobStore) {
    await store.ensureSchema();
  }

  await app.listen(config.api.port);
  logger.info(
    { service: 'api', port: config.api.port, auth: config.api.apiKey !== undefined },
    'api listening',
  );

  onShutdown(async (signal) => {
    logger.info({ service: 'api', signal }, 'api stopping');
    await app.close();
    await store.close();
    logger.info({ service: 'api' }, 'api stopped');
  });
}

bootstrap().catch((err: unknown) => {
  logger.fatal({ service: 'api', error: errorMessage(err) }, 'api failed to start');
  process.exit(1);
});
