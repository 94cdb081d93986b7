import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { errorMessage, logger, onShutdown } from '@mailq/shared';
import { TRANSPORT } from './transport/transport.types';
import type { Transport } from './transport/transport.types';
import { WorkerService } from './worker.service';

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: false,
  });

  const transport = app.get<Transport>(TRANSPORT);
  if (!(await transport.verify())) {
    await app.close();
    throw new Error('SMTP server is unreachable, refusing to start');
  }

  const workerService = app.get(WorkerService);
  workerService.start();

  onShutdown(async (signal) => {
    logger.info({ service: 'worker', signal }, 'shutdown requested');
    // Closing the context stops the dispatcher and releases the store.
    await app.close();
  });
}

bootstrap().catch((err: unknown) => {
  logger.fatal({ service: 'worker', error: errorMessage(err) }, 'worker failed to start');
  process.exit(1);
});
