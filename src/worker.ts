import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { resolveLogLevels } from '../libs/common';
import { WorkerModule } from './worker/worker.module';
import { WorkerLoopService } from './worker/worker-loop.service';

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(WorkerModule, {
    logger: resolveLogLevels(process.env.LOG_LEVEL ?? 'info'),
  });
  app.enableShutdownHooks();

  await app.get(WorkerLoopService).run();
  await app.close();
}

bootstrap().catch((error: unknown) => {
  new Logger('Worker').error(`Worker crashed: ${error instanceof Error ? error.stack : String(error)}`);
  process.exitCode = 1;
});
