import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { CommandFactory } from 'nest-commander';
import { resolveLogLevels } from '../libs/common';
import { CliModule } from './cli/cli.module';

async function bootstrap() {
  await CommandFactory.run(CliModule, resolveLogLevels(process.env.LOG_LEVEL ?? 'warn'));
}

bootstrap().catch((error: unknown) => {
  new Logger('Cli').error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
