#!/usr/bin/env node
import 'reflect-metadata';

import { CommandFactory } from 'nest-commander';
import { loadConfig } from './config';
import { describeError } from './ddl-architect/ddl-architect.errors';
import { DdlArchitectModule } from './ddl-architect/ddl-architect.module';

async function bootstrap() {
  const { logLevels } = loadConfig(process.env);
  await CommandFactory.run(DdlArchitectModule, logLevels);
}

bootstrap().catch((error: unknown) => {
  console.error('Error starting ddl-architect:', describeError(error));
  process.exitCode = 1;
});
