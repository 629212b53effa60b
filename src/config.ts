import { LogLevel } from '@nestjs/common';
import { InputError } from './ddl-architect/ddl-architect.errors';
import { DdlArchitectConfig } from './ddl-architect/interfaces/config.interface';

export const DDL_ARCHITECT_CONFIG = 'DDL_ARCHITECT_CONFIG';

// Most severe first: enabling a level enables every level before it.
const LOG_LEVELS: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];
const DEFAULT_LOG_LEVEL: LogLevel = 'error';

export function loadConfig(env: NodeJS.ProcessEnv): DdlArchitectConfig {
  const requested = env.DDL_ARCHITECT_LOG_LEVEL?.trim().toLowerCase() || DEFAULT_LOG_LEVEL;
  const threshold = LOG_LEVELS.findIndex((level) => level === requested);
  if (threshold === -1) {
    throw new InputError(
      `Unknown DDL_ARCHITECT_LOG_LEVEL "${requested}", expected one of: ${LOG_LEVELS.join(', ')}`,
    );
  }

  return {
    databaseUrl: env.DATABASE_URL || undefined,
    logLevels: LOG_LEVELS.slice(0, threshold + 1),
  };
}
