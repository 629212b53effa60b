import { describeError } from '../ddl-architect.errors';

export function reportError(action: string, error: unknown): void {
  console.error(`Error ${action}:`, describeError(error));
  process.exitCode = 1;
}
