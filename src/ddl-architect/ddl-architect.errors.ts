export class DdlArchitectError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InputError extends DdlArchitectError {}

export class CircularDependencyError extends DdlArchitectError {
  constructor(readonly tables: string[]) {
    super(`Circular dependency detected involving tables: ${tables.join(', ')}`);
  }
}

export class DatabaseConnectionError extends DdlArchitectError {}

export class StatementExecutionError extends DdlArchitectError {
  constructor(
    readonly statementIndex: number,
    readonly statement: string,
    cause: unknown,
  ) {
    super(
      `Statement ${statementIndex + 1} failed: ${describeError(cause)}`,
      { cause },
    );
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
