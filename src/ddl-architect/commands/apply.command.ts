import { Inject } from '@nestjs/common';
import { Command, CommandRunner, Option } from 'nest-commander';
import { DDL_ARCHITECT_CONFIG } from '../../config';
import { InputError } from '../ddl-architect.errors';
import {
  ConnectionConfig,
  DdlArchitectConfig,
} from '../interfaces/config.interface';
import { DatabaseService } from '../services/database.service';
import { DependencyResolverService } from '../services/dependency-resolver.service';
import { InputService } from '../services/input.service';
import { ApplySummary } from '../types/ddl-architect.types';
import { reportError } from './report-error';

export interface ApplyOptions {
  uri?: string;
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  ssl?: boolean;
  dryRun?: boolean;
}

@Command({
  name: 'apply',
  arguments: '[file]',
  description: 'Run DDL against PostgreSQL in FOREIGN KEY dependency order, in one transaction',
})
export class ApplyCommand extends CommandRunner {
  constructor(
    private readonly inputService: InputService,
    private readonly resolver: DependencyResolverService,
    private readonly databaseService: DatabaseService,
    @Inject(DDL_ARCHITECT_CONFIG) private readonly config: DdlArchitectConfig,
  ) {
    super();
  }

  async run(passedParams: string[], options: ApplyOptions): Promise<void> {
    try {
      const sql = await this.inputService.read(passedParams[0]);
      const result = this.resolver.order(sql);
      const statements = this.databaseService.plan(result);

      if (options.dryRun) {
        console.log(statements.join('\n\n'));
        return;
      }

      const summary = await this.apply(this.parseConfig(options), statements);
      console.log(`Applied ${summary.executed} statement(s) to ${summary.database}`);
      if (result.kind === 'ordered' && result.statements.length > 0) {
        console.log(
          `Table order: ${result.statements.map((s) => s.tableName).join(', ')}`,
        );
      }
    } catch (error) {
      reportError('applying schema', error);
    }
  }

  async apply(config: ConnectionConfig, statements: string[]): Promise<ApplySummary> {
    try {
      const database = await this.databaseService.connect(config);
      const executed = await this.databaseService.execute(statements);
      return { database, executed };
    } finally {
      await this.databaseService.close();
    }
  }

  parseConfig(options: ApplyOptions): ConnectionConfig {
    const ssl = options.ssl ? { rejectUnauthorized: false } : undefined;
    const uri = options.uri || this.config.databaseUrl;

    if (uri) {
      return { uri, ssl };
    }

    if (!options.host || !options.database || !options.user || !options.password) {
      throw new InputError(
        'Must provide either connection URI (--uri or DATABASE_URL) or host, database, user, and password',
      );
    }

    return {
      host: options.host,
      port: options.port || 5432,
      database: options.database,
      user: options.user,
      password: options.password,
      ssl,
    };
  }

  @Option({
    flags: '-u, --uri [string]',
    description: 'Database connection URI (default: $DATABASE_URL)',
  })
  parseUri(val: string): string {
    return val;
  }

  @Option({
    flags: '-H, --host [string]',
    description: 'Database host',
  })
  parseHost(val: string): string {
    return val;
  }

  @Option({
    flags: '-p, --port [number]',
    description: 'Database port',
  })
  parsePort(val: string): number {
    return Number(val);
  }

  @Option({
    flags: '-d, --database [string]',
    description: 'Database name',
  })
  parseDatabase(val: string): string {
    return val;
  }

  @Option({
    flags: '--user [string]',
    description: 'Database user',
  })
  parseUser(val: string): string {
    return val;
  }

  @Option({
    flags: '--password [string]',
    description: 'Database password',
  })
  parsePassword(val: string): string {
    return val;
  }

  @Option({
    flags: '--ssl',
    description: 'Connect over SSL without verifying the server certificate',
  })
  parseSsl(): boolean {
    return true;
  }

  @Option({
    flags: '--dry-run',
    description: 'Print the statements in execution order without connecting',
  })
  parseDryRun(): boolean {
    return true;
  }
}
