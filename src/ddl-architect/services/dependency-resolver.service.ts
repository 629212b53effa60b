import { Injectable, Logger } from '@nestjs/common';
import { DependencyGraph } from '../graph/dependency-graph';
import { DDLStatement, OrderedResult } from '../types/ddl-architect.types';
import { DdlParserService } from './ddl-parser.service';

export const ORDERED_MARKER = '-- DDL statements ordered by FOREIGN KEY dependency:';
export const CYCLE_MARKER = '-- WARNING:';

const DDL_TRIGGER = 'CREATE TABLE';

/**
 * Reorders a batch of `CREATE TABLE` statements so that every table comes
 * after the tables it references.
 *
 * `resolve` is defined for every string: text without `CREATE TABLE` is
 * returned as is, and a batch that cannot be ordered comes back unchanged
 * behind a warning comment.
 *
 * Assumptions:
 * - a `REFERENCES` to a table outside the batch is treated as satisfied, so
 *   dangling references go unnoticed;
 * - a table that references itself never becomes ready and is reported with
 *   the cycle;
 * - fragments without a recognisable header are left out of the ordered
 *   output (they are still reported by `order` as `unparsed`);
 * - table names compare exactly as written.
 */
@Injectable()
export class DependencyResolverService {
  private readonly logger = new Logger(DependencyResolverService.name);

  constructor(private readonly parser: DdlParserService) {}

  resolve(sqlText: string): string {
    const result = this.order(sqlText);

    switch (result.kind) {
      case 'passthrough':
        return sqlText;
      case 'cycle':
        return (
          `${CYCLE_MARKER} not all tables could be ordered by FOREIGN KEY dependency ` +
          `(possible circular dependency: ${result.unresolved.join(', ')}). ` +
          `Original order kept.\n` +
          sqlText
        );
      case 'ordered':
        return [ORDERED_MARKER, ...result.statements.map((s) => s.rawText)].join(
          '\n\n',
        );
    }
  }

  order(sqlText: string): OrderedResult {
    if (!sqlText.toUpperCase().includes(DDL_TRIGGER)) {
      return {
        kind: 'passthrough',
        fragments: this.parser.splitStatements(sqlText),
      };
    }

    const { statements, unparsed } = this.parser.parseBatch(sqlText);
    if (unparsed.length > 0) {
      this.logger.debug(
        `${unparsed.length} fragment(s) without a CREATE TABLE header left out of the ordering`,
      );
    }

    const graph = new DependencyGraph<DDLStatement>();
    for (const statement of statements) {
      graph.addNode(statement.tableName, statement);
    }
    for (const statement of statements) {
      for (const dependency of statement.dependsOn) {
        graph.addDependency(statement.tableName, dependency);
      }
    }

    const { ordered, unresolved } = graph.topologicalSort();
    if (unresolved.length > 0) {
      this.logger.warn(
        `Could not order tables, possible circular dependency: ${unresolved.join(', ')}`,
      );
      return { kind: 'cycle', unresolved };
    }

    this.logger.debug(`Ordered ${ordered.length} table(s): ${ordered.map((s) => s.tableName).join(', ')}`);
    return { kind: 'ordered', statements: ordered, unparsed };
  }
}
