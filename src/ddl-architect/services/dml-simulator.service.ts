import { Injectable } from '@nestjs/common';
import {
  FALLBACK_COLUMNS,
  GENERIC_ROWS,
  MEMBER_KPI_ROWS,
  TEAM_MEMBER_ROWS,
} from '../constants/simulated-rows';
import {
  DdlTokenizer,
  isIdentifier,
  isKeyword,
  isPunct,
} from '../parser/ddl-tokenizer';
import { CellValue, Token } from '../types/ddl-architect.types';

@Injectable()
export class DmlSimulatorService {
  simulate(selectQuery: string, resultDescription: string): string {
    const rows = this.pickRows(selectQuery);
    let columns = this.guessColumns(selectQuery);
    if (columns.length === 0) {
      columns = FALLBACK_COLUMNS;
    }
    if (rows.length > 0 && columns.length !== rows[0].length) {
      columns = rows[0].map((_, index) => `Column_${index + 1}`);
    }

    return [
      `### Simulated Query Output: (${resultDescription})`,
      '',
      '**Query:**',
      '```sql',
      selectQuery.trim(),
      '```',
      '',
      this.toMarkdownTable(columns, rows),
    ].join('\n');
  }

  /**
   * Output column names of the first SELECT list: the alias when one is
   * given, otherwise the last identifier of the item. Items ending in
   * anything else (`*`, a call, a literal) get a positional `col_<n>` name.
   */
  guessColumns(selectQuery: string): string[] {
    const tokens = DdlTokenizer.tokenize(selectQuery);
    const start = tokens.findIndex((token) => isKeyword(token, 'SELECT'));
    if (start === -1) return [];

    const items: Token[][] = [[]];
    let depth = 0;
    for (const token of tokens.slice(start + 1)) {
      if (depth === 0 && isKeyword(token, 'FROM')) break;
      if (isPunct(token, '(')) depth++;
      if (isPunct(token, ')')) depth--;
      if (depth === 0 && isPunct(token, ',')) {
        items.push([]);
        continue;
      }
      items[items.length - 1].push(token);
    }

    return items
      .filter((item) => item.length > 0)
      .map((item, index) => {
        const last = item[item.length - 1];
        return isIdentifier(last) ? last.value : `col_${index + 1}`;
      });
  }

  private pickRows(selectQuery: string): CellValue[][] {
    const upper = selectQuery.toUpperCase();
    if (upper.includes('MEMBER') && (upper.includes('KPI') || upper.includes('VALUE'))) {
      return MEMBER_KPI_ROWS;
    }
    if (upper.includes('TEAM') && upper.includes('MEMBER')) {
      return TEAM_MEMBER_ROWS;
    }
    return GENERIC_ROWS;
  }

  private toMarkdownTable(columns: string[], rows: CellValue[][]): string {
    const header = `| ${columns.join(' | ')} |`;
    const separator = `| ${columns.map(() => '---').join(' | ')} |`;
    const body = rows.map((row) => `| ${row.map(String).join(' | ')} |`);

    return [header, separator, ...body].join('\n');
  }
}
