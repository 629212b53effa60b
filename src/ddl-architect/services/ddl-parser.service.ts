import { Injectable } from '@nestjs/common';
import {
  DdlTokenizer,
  isIdentifier,
  isKeyword,
  isPunct,
} from '../parser/ddl-tokenizer';
import {
  DDLStatement,
  ParsedBatch,
  Token,
} from '../types/ddl-architect.types';

export const STATEMENT_TERMINATOR = ';';

@Injectable()
export class DdlParserService {
  splitStatements(sqlText: string): string[] {
    return sqlText
      .split(STATEMENT_TERMINATOR)
      .map((fragment) => fragment.trim())
      .filter((fragment) => fragment.length > 0);
  }

  /**
   * Returns undefined when the fragment has no `CREATE TABLE <name> (` header.
   */
  parseStatement(fragment: string): DDLStatement | undefined {
    const tokens = DdlTokenizer.tokenize(fragment);
    const tableName = this.findTableName(tokens);
    if (tableName === undefined) return undefined;

    return {
      tableName,
      rawText: fragment + STATEMENT_TERMINATOR,
      dependsOn: new Set(this.findReferences(tokens)),
    };
  }

  /**
   * A table defined twice keeps its first position and its last definition.
   */
  parseBatch(sqlText: string): ParsedBatch {
    const tables = new Map<string, DDLStatement>();
    const unparsed: string[] = [];

    for (const fragment of this.splitStatements(sqlText)) {
      const statement = this.parseStatement(fragment);
      if (statement) {
        tables.set(statement.tableName, statement);
      } else {
        unparsed.push(fragment);
      }
    }

    return { statements: [...tables.values()], unparsed };
  }

  private findTableName(tokens: Token[]): string | undefined {
    for (let i = 0; i + 3 < tokens.length; i++) {
      if (
        isKeyword(tokens[i], 'CREATE') &&
        isKeyword(tokens[i + 1], 'TABLE') &&
        isIdentifier(tokens[i + 2]) &&
        isPunct(tokens[i + 3], '(')
      ) {
        return tokens[i + 2].value;
      }
    }
    return undefined;
  }

  // Inline (`col INT REFERENCES t(id)`) and table-level
  // (`FOREIGN KEY (a, b) REFERENCES t (x, y)`) constraints read the same way.
  // `REFERENCES s.t` names `t`.
  private findReferences(tokens: Token[]): string[] {
    const references: string[] = [];

    tokens.forEach((token, index) => {
      if (!isKeyword(token, 'REFERENCES')) return;

      let cursor = index + 1;
      if (!isIdentifier(tokens[cursor])) return;
      while (isPunct(tokens[cursor + 1], '.') && isIdentifier(tokens[cursor + 2])) {
        cursor += 2;
      }
      references.push(tokens[cursor].value);
    });

    return references;
  }
}
