export type TokenKind = 'word' | 'quoted' | 'string' | 'punct';

export interface Token {
  kind: TokenKind;
  value: string;
}

export interface DDLStatement {
  tableName: string;
  rawText: string; // fragment with its terminator re-appended
  dependsOn: ReadonlySet<string>;
}

export interface ParsedBatch {
  statements: DDLStatement[];
  unparsed: string[]; // fragments without a CREATE TABLE header, in input order
}

export type OrderedResult =
  | {
      kind: 'ordered';
      statements: DDLStatement[];
      unparsed: string[];
    }
  | {
      kind: 'cycle';
      unresolved: string[];
    }
  | {
      kind: 'passthrough';
      fragments: string[];
    };

export const USAGE_TYPES = ['OLTP', 'OLAP', 'HTAP', 'STREAM', 'OLLP', 'BATCH'] as const;

export type UsageType = (typeof USAGE_TYPES)[number];

// [single-row transaction, medium workload, complex analysis]
export type PerformanceProfile = readonly [number, number, number];

export type CellValue = string | number;

export interface ApplySummary {
  database: string;
  executed: number;
}
