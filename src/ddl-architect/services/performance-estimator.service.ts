import { Injectable } from '@nestjs/common';
import {
  BASE_FACTOR_MS,
  INVALID_USAGE_TYPE_MESSAGE,
  PERFORMANCE_PROFILES,
  ROWS_PER_SCALE_STEP,
} from '../constants/performance-profiles';
import { USAGE_TYPES, UsageType } from '../types/ddl-architect.types';

export function toUsageType(value: string): UsageType | undefined {
  const upper = value.toUpperCase();
  return USAGE_TYPES.find((type) => type === upper);
}

/**
 * Rule-based latency/throughput comparison across workload types. The DDL
 * itself does not influence the numbers; only the row count scales them.
 */
@Injectable()
export class PerformanceEstimatorService {
  estimate(ddlText: string, rowCount: number, proposedUsageType: string): string {
    const proposed = toUsageType(proposedUsageType);
    if (!proposed) {
      return INVALID_USAGE_TYPE_MESSAGE;
    }

    const scale = Math.max(1, rowCount / ROWS_PER_SCALE_STEP);
    const timeFor = (factor: number) => BASE_FACTOR_MS * scale * factor;

    let bestTransaction: { type: UsageType; time: number } | undefined;
    let bestAnalysis: { type: UsageType; time: number } | undefined;
    const rows: string[] = [];

    for (const type of USAGE_TYPES) {
      const [transactionFactor, , analysisFactor] = PERFORMANCE_PROFILES[type];
      const transaction = timeFor(transactionFactor);
      const analysis = timeFor(analysisFactor);

      if (!bestTransaction || transaction < bestTransaction.time) {
        bestTransaction = { type, time: transaction };
      }
      if (!bestAnalysis || analysis < bestAnalysis.time) {
        bestAnalysis = { type, time: analysis };
      }

      const label = type === proposed ? `**${type}**` : type;
      rows.push(`| ${label} | ${formatMs(transaction)} | ${formatMinutes(analysis)} |`);
    }

    const [proposedTransaction, , proposedAnalysis] = PERFORMANCE_PROFILES[proposed];

    return [
      `## Performance Simulation Report (${rowCount} Rows)`,
      'The time estimates below are simulated (rule-based) for relative comparison:',
      '',
      '### Comparison Table for All Processing Types:',
      '| Processing Type | Simple Transaction (Latency) | Complex Analysis (Throughput) |',
      '| :--- | :--- | :--- |',
      ...rows,
      '',
      `### Estimation Details for Proposed Type (${proposed}):`,
      `- **Simple Transaction (1 row):** ${formatMs(timeFor(proposedTransaction))}`,
      `- **Complex Analysis (${rowCount} rows):** ${formatMinutes(timeFor(proposedAnalysis))}`,
      '',
      '## Performance Conclusion',
      `From this simulation, the best type for **Transaction Speed** is: **${bestTransaction?.type}**.`,
      `The best type for **High Volume Analysis** is: **${bestAnalysis?.type}**.`,
    ].join('\n');
  }
}

function formatMs(ms: number): string {
  return `${ms.toFixed(3)} ms`;
}

function formatMinutes(ms: number): string {
  return `${(ms / 1000 / 60).toFixed(2)} min`;
}
