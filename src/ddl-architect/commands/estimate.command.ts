import { Command, CommandRunner, Option } from 'nest-commander';
import { InputError } from '../ddl-architect.errors';
import { InputService } from '../services/input.service';
import { PerformanceEstimatorService } from '../services/performance-estimator.service';
import { reportError } from './report-error';

export interface EstimateOptions {
  rows: string;
  usageType: string;
}

export function parseRowCount(value: string): number {
  const rows = Number(value);
  if (value.trim() === '' || !Number.isInteger(rows) || rows < 0) {
    throw new InputError(`--rows must be a non-negative integer, got "${value}"`);
  }
  return rows;
}

@Command({
  name: 'estimate',
  arguments: '[file]',
  description: 'Compare simulated query performance across processing types',
})
export class EstimateCommand extends CommandRunner {
  constructor(
    private readonly inputService: InputService,
    private readonly estimator: PerformanceEstimatorService,
  ) {
    super();
  }

  async run(passedParams: string[], options: EstimateOptions): Promise<void> {
    try {
      const rows = parseRowCount(options.rows);
      const ddl = await this.inputService.read(passedParams[0]);
      console.log(this.estimator.estimate(ddl, rows, options.usageType));
    } catch (error) {
      reportError('estimating performance', error);
    }
  }

  @Option({
    flags: '-r, --rows <number>',
    description: 'Anticipated total row count',
    required: true,
  })
  parseRows(val: string): string {
    return val;
  }

  @Option({
    flags: '-t, --usage-type <type>',
    description: 'Proposed processing type (OLTP, OLAP, HTAP, STREAM, OLLP, BATCH)',
    required: true,
  })
  parseUsageType(val: string): string {
    return val;
  }
}
