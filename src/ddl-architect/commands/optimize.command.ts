import { Command, CommandRunner, Option } from 'nest-commander';
import { DdlOptimizerService } from '../services/ddl-optimizer.service';
import { InputService } from '../services/input.service';
import { reportError } from './report-error';

interface OptimizeOptions {
  usageType: string;
}

@Command({
  name: 'optimize',
  arguments: '[file]',
  description: 'Append a workload-specific optimization note to DDL',
})
export class OptimizeCommand extends CommandRunner {
  constructor(
    private readonly inputService: InputService,
    private readonly optimizer: DdlOptimizerService,
  ) {
    super();
  }

  async run(passedParams: string[], options: OptimizeOptions): Promise<void> {
    try {
      const ddl = await this.inputService.read(passedParams[0]);
      console.log(this.optimizer.optimize(ddl, options.usageType));
    } catch (error) {
      reportError('optimizing schema', error);
    }
  }

  @Option({
    flags: '-t, --usage-type <type>',
    description: 'Processing type the schema serves',
    required: true,
  })
  parseUsageType(val: string): string {
    return val;
  }
}
