import { Command, CommandRunner, Option } from 'nest-commander';
import { InputService } from '../services/input.service';
import { SchemaValidatorService } from '../services/schema-validator.service';
import { reportError } from './report-error';

interface ValidateOptions {
  sampleData?: string;
}

@Command({
  name: 'validate',
  arguments: '[file]',
  description: 'Check DDL against JSON sample data',
})
export class ValidateCommand extends CommandRunner {
  constructor(
    private readonly inputService: InputService,
    private readonly validator: SchemaValidatorService,
  ) {
    super();
  }

  async run(passedParams: string[], options: ValidateOptions): Promise<void> {
    try {
      const ddl = await this.inputService.read(passedParams[0]);
      const sampleData = options.sampleData
        ? await this.inputService.read(options.sampleData)
        : '';
      console.log(this.validator.validate(ddl, sampleData));
    } catch (error) {
      reportError('validating schema', error);
    }
  }

  @Option({
    flags: '--sample-data <file>',
    description: 'JSON file with sample rows',
  })
  parseSampleData(val: string): string {
    return val;
  }
}
