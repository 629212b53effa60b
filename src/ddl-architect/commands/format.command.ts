import { Command, CommandRunner } from 'nest-commander';
import { InputService } from '../services/input.service';
import { ResponseFormatterService } from '../services/response-formatter.service';
import { reportError } from './report-error';

@Command({
  name: 'format',
  arguments: '[file]',
  description: 'Reorder the DDL inside every ```sql block of a Markdown text',
})
export class FormatCommand extends CommandRunner {
  constructor(
    private readonly inputService: InputService,
    private readonly formatter: ResponseFormatterService,
  ) {
    super();
  }

  async run(passedParams: string[]): Promise<void> {
    try {
      const text = await this.inputService.read(passedParams[0]);
      console.log(this.formatter.format(text));
    } catch (error) {
      reportError('formatting response', error);
    }
  }
}
