import { Command, CommandRunner } from 'nest-commander';
import { DependencyResolverService } from '../services/dependency-resolver.service';
import { InputService } from '../services/input.service';
import { reportError } from './report-error';

@Command({
  name: 'order',
  arguments: '[file]',
  description: 'Order CREATE TABLE statements by FOREIGN KEY dependency (reads stdin without a file)',
})
export class OrderCommand extends CommandRunner {
  constructor(
    private readonly inputService: InputService,
    private readonly resolver: DependencyResolverService,
  ) {
    super();
  }

  async run(passedParams: string[]): Promise<void> {
    try {
      const sql = await this.inputService.read(passedParams[0]);
      console.log(this.resolver.resolve(sql));
    } catch (error) {
      reportError('ordering statements', error);
    }
  }
}
