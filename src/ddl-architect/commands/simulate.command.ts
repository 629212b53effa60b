import { Command, CommandRunner, Option } from 'nest-commander';
import { DmlSimulatorService } from '../services/dml-simulator.service';
import { reportError } from './report-error';

interface SimulateOptions {
  description?: string;
}

@Command({
  name: 'simulate',
  arguments: '<query>',
  description: 'Show a simulated result table for a SELECT query',
})
export class SimulateCommand extends CommandRunner {
  constructor(private readonly simulator: DmlSimulatorService) {
    super();
  }

  async run(passedParams: string[], options: SimulateOptions): Promise<void> {
    try {
      console.log(
        this.simulator.simulate(passedParams[0], options.description || 'query result'),
      );
    } catch (error) {
      reportError('simulating query', error);
    }
  }

  @Option({
    flags: '-d, --description <text>',
    description: 'Short description of what the query returns',
  })
  parseDescription(val: string): string {
    return val;
  }
}
