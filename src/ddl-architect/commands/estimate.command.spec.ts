import { InputError } from '../ddl-architect.errors';
import { InputService } from '../services/input.service';
import { PerformanceEstimatorService } from '../services/performance-estimator.service';
import { EstimateCommand, parseRowCount } from './estimate.command';

describe('EstimateCommand', () => {
  let inputService: InputService;
  let command: EstimateCommand;
  let log: jest.SpyInstance;
  let errorLog: jest.SpyInstance;

  beforeEach(() => {
    inputService = new InputService();
    jest.spyOn(inputService, 'read').mockResolvedValue('CREATE TABLE a (id INT);');
    command = new EstimateCommand(inputService, new PerformanceEstimatorService());
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    errorLog = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    process.exitCode = undefined;
  });

  it('prints the estimator output', async () => {
    await command.run(['schema.sql'], { rows: '1000', usageType: 'bogus' });

    expect(log).toHaveBeenCalledWith(
      'ERROR: Proposed usage type is invalid for performance estimation.',
    );
    expect(errorLog).not.toHaveBeenCalled();
  });

  it('reports a bad row count as a command error', async () => {
    await command.run(['schema.sql'], { rows: 'many', usageType: 'OLTP' });

    expect(errorLog).toHaveBeenCalledWith(
      'Error estimating performance:',
      '--rows must be a non-negative integer, got "many"',
    );
    expect(process.exitCode).toBe(1);
    expect(log).not.toHaveBeenCalled();
  });

  describe('parseRowCount', () => {
    it('accepts non-negative integers', () => {
      expect(parseRowCount('0')).toBe(0);
      expect(parseRowCount('250000')).toBe(250000);
    });

    it.each([[''], ['-5'], ['1.5'], ['ten']])('rejects %j', (value) => {
      expect(() => parseRowCount(value)).toThrow(InputError);
    });
  });
});
