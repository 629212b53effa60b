import { INVALID_USAGE_TYPE_MESSAGE } from '../constants/performance-profiles';
import { PerformanceEstimatorService, toUsageType } from './performance-estimator.service';

describe('PerformanceEstimatorService', () => {
  const estimator = new PerformanceEstimatorService();
  const ddl = 'CREATE TABLE events (id BIGINT, payload JSONB);';

  it('builds the full comparison report', () => {
    expect(estimator.estimate(ddl, 1000000, 'OLAP')).toBe(
      [
        '## Performance Simulation Report (1000000 Rows)',
        'The time estimates below are simulated (rule-based) for relative comparison:',
        '',
        '### Comparison Table for All Processing Types:',
        '| Processing Type | Simple Transaction (Latency) | Complex Analysis (Throughput) |',
        '| :--- | :--- | :--- |',
        '| OLTP | 100.000 ms | 8.33 min |',
        '| **OLAP** | 10000.000 ms | 0.33 min |',
        '| HTAP | 500.000 ms | 0.67 min |',
        '| STREAM | 10.000 ms | 16.67 min |',
        '| OLLP | 1.000 ms | 33.33 min |',
        '| BATCH | 50000.000 ms | 0.08 min |',
        '',
        '### Estimation Details for Proposed Type (OLAP):',
        '- **Simple Transaction (1 row):** 10000.000 ms',
        '- **Complex Analysis (1000000 rows):** 0.33 min',
        '',
        '## Performance Conclusion',
        'From this simulation, the best type for **Transaction Speed** is: **OLLP**.',
        'The best type for **High Volume Analysis** is: **BATCH**.',
      ].join('\n'),
    );
  });

  it('never scales below one step', () => {
    const report = estimator.estimate(ddl, 5000, 'oltp');

    expect(report.split('\n')).toContain('| **OLTP** | 10.000 ms | 0.83 min |');
    expect(report.split('\n')).toContain('### Estimation Details for Proposed Type (OLTP):');
  });

  it('rejects an unknown usage type', () => {
    expect(estimator.estimate(ddl, 1000, 'NOSQL')).toBe(INVALID_USAGE_TYPE_MESSAGE);
  });
});

describe('toUsageType', () => {
  it('normalises case', () => {
    expect(toUsageType('stream')).toBe('STREAM');
    expect(toUsageType('Batch')).toBe('BATCH');
  });

  it('returns undefined for unknown labels', () => {
    expect(toUsageType('graph')).toBeUndefined();
  });
});
