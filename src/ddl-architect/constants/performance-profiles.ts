import { PerformanceProfile, UsageType } from '../types/ddl-architect.types';

export const BASE_FACTOR_MS = 100.0;
export const ROWS_PER_SCALE_STEP = 100000;

// Iteration order decides ties in the conclusion.
export const PERFORMANCE_PROFILES: Record<UsageType, PerformanceProfile> = {
  OLTP: [0.1, 100.0, 500.0],
  OLAP: [10.0, 5.0, 20.0],
  HTAP: [0.5, 8.0, 40.0],
  STREAM: [0.01, 200.0, 1000.0],
  OLLP: [0.001, 500.0, 2000.0],
  BATCH: [50.0, 1.0, 5.0],
};

export const INVALID_USAGE_TYPE_MESSAGE =
  'ERROR: Proposed usage type is invalid for performance estimation.';
