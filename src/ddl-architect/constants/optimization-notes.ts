import { UsageType } from '../types/ddl-architect.types';

export const OPTIMIZATION_NOTES: Record<UsageType, string> = {
  OLTP: 'Optimized for high-volume write speed and data integrity (suggesting indexes on FK/PK and proper normalization).',
  OLAP: 'Optimized for read speed and aggregation (suggesting Columnar Indexes, partitioning by time, or denormalization).',
  HTAP: 'Optimized for low latency on real-time data analytics (suggesting In-Memory tables or hybrid indexing).',
  OLLP: 'Optimized for sub-millisecond decisions (ensuring minimal structure, focusing on data locality and low network overhead).',
  BATCH:
    'Optimized for high-throughput scheduled processing (suggesting large block sizes, table partitioning for parallel loading, and minimal indexing during load).',
  STREAM:
    'Optimized for continuous ingestion and real-time event detection (suggesting Time-Series partitioning, Kafka integration points, and high-speed primary key lookups).',
};

export const GENERAL_OPTIMIZATION_NOTE =
  'General optimization applied. No specific processing type detected.';
