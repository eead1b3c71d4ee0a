export type {
  CheckStatus,
  RankedStatus,
  CheckMode,
  SnmpVersion,
  CheckRequest,
  EvaluationOutcome,
  InterfaceStatus,
} from './check.js';

export type { MetricUnit, MetricDefinition, MetricCatalogData } from './catalog.js';

export type { ReadingValue, RawReading, Reading, ReadingSet } from './readings.js';
