// Types
export type {
  CheckStatus,
  RankedStatus,
  CheckMode,
  SnmpVersion,
  CheckRequest,
  EvaluationOutcome,
  InterfaceStatus,
  MetricUnit,
  MetricDefinition,
  MetricCatalogData,
  ReadingValue,
  RawReading,
  Reading,
  ReadingSet,
} from './types/index.js';

// Constants
export {
  PROBE_VERSION,
  DEFAULT_SNMP_PORT,
  DEFAULT_TIMEOUT,
  DEFAULT_COMMUNITY,
  DEFAULT_SNMP_VERSION,
  DEFAULT_MAX_REPETITIONS,
  CHECK_MODES,
  INTERFACE_MODES,
  STATUS_RANK,
  EXIT_CODES,
  CONFIGURATION_ERROR_EXIT_CODE,
  IF_STATUS,
} from './constants.js';

// Schemas
export { metricDefinitionSchema, metricCatalogSchema } from './schemas/catalog.schema.js';
export type {
  ValidatedMetricDefinition,
  ValidatedMetricCatalog,
} from './schemas/catalog.schema.js';

export { checkModeSchema, checkRequestSchema } from './schemas/request.schema.js';
export type { CheckRequestFields } from './schemas/request.schema.js';

// Utilities
export {
  parseDuration,
  formatDuration,
  formatNumber,
  formatPercent,
  parseNumeric,
} from './utils/parser.js';

export { createLogger, getLogger, setDefaultLogger } from './utils/logger.js';
export type { LogLevel, CreateLoggerOptions } from './utils/logger.js';

export {
  ProbeError,
  TransportError,
  NotFoundError,
  MalformedReadingError,
  ConfigurationError,
  isRecoverableProbeError,
} from './utils/errors.js';
