// Catalog
export { MetricCatalog, loadCatalog, DEFAULT_CATALOG_FILE } from './catalog/MetricCatalog.js';
export type { ThresholdOverride } from './catalog/MetricCatalog.js';

// Collectors
export type { ReadingCollector, CollectorFactory } from './collector/ReadingCollector.js';
export { SnmpCollector, createSnmpCollector } from './collector/SnmpCollector.js';
export type { SnmpCollectorOptions } from './collector/SnmpCollector.js';

// Readings
export {
  extractNodeKey,
  parseReadings,
  requireReadings,
  readNumber,
  readNumbers,
  findNodeByValue,
  findInstance,
} from './readings/ReadingParser.js';

// Evaluation
export {
  classify,
  sessionRatio,
  worstStatus,
  evaluateRatio,
  evaluateNodes,
} from './evaluation/ThresholdEvaluator.js';
export type { RatioEvaluation, NodeResult, NodeEvaluation } from './evaluation/ThresholdEvaluator.js';

// Interfaces
export {
  InterfaceStateResolver,
  classifyInterface,
  statusName,
} from './interfaces/InterfaceStateResolver.js';
export type {
  InterfaceClassification,
  InterfaceResolution,
} from './interfaces/InterfaceStateResolver.js';

// Performance data
export { formatPerfData, joinPerfData, parsePerfData } from './perfdata/PerfDataFormatter.js';
export type { PerfDataRecord, ParsedPerfData, PerfValue } from './perfdata/PerfDataFormatter.js';

// Results
export {
  buildOutcome,
  unknownOutcome,
  withRemediation,
  failureOutcome,
  renderOutcome,
  exitCodeFor,
} from './result/ResultBuilder.js';

// Checks
export type { CheckContext } from './checks/CheckContext.js';
export { checkSessionUsage } from './checks/sessions.js';
export type { SessionMetricId } from './checks/sessions.js';
export { checkNodeMetric } from './checks/nodes.js';
export type { NodeMetricId } from './checks/nodes.js';
export {
  checkInterfaceStatus,
  checkInterfaceStatusDetail,
  checkInterfaceList,
} from './checks/interfaces.js';

// Dispatch
export { parseMode, dispatchCheck, metricIdForMode } from './dispatch/ModeDispatcher.js';
export { CheckRunner, parseCheckRequest } from './CheckRunner.js';
export type { CheckRunnerOptions } from './CheckRunner.js';
