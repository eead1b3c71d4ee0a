import type pino from 'pino';
import type { CheckRequest } from '@srxprobe/shared';
import type { MetricCatalog } from '../catalog/MetricCatalog.js';
import type { ReadingCollector } from '../collector/ReadingCollector.js';

/**
 * Everything a check routine may touch. Built per invocation and passed
 * explicitly; nothing is shared between invocations.
 */
export interface CheckContext {
  readonly request: CheckRequest;
  readonly catalog: MetricCatalog;
  readonly collector: ReadingCollector;
  readonly logger: pino.Logger;
}
