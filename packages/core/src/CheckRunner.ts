import type pino from 'pino';
import { ConfigurationError, checkRequestSchema, formatDuration, getLogger } from '@srxprobe/shared';
import type { CheckRequest, CheckRequestFields, EvaluationOutcome } from '@srxprobe/shared';
import { loadCatalog, type MetricCatalog } from './catalog/MetricCatalog.js';
import type { CollectorFactory } from './collector/ReadingCollector.js';
import { createSnmpCollector } from './collector/SnmpCollector.js';
import { dispatchCheck } from './dispatch/ModeDispatcher.js';

export interface CheckRunnerOptions {
  catalog?: MetricCatalog;
  collectorFactory?: CollectorFactory;
  logger?: pino.Logger;
}

/**
 * Validate raw invocation fields into a request. Fails with a
 * ConfigurationError; nothing touches the network here.
 */
export function parseCheckRequest(input: CheckRequestFields): CheckRequest {
  const result = checkRequestSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
      ),
    );
  }
  return result.data;
}

export class CheckRunner {
  private catalog: MetricCatalog;
  private collectorFactory: CollectorFactory;
  private logger: pino.Logger;

  constructor(options: CheckRunnerOptions = {}) {
    this.catalog = options.catalog ?? loadCatalog();
    this.collectorFactory = options.collectorFactory ?? createSnmpCollector;
    this.logger = options.logger ?? getLogger();
  }

  async run(input: CheckRequestFields): Promise<EvaluationOutcome> {
    const request = parseCheckRequest(input);
    const collector = this.collectorFactory(request);
    const logger = this.logger.child({ mode: request.mode, target: request.target });

    logger.debug(
      { port: request.port, timeout: formatDuration(request.timeoutMs), version: request.version },
      'Running check',
    );
    try {
      const outcome = await dispatchCheck({ request, catalog: this.catalog, collector, logger });
      logger.debug({ status: outcome.status }, 'Check finished');
      return outcome;
    } finally {
      collector.close();
    }
  }
}
