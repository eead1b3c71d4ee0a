import { ConfigurationError, formatPercent } from '@srxprobe/shared';
import type { EvaluationOutcome, MetricDefinition } from '@srxprobe/shared';
import type { CheckContext } from './CheckContext.js';
import { parseReadings, readNumbers, requireReadings } from '../readings/ReadingParser.js';
import { evaluateRatio } from '../evaluation/ThresholdEvaluator.js';
import { buildOutcome, failureOutcome, withRemediation } from '../result/ResultBuilder.js';

export type SessionMetricId = 'cp_sessions' | 'flow_sessions';

/**
 * Sum a metric over every node (SPU) that reports it.
 */
async function pollTotal(
  ctx: CheckContext,
  metric: MetricDefinition,
  quantity: string,
): Promise<number> {
  const raw = await ctx.collector.walk(metric.address);
  const readings = requireReadings(parseReadings(raw, metric.address), metric.id, quantity);
  let total = 0;
  for (const value of readNumbers(readings, metric.id).values()) {
    total += value;
  }
  ctx.logger.debug({ metric: metric.id, nodes: readings.size, total }, 'Polled %s', quantity);
  return total;
}

export async function checkSessionUsage(
  ctx: CheckContext,
  metricId: SessionMetricId,
): Promise<EvaluationOutcome> {
  const metric = ctx.catalog.get(metricId);
  if (!metric.capacityMetric) {
    throw new ConfigurationError([`${metric.id}: catalog entry has no capacityMetric`]);
  }
  const capacity = ctx.catalog.get(metric.capacityMetric);

  let current: number;
  try {
    current = await pollTotal(ctx, metric, 'current sessions');
  } catch (err) {
    return failureOutcome(metric, 'current sessions', err);
  }

  let max: number;
  try {
    max = await pollTotal(ctx, capacity, 'maximum sessions');
  } catch (err) {
    return failureOutcome(metric, 'maximum sessions', err);
  }

  if (max === 0) {
    ctx.logger.warn({ metric: metric.id }, 'Session capacity reported as 0; treating usage as 0%');
  }

  const result = evaluateRatio(metric, current, max);

  let message = `${metric.description}: ${formatPercent(result.percentage)} (${current}/${max})`;
  if (result.status === 'WARNING') {
    message += `, at or above warning threshold ${metric.warningThreshold}%`;
  } else if (result.status === 'CRITICAL') {
    message += `, at or above critical threshold ${metric.criticalThreshold}%`;
  } else if (max === 0) {
    message += ', capacity reported as 0';
  }

  return buildOutcome(result.status, withRemediation(metric, result.status, message), [
    {
      label: metric.id,
      value: result.percentage,
      uom: '%',
      warning: metric.warningThreshold,
      critical: metric.criticalThreshold,
      minimum: 0,
      maximum: 100,
    },
    {
      label: `${metric.id}_current`,
      value: current,
      minimum: 0,
      maximum: max,
    },
  ]);
}
