import { formatNumber } from '@srxprobe/shared';
import type { EvaluationOutcome, MetricDefinition } from '@srxprobe/shared';
import type { CheckContext } from './CheckContext.js';
import { parseReadings, readNumbers, requireReadings } from '../readings/ReadingParser.js';
import { evaluateNodes, type NodeResult } from '../evaluation/ThresholdEvaluator.js';
import type { PerfDataRecord } from '../perfdata/PerfDataFormatter.js';
import {
  buildOutcome,
  failureOutcome,
  unknownOutcome,
  withRemediation,
} from '../result/ResultBuilder.js';

export type NodeMetricId = 'cpu_load_re' | 'cpu_load_fpc' | 'memory_fpc' | 'memory_re' | 'temperature';

function formatValue(metric: MetricDefinition, value: number): string {
  return `${formatNumber(value)}${metric.unit}`;
}

function nodeName(nodeKey: string): string {
  return nodeKey === '' ? 'value' : `node ${nodeKey}`;
}

function describeOffender(metric: MetricDefinition, node: NodeResult): string {
  const threshold =
    node.status === 'CRITICAL' ? metric.criticalThreshold : metric.warningThreshold;
  return `${nodeName(node.nodeKey)} ${node.status} at ${formatValue(metric, node.value)} (threshold ${formatValue(metric, threshold)})`;
}

function toRecord(metric: MetricDefinition, node: NodeResult): PerfDataRecord {
  return {
    label: node.nodeKey === '' ? metric.id : `${metric.id}_${node.nodeKey}`,
    value: node.value,
    // 'C' is not a performance data unit
    uom: metric.unit === '%' ? '%' : '',
    warning: metric.warningThreshold,
    critical: metric.criticalThreshold,
    minimum: metric.minimum,
    maximum: metric.maximum,
  };
}

/**
 * Per-node absolute-value check: every node is classified on its own and
 * the most severe node decides the result.
 */
export async function checkNodeMetric(
  ctx: CheckContext,
  metricId: NodeMetricId,
): Promise<EvaluationOutcome> {
  const metric = ctx.catalog.get(metricId);

  let values: Map<string, number>;
  try {
    const raw = await ctx.collector.walk(metric.address);
    const readings = requireReadings(parseReadings(raw, metric.address), metric.id, 'node');
    values = readNumbers(readings, metric.id);
  } catch (err) {
    return failureOutcome(metric, 'node values', err);
  }

  const evaluation = evaluateNodes(metric, values);
  ctx.logger.debug(
    { metric: metric.id, nodes: evaluation.nodes.length, status: evaluation.status },
    'Evaluated node values',
  );

  if (evaluation.status === 'UNKNOWN') {
    return unknownOutcome(`${metric.description}: no node values to evaluate`);
  }

  const records = evaluation.nodes.map((node) => toRecord(metric, node));

  if (evaluation.status === 'OK') {
    const highest = evaluation.nodes.reduce((a, b) => (b.value > a.value ? b : a));
    const count = evaluation.nodes.length;
    return buildOutcome(
      'OK',
      `${metric.description}: ${count} ${count === 1 ? 'node' : 'nodes'} OK, highest ${formatValue(metric, highest.value)} (${nodeName(highest.nodeKey)})`,
      records,
    );
  }

  const message = `${metric.description}: ${evaluation.offenders
    .map((node) => describeOffender(metric, node))
    .join(', ')}`;
  return buildOutcome(evaluation.status, withRemediation(metric, evaluation.status, message), records);
}
