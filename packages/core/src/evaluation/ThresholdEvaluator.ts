import { STATUS_RANK } from '@srxprobe/shared';
import type { CheckStatus, MetricDefinition, RankedStatus } from '@srxprobe/shared';

export interface RatioEvaluation {
  status: RankedStatus;
  current: number;
  max: number;
  /** 0-100 */
  percentage: number;
}

export interface NodeResult {
  nodeKey: string;
  value: number;
  status: RankedStatus;
}

export interface NodeEvaluation {
  status: CheckStatus;
  nodes: NodeResult[];
  /** Nodes that are not OK, most severe first. */
  offenders: NodeResult[];
}

export function classify(value: number, warning: number, critical: number): RankedStatus {
  if (value < warning) return 'OK';
  if (value < critical) return 'WARNING';
  return 'CRITICAL';
}

/**
 * Share of capacity in use, as a fraction or on `scale` (100 for a
 * percentage). A capacity of 0 (counter unsupported or not yet
 * initialised) reads as 0, so it can never raise on its own and may
 * under-report a real exhaustion.
 */
export function sessionRatio(current: number, max: number, scale = 1): number {
  if (max === 0) return 0;
  return (current * scale) / max;
}

export function worstStatus(statuses: Iterable<RankedStatus>): RankedStatus {
  let worst: RankedStatus = 'OK';
  for (const status of statuses) {
    if (STATUS_RANK[status] > STATUS_RANK[worst]) worst = status;
  }
  return worst;
}

export function evaluateRatio(metric: MetricDefinition, current: number, max: number): RatioEvaluation {
  const percentage = sessionRatio(current, max, 100);
  return {
    status: classify(percentage, metric.warningThreshold, metric.criticalThreshold),
    current,
    max,
    percentage,
  };
}

export function evaluateNodes(
  metric: MetricDefinition,
  values: ReadonlyMap<string, number>,
): NodeEvaluation {
  if (values.size === 0) {
    return { status: 'UNKNOWN', nodes: [], offenders: [] };
  }

  const nodes: NodeResult[] = [...values].map(([nodeKey, value]) => ({
    nodeKey,
    value,
    status: classify(value, metric.warningThreshold, metric.criticalThreshold),
  }));

  const offenders = nodes
    .filter((node) => node.status !== 'OK')
    .sort((a, b) => STATUS_RANK[b.status] - STATUS_RANK[a.status]);

  return { status: worstStatus(nodes.map((node) => node.status)), nodes, offenders };
}
