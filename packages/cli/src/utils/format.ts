import chalk from 'chalk';
import type { MetricDefinition } from '@srxprobe/shared';
import { formatNumber } from '@srxprobe/shared';

/** "80 / 90 %", or a dash for entries that carry no thresholds. */
export function formatThresholds(metric: MetricDefinition): string {
  if (metric.warningThreshold === 0 && metric.criticalThreshold === 0) return chalk.gray('-');
  const unit = metric.unit ? ` ${metric.unit}` : '';
  return `${chalk.yellow(formatNumber(metric.warningThreshold))} / ${chalk.red(formatNumber(metric.criticalThreshold))}${unit}`;
}

export function formatRange(metric: MetricDefinition): string {
  if (metric.minimum === undefined && metric.maximum === undefined) return chalk.gray('-');
  const low = metric.minimum === undefined ? '' : formatNumber(metric.minimum);
  const high = metric.maximum === undefined ? '' : formatNumber(metric.maximum);
  return `${low}..${high}`;
}
