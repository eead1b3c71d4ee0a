import Table from 'cli-table3';
import chalk from 'chalk';
import type { CheckMode, MetricDefinition } from '@srxprobe/shared';
import { formatRange, formatThresholds } from '../utils/format.js';

export interface ModeRow {
  mode: CheckMode;
  metric: MetricDefinition;
  needsInterface: boolean;
}

export function renderModesTable(rows: readonly ModeRow[]): string {
  const table = new Table({
    head: [chalk.bold('mode'), chalk.bold('reports'), chalk.bold('thresholds'), chalk.bold('interface')],
    style: {
      head: [],
      border: ['gray'],
    },
  });

  for (const row of rows) {
    table.push([
      row.mode,
      row.metric.description,
      formatThresholds(row.metric),
      row.needsInterface ? chalk.cyan('required') : chalk.gray('-'),
    ]);
  }

  return table.toString();
}

export function renderCatalogTable(metrics: readonly MetricDefinition[]): string {
  const table = new Table({
    head: [
      chalk.bold('id'),
      chalk.bold('address'),
      chalk.bold('description'),
      chalk.bold('thresholds'),
      chalk.bold('range'),
    ],
    style: {
      head: [],
      border: ['gray'],
    },
  });

  for (const metric of metrics) {
    table.push([
      metric.id,
      chalk.gray(metric.address),
      metric.description,
      formatThresholds(metric),
      formatRange(metric),
    ]);
  }

  return table.toString();
}

export function renderMetricDetail(metric: MetricDefinition): string {
  const lines: string[] = [];

  lines.push(chalk.bold(`\n  ${metric.id}`));
  lines.push(`  Description: ${metric.description}`);
  lines.push(`  Address:     ${metric.address}`);
  lines.push(`  Thresholds:  ${formatThresholds(metric)}`);
  lines.push(`  Range:       ${formatRange(metric)}`);
  if (metric.capacityMetric) {
    lines.push(`  Capacity:    ${metric.capacityMetric}`);
  }
  if (metric.diagnosticHint) {
    lines.push(`  Diagnose:    ${metric.diagnosticHint}`);
  }
  if (metric.remediationActions.length > 0) {
    lines.push('');
    lines.push(chalk.bold('  Suggested actions'));
    for (const action of metric.remediationActions) {
      lines.push(`  - ${action}`);
    }
  }
  lines.push('');

  return lines.join('\n');
}
