import { EXIT_CODES, isRecoverableProbeError } from '@srxprobe/shared';
import type { CheckStatus, EvaluationOutcome, MetricDefinition } from '@srxprobe/shared';
import { joinPerfData, type PerfDataRecord } from '../perfdata/PerfDataFormatter.js';

export function buildOutcome(
  status: CheckStatus,
  message: string,
  records: readonly PerfDataRecord[] = [],
): EvaluationOutcome {
  return { status, message, perfdata: joinPerfData(records) };
}

export function unknownOutcome(message: string): EvaluationOutcome {
  return buildOutcome('UNKNOWN', message);
}

/**
 * Append the metric's diagnostic hint and remediation actions to a
 * WARNING or CRITICAL message. `<interface>` in the hint is replaced with
 * `interfaceName` when given.
 */
export function withRemediation(
  metric: MetricDefinition,
  status: CheckStatus,
  message: string,
  interfaceName?: string,
): string {
  if (status !== 'WARNING' && status !== 'CRITICAL') return message;

  const parts = [message];
  if (metric.diagnosticHint) {
    const hint = interfaceName
      ? metric.diagnosticHint.replace('<interface>', interfaceName)
      : metric.diagnosticHint;
    parts.push(`Diagnose with "${hint}"`);
  }
  if (metric.remediationActions.length > 0) {
    parts.push(`Suggested actions: ${metric.remediationActions.join('; ')}`);
  }
  return parts.join('. ');
}

/**
 * Turn a recoverable probe error into a status result naming the metric
 * and the quantity that could not be read. Anything else is re-thrown.
 */
export function failureOutcome(
  metric: MetricDefinition,
  quantity: string,
  err: unknown,
  status: 'UNKNOWN' | 'CRITICAL' = 'UNKNOWN',
): EvaluationOutcome {
  if (!isRecoverableProbeError(err)) throw err;
  return buildOutcome(status, `${metric.description}: ${quantity} unavailable (${err.message})`);
}

export function renderOutcome(outcome: EvaluationOutcome): string {
  // '|' starts the performance data section
  const message = outcome.message.replaceAll('|', '/').replaceAll('\n', ' ');
  const line = `${outcome.status} - ${message}`;
  return outcome.perfdata ? `${line} | ${outcome.perfdata}` : line;
}

export function exitCodeFor(status: CheckStatus): number {
  return EXIT_CODES[status];
}
