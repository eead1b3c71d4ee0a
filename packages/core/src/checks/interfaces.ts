import { ConfigurationError, TransportError, parseNumeric } from '@srxprobe/shared';
import type { EvaluationOutcome } from '@srxprobe/shared';
import type { CheckContext } from './CheckContext.js';
import {
  InterfaceStateResolver,
  statusName,
  type InterfaceResolution,
} from '../interfaces/InterfaceStateResolver.js';
import { findInstance, parseReadings, requireReadings } from '../readings/ReadingParser.js';
import type { PerfDataRecord } from '../perfdata/PerfDataFormatter.js';
import { buildOutcome, failureOutcome, withRemediation } from '../result/ResultBuilder.js';

type ResolvedInterface = Extract<InterfaceResolution, { state: 'resolved' }>;

function requireInterfaceName(ctx: CheckContext): string {
  const name = ctx.request.interfaceName;
  if (!name) {
    throw new ConfigurationError([`mode ${ctx.request.mode} requires an interface name`]);
  }
  return name;
}

function statusRecords(resolved: ResolvedInterface): PerfDataRecord[] {
  return [
    { label: 'admin_status', value: resolved.status.adminCode, minimum: 1, maximum: 7 },
    { label: 'oper_status', value: resolved.status.operCode, minimum: 1, maximum: 7 },
  ];
}

function describeResolved(resolved: ResolvedInterface): string {
  const { name, index, status, classification } = resolved;
  if (classification.faults.length > 0) {
    return `Interface ${name} (index ${index}) is ${classification.faults.join(' and ')}`;
  }
  return `Interface ${name} (index ${index}) is admin ${statusName(status.adminCode)}, oper ${statusName(status.operCode)}`;
}

async function resolveInterface(
  ctx: CheckContext,
): Promise<{ resolved: ResolvedInterface } | { outcome: EvaluationOutcome }> {
  const name = requireInterfaceName(ctx);
  const metric = ctx.catalog.get('interface_status');
  const resolution = await new InterfaceStateResolver(ctx.collector, ctx.catalog).resolve(name);

  if (resolution.state === 'failed') {
    ctx.logger.debug({ name, reason: resolution.reason }, 'Interface resolution failed');
    return {
      outcome: buildOutcome(
        resolution.severity,
        withRemediation(metric, resolution.severity, resolution.reason, name),
      ),
    };
  }

  ctx.logger.debug(
    { name, index: resolution.index, status: resolution.status },
    'Interface resolved',
  );
  return { resolved: resolution };
}

export async function checkInterfaceStatus(ctx: CheckContext): Promise<EvaluationOutcome> {
  const result = await resolveInterface(ctx);
  if ('outcome' in result) return result.outcome;

  const { resolved } = result;
  const severity = resolved.classification.severity;
  const metric = ctx.catalog.get('interface_status');
  return buildOutcome(
    severity,
    withRemediation(metric, severity, describeResolved(resolved), resolved.name),
    statusRecords(resolved),
  );
}

/**
 * Same classification as `checkInterfaceStatus`, with the informational
 * interface counters added to the performance data. Counters never change
 * the severity.
 */
export async function checkInterfaceStatusDetail(ctx: CheckContext): Promise<EvaluationOutcome> {
  const result = await resolveInterface(ctx);
  if ('outcome' in result) return result.outcome;

  const { resolved } = result;
  const severity = resolved.classification.severity;
  const metric = ctx.catalog.get('interface_status');
  const counters = ctx.catalog.informational();
  const records = statusRecords(resolved);
  let message = describeResolved(resolved);

  try {
    const raw = await ctx.collector.get(
      counters.map((counter) => `${counter.address}.${resolved.index}`),
    );
    for (const counter of counters) {
      const reading = findInstance(raw, `${counter.address}.${resolved.index}`);
      const value = reading ? parseNumeric(reading.rawValue) : undefined;
      if (value === undefined) {
        ctx.logger.debug({ counter: counter.id, index: resolved.index }, 'Counter not available');
        continue;
      }
      records.push({ label: counter.id, value, minimum: 0 });
    }
  } catch (err) {
    if (!(err instanceof TransportError)) throw err;
    ctx.logger.warn({ err, name: resolved.name }, 'Interface counters unavailable');
    message += ' (interface counters unavailable)';
  }

  return buildOutcome(
    severity,
    withRemediation(metric, severity, message, resolved.name),
    records,
  );
}

function compareIndex(a: string, b: string): number {
  const left = parseNumeric(a);
  const right = parseNumeric(b);
  if (left !== undefined && right !== undefined) return left - right;
  return a.localeCompare(b);
}

export async function checkInterfaceList(ctx: CheckContext): Promise<EvaluationOutcome> {
  const metric = ctx.catalog.get('interface_status');

  let entries: Array<[string, string]>;
  try {
    const raw = await ctx.collector.walk(metric.address);
    const readings = requireReadings(parseReadings(raw, metric.address), 'interface_list', 'interface');
    entries = [...readings.values()].map((reading) => [reading.nodeKey, String(reading.rawValue)]);
  } catch (err) {
    return failureOutcome(metric, 'interface description table', err);
  }

  entries.sort(([a], [b]) => compareIndex(a, b));
  const listing = entries.map(([index, name]) => `${index}=${name}`).join(', ');
  return buildOutcome('OK', `${entries.length} interfaces: ${listing}`, [
    { label: 'interfaces', value: entries.length, minimum: 0 },
  ]);
}
