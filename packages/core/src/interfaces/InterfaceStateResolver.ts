import { IF_STATUS, NotFoundError, TransportError, isRecoverableProbeError } from '@srxprobe/shared';
import type { InterfaceStatus, RankedStatus } from '@srxprobe/shared';
import type { MetricCatalog } from '../catalog/MetricCatalog.js';
import type { ReadingCollector } from '../collector/ReadingCollector.js';
import {
  findInstance,
  findNodeByValue,
  parseReadings,
  readNumber,
} from '../readings/ReadingParser.js';

export interface InterfaceClassification {
  severity: RankedStatus;
  /** Fault descriptions in the order they were detected. */
  faults: string[];
}

export type InterfaceResolution =
  | {
      state: 'resolved';
      name: string;
      index: string;
      status: InterfaceStatus;
      classification: InterfaceClassification;
    }
  | {
      state: 'failed';
      name: string;
      severity: 'CRITICAL' | 'UNKNOWN';
      reason: string;
    };

const STATUS_NAMES: Readonly<Record<number, string>> = Object.fromEntries(
  Object.entries(IF_STATUS).map(([name, code]) => [code, name]),
);

export function statusName(code: number): string {
  return STATUS_NAMES[code] ?? `code ${code}`;
}

export function classifyInterface(status: InterfaceStatus): InterfaceClassification {
  const faults: string[] = [];
  if (status.adminCode === IF_STATUS.down) faults.push('administratively down');
  if (status.operCode === IF_STATUS.down) faults.push('down');
  if (status.operCode === IF_STATUS.lowerLayerDown) faults.push('lower layer down');
  return { severity: faults.length > 0 ? 'CRITICAL' : 'OK', faults };
}

/**
 * `<subject>: <step> unavailable (<cause>)`. A transport failure is
 * UNKNOWN; a missing or garbled reading is CRITICAL.
 */
function failed(name: string, subject: string, step: string, err: unknown): InterfaceResolution {
  if (!isRecoverableProbeError(err)) throw err;
  return {
    state: 'failed',
    name,
    severity: err instanceof TransportError ? 'UNKNOWN' : 'CRITICAL',
    reason: `${subject}: ${step} unavailable (${err.message})`,
  };
}

/**
 * Walks an interface from its name to a classification:
 * name -> ifIndex -> admin/oper status -> severity.
 *
 * A transport failure at any step resolves to UNKNOWN. Anything else that
 * stops the walk (unknown name, missing or garbled status) resolves to
 * CRITICAL: the named interface cannot be shown to be usable.
 */
export class InterfaceStateResolver {
  private collector: ReadingCollector;
  private catalog: MetricCatalog;

  constructor(collector: ReadingCollector, catalog: MetricCatalog) {
    this.collector = collector;
    this.catalog = catalog;
  }

  async resolve(name: string): Promise<InterfaceResolution> {
    let index: string;
    try {
      index = await this.resolveIndex(name);
    } catch (err) {
      if (err instanceof NotFoundError) {
        return { state: 'failed', name, severity: 'CRITICAL', reason: err.message };
      }
      return failed(name, `Interface ${name}`, 'interface description table', err);
    }

    let status: InterfaceStatus;
    try {
      status = await this.resolveStatus(index);
    } catch (err) {
      return failed(name, `Interface ${name} (index ${index})`, 'admin/oper status', err);
    }

    return {
      state: 'resolved',
      name,
      index,
      status,
      classification: classifyInterface(status),
    };
  }

  async resolveIndex(name: string): Promise<string> {
    const address = this.catalog.get('interface_status').address;
    const readings = parseReadings(await this.collector.walk(address), address);
    const index = findNodeByValue(readings, name);
    if (index === undefined) {
      throw new NotFoundError(`Interface ${name} not found in interface description table`);
    }
    return index;
  }

  async resolveStatus(index: string): Promise<InterfaceStatus> {
    const admin = this.catalog.get('interface_admin_status');
    const oper = this.catalog.get('interface_oper_status');
    const adminAddress = `${admin.address}.${index}`;
    const operAddress = `${oper.address}.${index}`;
    const raw = await this.collector.get([adminAddress, operAddress]);

    const adminReading = findInstance(raw, adminAddress);
    if (!adminReading) throw new NotFoundError(`${admin.id} not returned`);
    const operReading = findInstance(raw, operAddress);
    if (!operReading) throw new NotFoundError(`${oper.id} not returned`);

    return {
      adminCode: readNumber(adminReading, admin.id),
      operCode: readNumber(operReading, oper.id),
    };
  }
}
