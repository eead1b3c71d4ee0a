import snmp from 'net-snmp';
import type { Session, Varbind } from 'net-snmp';
import { DEFAULT_MAX_REPETITIONS, TransportError } from '@srxprobe/shared';
import type { CheckRequest, RawReading, ReadingValue } from '@srxprobe/shared';
import type { ReadingCollector } from './ReadingCollector.js';

export interface SnmpCollectorOptions {
  maxRepetitions?: number;
}

interface Deadline {
  readonly expired: boolean;
  /** Re-arm after progress from the agent. */
  touch(): void;
  clear(): void;
}

function toReadingValue(varbind: Varbind): ReadingValue {
  const { value } = varbind;
  if (typeof value === 'number' || typeof value === 'string') return value;
  if (Buffer.isBuffer(value)) {
    // Counter64 arrives as the raw big-endian bytes, without leading zeros
    if (varbind.type === snmp.ObjectType.Counter64) {
      const bytes = Buffer.alloc(8);
      value.copy(bytes, Math.max(0, 8 - value.length), Math.max(0, value.length - 8));
      return Number(bytes.readBigUInt64BE());
    }
    return value.toString('utf-8');
  }
  return String(value);
}

function reasonOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** SNMPv1 agents fail the whole request when one instance is missing. */
function isNoSuchName(error: Error): boolean {
  return (
    error.name === 'RequestFailedError' &&
    'status' in error &&
    error.status === snmp.ErrorStatus.NoSuchName
  );
}

/**
 * SNMP v1/v2c implementation of the reading collector.
 *
 * `timeoutMs` bounds the wait for each response: a walk that keeps
 * receiving pages may take longer in total.
 */
export class SnmpCollector implements ReadingCollector {
  private readonly session: Session;
  private readonly timeoutMs: number;
  private readonly maxRepetitions: number;

  constructor(request: CheckRequest, options: SnmpCollectorOptions = {}) {
    this.timeoutMs = request.timeoutMs;
    this.maxRepetitions = options.maxRepetitions ?? DEFAULT_MAX_REPETITIONS;
    this.session = snmp.createSession(request.target, request.community, {
      port: request.port,
      timeout: request.timeoutMs,
      retries: 0,
      version: request.version === '1' ? snmp.Version1 : snmp.Version2c,
    });
    // Socket errors also surface through the pending request callbacks.
    this.session.on('error', () => undefined);
  }

  walk(address: string): Promise<RawReading[]> {
    return new Promise<RawReading[]>((resolve, reject) => {
      const readings: RawReading[] = [];
      let varbindFailure: string | null = null;
      const deadline = this.startDeadline(address, reject);

      const feed = (varbinds: Varbind[]): boolean => {
        if (deadline.expired) return true;
        deadline.touch();
        for (const varbind of varbinds) {
          if (snmp.isVarbindError(varbind)) {
            varbindFailure = snmp.varbindError(varbind);
            return true;
          }
          readings.push({ identifier: varbind.oid, value: toReadingValue(varbind) });
        }
        return false;
      };

      const done = (error?: Error | null): void => {
        deadline.clear();
        if (error) {
          reject(new TransportError(address, reasonOf(error)));
        } else if (varbindFailure) {
          reject(new TransportError(address, varbindFailure));
        } else {
          resolve(readings);
        }
      };

      try {
        this.session.subtree(address, this.maxRepetitions, feed, done);
      } catch (err) {
        deadline.clear();
        reject(new TransportError(address, reasonOf(err)));
      }
    });
  }

  async get(addresses: string[]): Promise<RawReading[]> {
    const readings = await this.fetch(addresses);
    if (readings !== null) return readings;
    if (addresses.length === 1) return [];

    // Ask one at a time to find out which instances the agent has.
    const found: RawReading[] = [];
    for (const address of addresses) {
      found.push(...((await this.fetch([address])) ?? []));
    }
    return found;
  }

  close(): void {
    this.session.close();
  }

  /** Resolves `null` when the agent rejects the request with noSuchName. */
  private fetch(addresses: string[]): Promise<RawReading[] | null> {
    const label = addresses.join(', ');
    return new Promise<RawReading[] | null>((resolve, reject) => {
      const deadline = this.startDeadline(label, reject);

      const callback = (error: Error | null, varbinds?: Varbind[]): void => {
        deadline.clear();
        if (error) {
          if (isNoSuchName(error)) resolve(null);
          else reject(new TransportError(label, reasonOf(error)));
          return;
        }
        const readings: RawReading[] = [];
        for (const varbind of varbinds ?? []) {
          // noSuchObject / noSuchInstance: the agent does not have it
          if (snmp.isVarbindError(varbind)) continue;
          readings.push({ identifier: varbind.oid, value: toReadingValue(varbind) });
        }
        resolve(readings);
      };

      try {
        this.session.get(addresses, callback);
      } catch (err) {
        deadline.clear();
        reject(new TransportError(label, reasonOf(err)));
      }
    });
  }

  private startDeadline(address: string, reject: (err: TransportError) => void): Deadline {
    const waitMs = this.timeoutMs + 1000;
    let expired = false;
    const expire = (): void => {
      expired = true;
      reject(new TransportError(address, `no response within ${this.timeoutMs}ms`));
    };
    let timer = setTimeout(expire, waitMs);

    return {
      get expired() {
        return expired;
      },
      touch() {
        if (expired) return;
        clearTimeout(timer);
        timer = setTimeout(expire, waitMs);
      },
      clear() {
        clearTimeout(timer);
      },
    };
  }
}

export function createSnmpCollector(request: CheckRequest): ReadingCollector {
  return new SnmpCollector(request);
}
