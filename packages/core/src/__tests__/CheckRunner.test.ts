import { describe, it, expect, vi } from 'vitest';
import { CHECK_MODES, ConfigurationError } from '@srxprobe/shared';
import type { CheckRequest } from '@srxprobe/shared';
import { CheckRunner, parseCheckRequest } from '../CheckRunner.js';
import { FakeCollector, OID, defaultCatalog, silentLogger } from './fakes.js';

function createRunner(collector: FakeCollector) {
  const collectorFactory = vi.fn((_request: CheckRequest) => collector);
  const runner = new CheckRunner({ catalog: defaultCatalog, collectorFactory, logger: silentLogger });
  return { runner, collectorFactory };
}

async function configurationErrors(promise: Promise<unknown>): Promise<string[]> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof ConfigurationError) return err.errors;
    throw err;
  }
  throw new Error('expected a ConfigurationError');
}

describe('parseCheckRequest', () => {
  it('should fill in defaults', () => {
    expect(parseCheckRequest({ target: '192.0.2.10', mode: 'cp_sessions' })).toEqual({
      target: '192.0.2.10',
      community: 'public',
      mode: 'cp_sessions',
      port: 161,
      timeoutMs: 5000,
      version: '2c',
    });
  });

  it('should prefix each problem with its field', () => {
    expect(() => parseCheckRequest({ target: '', mode: 'cp_sessions' })).toThrow(
      'target: target host is required',
    );
  });
});

describe('CheckRunner', () => {
  it('should run the check and close the collector', async () => {
    const collector = new FakeCollector({
      [`${OID.cpSessions}.0`]: 10,
      [`${OID.cpSessionsMax}.0`]: 100,
    });
    const { runner, collectorFactory } = createRunner(collector);

    const outcome = await runner.run({
      target: '192.0.2.10',
      community: 'test-community',
      mode: 'cp_sessions',
      timeout: '2s',
    });

    expect(outcome).toEqual({
      status: 'OK',
      message: 'Central point sessions in use: 10.00% (10/100)',
      perfdata: 'cp_sessions=10%;80;90;0;100 cp_sessions_current=10;;;0;100',
    });
    expect(collectorFactory).toHaveBeenCalledWith({
      target: '192.0.2.10',
      community: 'test-community',
      mode: 'cp_sessions',
      port: 161,
      timeoutMs: 2000,
      version: '2c',
    });
    expect(collector.closed).toBe(true);
  });

  it('should reject an unknown mode before opening a collector', async () => {
    const { runner, collectorFactory } = createRunner(new FakeCollector());

    const errors = await configurationErrors(runner.run({ target: '192.0.2.10', mode: 'uptime' }));

    expect(errors).toEqual([
      `mode: unrecognized mode "uptime"; expected one of: ${CHECK_MODES.join(', ')}`,
    ]);
    expect(collectorFactory).not.toHaveBeenCalled();
  });

  it('should reject an interface mode without an interface name', async () => {
    const { runner, collectorFactory } = createRunner(new FakeCollector());

    const errors = await configurationErrors(
      runner.run({ target: '192.0.2.10', mode: 'interface_status_detail' }),
    );

    expect(errors).toEqual(['interfaceName: mode interface_status_detail requires an interface name']);
    expect(collectorFactory).not.toHaveBeenCalled();
  });

  it('should reject a port out of range', async () => {
    const { runner, collectorFactory } = createRunner(new FakeCollector());

    await expect(
      runner.run({ target: '192.0.2.10', mode: 'cpu_load_re', port: 70000 }),
    ).rejects.toThrow(ConfigurationError);
    expect(collectorFactory).not.toHaveBeenCalled();
  });

  it('should close the collector when the check throws', async () => {
    const collector = new FakeCollector();
    collector.walk = async () => {
      throw new TypeError('unexpected reading shape');
    };
    const { runner } = createRunner(collector);

    await expect(runner.run({ target: '192.0.2.10', mode: 'cpu_load_re' })).rejects.toThrow(
      'unexpected reading shape',
    );
    expect(collector.closed).toBe(true);
  });

  it('should report transport failures as UNKNOWN', async () => {
    const collector = new FakeCollector({}, { failOn: [OID.memoryRe] });
    const { runner } = createRunner(collector);

    const outcome = await runner.run({ target: '192.0.2.10', mode: 'memory_re' });

    expect(outcome.status).toBe('UNKNOWN');
    expect(outcome.message).toBe(
      `Routing engine memory usage: node values unavailable (Poll of ${OID.memoryRe} failed: Request timed out)`,
    );
    expect(collector.closed).toBe(true);
  });
});
