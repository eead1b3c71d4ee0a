import { describe, it, expect } from 'vitest';
import {
  InterfaceStateResolver,
  classifyInterface,
  statusName,
} from '../interfaces/InterfaceStateResolver.js';
import { FakeCollector, OID, defaultCatalog } from './fakes.js';

function deviceTable(admin: number | string, oper: number | string): Record<string, number | string> {
  return {
    [`${OID.ifDescr}.510`]: 'ge-0/0/0',
    [`${OID.ifDescr}.511`]: 'ge-0/0/1',
    [`${OID.ifAdminStatus}.511`]: admin,
    [`${OID.ifOperStatus}.511`]: oper,
  };
}

describe('classifyInterface', () => {
  it('should be OK when up/up', () => {
    expect(classifyInterface({ adminCode: 1, operCode: 1 })).toEqual({ severity: 'OK', faults: [] });
  });

  it('should be CRITICAL when administratively down', () => {
    expect(classifyInterface({ adminCode: 2, operCode: 1 })).toEqual({
      severity: 'CRITICAL',
      faults: ['administratively down'],
    });
  });

  it('should be CRITICAL when operationally down', () => {
    expect(classifyInterface({ adminCode: 1, operCode: 2 })).toEqual({
      severity: 'CRITICAL',
      faults: ['down'],
    });
  });

  it('should be CRITICAL when the lower layer is down', () => {
    expect(classifyInterface({ adminCode: 1, operCode: 7 })).toEqual({
      severity: 'CRITICAL',
      faults: ['lower layer down'],
    });
  });

  it('should accumulate several faults', () => {
    expect(classifyInterface({ adminCode: 2, operCode: 2 }).faults).toEqual([
      'administratively down',
      'down',
    ]);
  });

  it('should treat the other codes as informational', () => {
    for (const operCode of [3, 4, 5, 6]) {
      expect(classifyInterface({ adminCode: 1, operCode }).severity).toBe('OK');
    }
    expect(classifyInterface({ adminCode: 3, operCode: 1 }).severity).toBe('OK');
  });
});

describe('statusName', () => {
  it('should name known codes', () => {
    expect(statusName(1)).toBe('up');
    expect(statusName(7)).toBe('lowerLayerDown');
  });

  it('should fall back to the code', () => {
    expect(statusName(42)).toBe('code 42');
  });
});

describe('InterfaceStateResolver', () => {
  it('should resolve name to index to status', async () => {
    const collector = new FakeCollector(deviceTable(1, 1));
    const resolver = new InterfaceStateResolver(collector, defaultCatalog);

    const resolution = await resolver.resolve('ge-0/0/1');

    expect(resolution).toEqual({
      state: 'resolved',
      name: 'ge-0/0/1',
      index: '511',
      status: { adminCode: 1, operCode: 1 },
      classification: { severity: 'OK', faults: [] },
    });
    expect(collector.walks).toEqual([OID.ifDescr]);
    expect(collector.gets).toEqual([[`${OID.ifAdminStatus}.511`, `${OID.ifOperStatus}.511`]]);
  });

  it('should classify admin down / oper up as CRITICAL', async () => {
    const resolver = new InterfaceStateResolver(new FakeCollector(deviceTable(2, 1)), defaultCatalog);
    const resolution = await resolver.resolve('ge-0/0/1');
    expect(resolution.state).toBe('resolved');
    if (resolution.state === 'resolved') {
      expect(resolution.classification).toEqual({
        severity: 'CRITICAL',
        faults: ['administratively down'],
      });
    }
  });

  it('should fail CRITICAL for an unknown interface name', async () => {
    const resolver = new InterfaceStateResolver(new FakeCollector(deviceTable(1, 1)), defaultCatalog);
    expect(await resolver.resolve('ge-0/0/9')).toEqual({
      state: 'failed',
      name: 'ge-0/0/9',
      severity: 'CRITICAL',
      reason: 'Interface ge-0/0/9 not found in interface description table',
    });
  });

  it('should fail CRITICAL when the status is not returned', async () => {
    const collector = new FakeCollector({ [`${OID.ifDescr}.511`]: 'ge-0/0/1' });
    const resolution = await new InterfaceStateResolver(collector, defaultCatalog).resolve('ge-0/0/1');
    expect(resolution).toEqual({
      state: 'failed',
      name: 'ge-0/0/1',
      severity: 'CRITICAL',
      reason:
        'Interface ge-0/0/1 (index 511): admin/oper status unavailable (interface_admin_status not returned)',
    });
  });

  it('should fail CRITICAL when only the oper status is missing', async () => {
    const collector = new FakeCollector({
      [`${OID.ifDescr}.511`]: 'ge-0/0/1',
      [`${OID.ifAdminStatus}.511`]: 1,
    });
    const resolution = await new InterfaceStateResolver(collector, defaultCatalog).resolve('ge-0/0/1');
    expect(resolution.state === 'failed' && resolution.reason).toBe(
      'Interface ge-0/0/1 (index 511): admin/oper status unavailable (interface_oper_status not returned)',
    );
  });

  it('should fail CRITICAL for a garbled status code', async () => {
    const resolver = new InterfaceStateResolver(
      new FakeCollector(deviceTable('up', 1)),
      defaultCatalog,
    );
    const resolution = await resolver.resolve('ge-0/0/1');
    expect(resolution).toEqual({
      state: 'failed',
      name: 'ge-0/0/1',
      severity: 'CRITICAL',
      reason:
        'Interface ge-0/0/1 (index 511): admin/oper status unavailable (Non-numeric value "up" for interface_admin_status)',
    });
  });

  it('should fail UNKNOWN on a transport failure', async () => {
    const collector = new FakeCollector(deviceTable(1, 1), { failOn: [OID.ifDescr] });
    const resolution = await new InterfaceStateResolver(collector, defaultCatalog).resolve('ge-0/0/1');
    expect(resolution).toEqual({
      state: 'failed',
      name: 'ge-0/0/1',
      severity: 'UNKNOWN',
      reason: `Interface ge-0/0/1: interface description table unavailable (Poll of ${OID.ifDescr} failed: Request timed out)`,
    });
  });

  it('should fail UNKNOWN when the status poll times out', async () => {
    const collector = new FakeCollector(deviceTable(1, 1), { failOn: [OID.ifOperStatus] });
    const resolution = await new InterfaceStateResolver(collector, defaultCatalog).resolve('ge-0/0/1');
    expect(resolution).toEqual({
      state: 'failed',
      name: 'ge-0/0/1',
      severity: 'UNKNOWN',
      reason: `Interface ge-0/0/1 (index 511): admin/oper status unavailable (Poll of ${OID.ifOperStatus}.511 failed: Request timed out)`,
    });
  });

  it('should resolve the same name identically twice', async () => {
    const resolver = new InterfaceStateResolver(new FakeCollector(deviceTable(1, 7)), defaultCatalog);
    const first = await resolver.resolve('ge-0/0/1');
    const second = await resolver.resolve('ge-0/0/1');
    expect(second).toEqual(first);
  });

  it('should propagate errors that are not probe errors', async () => {
    const collector = new FakeCollector();
    collector.walk = async () => {
      throw new TypeError('boom');
    };
    const resolver = new InterfaceStateResolver(collector, defaultCatalog);
    await expect(resolver.resolve('ge-0/0/1')).rejects.toThrow(TypeError);
  });
});
