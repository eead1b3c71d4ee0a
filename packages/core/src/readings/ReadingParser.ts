import { MalformedReadingError, NotFoundError, parseNumeric } from '@srxprobe/shared';
import type { RawReading, Reading, ReadingSet } from '@srxprobe/shared';

function stripLeadingDot(address: string): string {
  return address.startsWith('.') ? address.slice(1) : address;
}

/**
 * Return the part of `identifier` below `prefix`, e.g. the node index
 * "9.1.0.0" of "1.3.6.1.4.1.2636.3.1.13.1.8.9.1.0.0" under
 * "1.3.6.1.4.1.2636.3.1.13.1.8". The prefix itself yields the empty key.
 */
export function extractNodeKey(identifier: string, prefix: string): string {
  const id = stripLeadingDot(identifier);
  const root = stripLeadingDot(prefix);

  if (id === root) return '';
  if (id.startsWith(`${root}.`)) return id.slice(root.length + 1);

  throw new MalformedReadingError(`Identifier ${identifier} is not under ${prefix}`);
}

export function parseReadings(raw: readonly RawReading[], prefix: string): ReadingSet {
  const readings = new Map<string, Reading>();
  for (const { identifier, value } of raw) {
    const nodeKey = extractNodeKey(identifier, prefix);
    readings.set(nodeKey, { nodeKey, rawValue: value });
  }
  return readings;
}

/**
 * An empty set after a successful poll is reported as "not found" rather
 * than evaluated.
 */
export function requireReadings(readings: ReadingSet, metricId: string, quantity: string): ReadingSet {
  if (readings.size === 0) {
    throw new NotFoundError(`No ${quantity} readings returned for ${metricId}`);
  }
  return readings;
}

export function readNumber(reading: Reading, metricId: string): number {
  const value = parseNumeric(reading.rawValue);
  if (value === undefined) {
    const node = reading.nodeKey === '' ? '' : ` node ${reading.nodeKey}`;
    throw new MalformedReadingError(
      `Non-numeric value ${JSON.stringify(reading.rawValue)} for ${metricId}${node}`,
    );
  }
  return value;
}

export function readNumbers(readings: ReadingSet, metricId: string): Map<string, number> {
  const values = new Map<string, number>();
  for (const reading of readings.values()) {
    values.set(reading.nodeKey, readNumber(reading, metricId));
  }
  return values;
}

/** Case-sensitive exact match on string values. */
export function findNodeByValue(readings: ReadingSet, value: string): string | undefined {
  for (const reading of readings.values()) {
    if (reading.rawValue === value) return reading.nodeKey;
  }
  return undefined;
}

/** The reading whose identifier is exactly `address`, if the collector returned it. */
export function findInstance(raw: readonly RawReading[], address: string): Reading | undefined {
  const wanted = stripLeadingDot(address);
  const match = raw.find((reading) => stripLeadingDot(reading.identifier) === wanted);
  return match ? { nodeKey: '', rawValue: match.value } : undefined;
}
