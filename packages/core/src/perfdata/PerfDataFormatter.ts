import { formatNumber } from '@srxprobe/shared';

export type PerfValue = number | string | undefined;

export interface PerfDataRecord {
  label: string;
  value: PerfValue;
  uom?: string;
  warning?: PerfValue;
  critical?: PerfValue;
  minimum?: PerfValue;
  maximum?: PerfValue;
}

/** All fields as rendered; absent fields are empty strings. */
export interface ParsedPerfData {
  label: string;
  value: string;
  uom: string;
  warning: string;
  critical: string;
  minimum: string;
  maximum: string;
}

function field(value: PerfValue): string {
  if (value === undefined) return '';
  return typeof value === 'number' ? formatNumber(value) : value;
}

/**
 * `label=value<uom>;warn;crit;min;max`. Every semicolon is kept even when
 * the trailing fields are empty; consumers read the fields by position.
 */
export function formatPerfData(record: PerfDataRecord): string {
  const head = `${record.label}=${field(record.value)}${record.uom ?? ''}`;
  return [
    head,
    field(record.warning),
    field(record.critical),
    field(record.minimum),
    field(record.maximum),
  ].join(';');
}

export function joinPerfData(records: readonly PerfDataRecord[]): string {
  return records.map(formatPerfData).join(' ');
}

// formatNumber switches to exponent notation from 1e21 up
const VALUE_PATTERN = /^(-?[\d.]*(?:e[+-]?\d+)?)(.*)$/;

export function parsePerfData(text: string): ParsedPerfData {
  const eq = text.indexOf('=');
  if (eq === -1) {
    throw new Error(`Invalid performance data record: "${text}"`);
  }

  const label = text.slice(0, eq);
  const fields = text.slice(eq + 1).split(';');
  const [valueWithUom = '', warning = '', critical = '', minimum = '', maximum = ''] = fields;
  const match = VALUE_PATTERN.exec(valueWithUom);
  const value = match?.[1] ?? valueWithUom;
  const uom = match?.[2] ?? '';

  return { label, value, uom, warning, critical, minimum, maximum };
}
