export type ReadingValue = number | string;

/** A single name/value pair exactly as the collector returned it. */
export interface RawReading {
  identifier: string;
  value: ReadingValue;
}

export interface Reading {
  nodeKey: string;
  rawValue: ReadingValue;
}

export type ReadingSet = ReadonlyMap<string, Reading>;
