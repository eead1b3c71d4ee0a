import type { CheckRequest, RawReading } from '@srxprobe/shared';

/**
 * Read-only polling capability against a single target.
 *
 * Implementations report every failure (timeout, unreachable host, bad
 * response) as a `TransportError`. An empty result is a successful poll.
 */
export interface ReadingCollector {
  /** All name/value pairs rooted at `address`. */
  walk(address: string): Promise<RawReading[]>;
  /** Exact instances; instances the agent does not have are omitted. */
  get(addresses: string[]): Promise<RawReading[]>;
  close(): void;
}

export type CollectorFactory = (request: CheckRequest) => ReadingCollector;
