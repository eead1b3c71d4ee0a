import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { ConfigurationError, NotFoundError, metricCatalogSchema } from '@srxprobe/shared';
import type { MetricCatalogData, MetricDefinition } from '@srxprobe/shared';

export const DEFAULT_CATALOG_FILE = fileURLToPath(new URL('./metrics.json', import.meta.url));

export interface ThresholdOverride {
  warning?: number;
  critical?: number;
}

function freezeDefinition(metric: MetricDefinition): MetricDefinition {
  return Object.freeze({
    ...metric,
    remediationActions: Object.freeze([...metric.remediationActions]),
  });
}

/**
 * Read-only registry of metric definitions. Instances are never mutated;
 * threshold overrides produce a new catalog.
 */
export class MetricCatalog {
  private readonly metrics: ReadonlyMap<string, MetricDefinition>;
  private readonly informationalMetrics: readonly MetricDefinition[];

  constructor(data: MetricCatalogData) {
    this.metrics = new Map(data.metrics.map((metric) => [metric.id, freezeDefinition(metric)]));
    this.informationalMetrics = Object.freeze(data.informational.map(freezeDefinition));
  }

  /**
   * Validate untrusted catalog data.
   */
  static fromData(raw: unknown): MetricCatalog {
    const result = metricCatalogSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigurationError(
        result.error.issues.map((issue) =>
          issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
        ),
      );
    }
    return new MetricCatalog(result.data);
  }

  get(id: string): MetricDefinition {
    const metric = this.metrics.get(id);
    if (!metric) {
      throw new NotFoundError(`Metric not in catalog: ${id}`);
    }
    return metric;
  }

  has(id: string): boolean {
    return this.metrics.has(id);
  }

  list(): MetricDefinition[] {
    return [...this.metrics.values()];
  }

  /** Interface counters reported alongside interface_status_detail. */
  informational(): readonly MetricDefinition[] {
    return this.informationalMetrics;
  }

  withThresholds(id: string, override: ThresholdOverride): MetricCatalog {
    const current = this.get(id);
    const warningThreshold = override.warning ?? current.warningThreshold;
    const criticalThreshold = override.critical ?? current.criticalThreshold;

    if (criticalThreshold < warningThreshold) {
      throw new ConfigurationError([
        `${id}: critical threshold (${criticalThreshold}) must not be below warning threshold (${warningThreshold})`,
      ]);
    }

    const metrics = this.list().map((metric) =>
      metric.id === id ? { ...metric, warningThreshold, criticalThreshold } : metric,
    );
    return new MetricCatalog({ metrics, informational: [...this.informationalMetrics] });
  }
}

export function loadCatalog(path: string = DEFAULT_CATALOG_FILE): MetricCatalog {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError([`Cannot read metric catalog ${path}: ${reason}`]);
  }
  return MetricCatalog.fromData(raw);
}
