export type MetricUnit = '%' | '' | 'C';

export interface MetricDefinition {
  readonly id: string;
  readonly address: string;
  readonly description: string;
  readonly diagnosticHint: string;
  readonly remediationActions: readonly string[];
  readonly warningThreshold: number;
  readonly criticalThreshold: number;
  readonly unit: MetricUnit;
  readonly minimum?: number;
  readonly maximum?: number;
  /** Catalog id of the entry holding the denominator for ratio metrics. */
  readonly capacityMetric?: string;
}

export interface MetricCatalogData {
  metrics: MetricDefinition[];
  informational: MetricDefinition[];
}
