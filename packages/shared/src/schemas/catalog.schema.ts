import { z } from 'zod';

export const metricDefinitionSchema = z
  .object({
    id: z.string().min(1),
    address: z.string().regex(/^\.?\d+(\.\d+)*$/, 'address must be a dotted numeric OID'),
    description: z.string().min(1),
    diagnosticHint: z.string(),
    remediationActions: z.array(z.string().min(1)),
    warningThreshold: z.number().min(0),
    criticalThreshold: z.number().min(0),
    unit: z.enum(['%', '', 'C']),
    minimum: z.number().optional(),
    maximum: z.number().optional(),
    capacityMetric: z.string().min(1).optional(),
  })
  .refine(
    (metric) =>
      (metric.warningThreshold === 0 && metric.criticalThreshold === 0) ||
      metric.criticalThreshold >= metric.warningThreshold,
    (metric) => ({
      message: `${metric.id}: criticalThreshold (${metric.criticalThreshold}) must not be below warningThreshold (${metric.warningThreshold})`,
      path: ['criticalThreshold'],
    }),
  );

export const metricCatalogSchema = z
  .object({
    metrics: z.array(metricDefinitionSchema).min(1),
    informational: z.array(metricDefinitionSchema).default([]),
  })
  .superRefine((catalog, ctx) => {
    const ids = new Set<string>();
    for (const metric of [...catalog.metrics, ...catalog.informational]) {
      if (ids.has(metric.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate metric id: ${metric.id}` });
      }
      ids.add(metric.id);
    }
    for (const metric of catalog.metrics) {
      if (metric.capacityMetric && !catalog.metrics.some((m) => m.id === metric.capacityMetric)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${metric.id}: capacityMetric "${metric.capacityMetric}" is not in the catalog`,
        });
      }
    }
  });

export type ValidatedMetricDefinition = z.infer<typeof metricDefinitionSchema>;
export type ValidatedMetricCatalog = z.infer<typeof metricCatalogSchema>;
