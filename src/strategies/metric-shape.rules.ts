/**
 * Metric Shape Rules
 *
 * Maps each requested metric name to the family it is rendered as.
 * Evaluated in list order:
 *   1. avg_cpu_percent       -> azure_sql_avg_cpu_percent
 *   2. virtual_core_count    -> azure_sql_virtual_core_count
 *   3. memory_usage_percent  -> azure_sql_memory_usage_percent
 *   4. name contains "cpu"   -> azure_vm_cpu_percent (case-insensitive)
 *   5. anything else         -> azure_unknown_metric
 *
 * The SQL shapes carry {subscription, resource_type, aggregation, interval};
 * the generic shapes add metric_name after resource_type.
 */

import type {
  LabelSet,
  MetricFamily,
  MetricShapeRule,
  ResourceMetricContext,
} from './metric-rule.interface';
import { randomInt, uniform } from '../services/random-source';
import type { RandomSource } from '../services/random-source';

function sqlLabels(context: ResourceMetricContext): LabelSet {
  return [
    ['subscription', context.subscription],
    ['resource_type', context.resourceType],
    ['aggregation', context.aggregation],
    ['interval', context.interval],
  ];
}

function genericLabels(context: ResourceMetricContext): LabelSet {
  return [
    ['subscription', context.subscription],
    ['resource_type', context.resourceType],
    ['metric_name', context.metricName],
    ['aggregation', context.aggregation],
    ['interval', context.interval],
  ];
}

function exactSqlRule(
  metricName: string,
  family: string,
  help: string,
  value: (random: RandomSource) => string
): MetricShapeRule {
  return {
    name: family,
    matches: (name) => name === metricName,
    build: (context, random): MetricFamily => ({
      name: family,
      help,
      type: 'gauge',
      samples: [{ labels: sqlLabels(context), value: value(random) }],
    }),
  };
}

export const vmCpuRule: MetricShapeRule = {
  name: 'azure_vm_cpu_percent',
  matches: (name) => name.toLowerCase().includes('cpu'),
  build: (context, random) => ({
    name: 'azure_vm_cpu_percent',
    help: `${context.metricName} from Azure API`,
    type: 'gauge',
    samples: [{ labels: genericLabels(context), value: uniform(random, 15, 75, 2) }],
  }),
};

export const unknownMetricRule: MetricShapeRule = {
  name: 'azure_unknown_metric',
  matches: () => true,
  build: (context, random) => ({
    name: 'azure_unknown_metric',
    help: `Unknown metric ${context.metricName} from Azure API`,
    type: 'gauge',
    samples: [{ labels: genericLabels(context), value: uniform(random, 0, 100, 2) }],
  }),
};

export const METRIC_SHAPE_RULES: readonly MetricShapeRule[] = [
  exactSqlRule(
    'avg_cpu_percent',
    'azure_sql_avg_cpu_percent',
    'Average CPU percentage from Azure API',
    (random) => uniform(random, 20, 80, 2)
  ),
  exactSqlRule(
    'virtual_core_count',
    'azure_sql_virtual_core_count',
    'Virtual core count from Azure API',
    (random) => randomInt(random, 2, 16)
  ),
  exactSqlRule(
    'memory_usage_percent',
    'azure_sql_memory_usage_percent',
    'Memory usage percentage from Azure API',
    (random) => uniform(random, 40, 85, 2)
  ),
  vmCpuRule,
  unknownMetricRule,
];

/**
 * Returns the first rule matching the metric name. The list ends with a
 * catch-all, so a default list always yields a rule.
 */
export function selectMetricShape(
  metricName: string,
  rules: readonly MetricShapeRule[] = METRIC_SHAPE_RULES
): MetricShapeRule {
  return rules.find((rule) => rule.matches(metricName)) ?? unknownMetricRule;
}
