/**
 * Metric Rule Interfaces
 *
 * Defines the contract for the ordered match rules that drive the resource
 * section of the generated text: one rule list classifies the probe target
 * into a resource type, the other picks the output shape for each requested
 * metric name. Rules are evaluated in list order and the first match wins.
 */

import type { RandomSource } from '../services/random-source';

export type ResourceType =
  | 'sql_managed_instance'
  | 'virtual_machine'
  | 'storage_account'
  | 'unknown';

export type MetricType = 'gauge' | 'counter';

/**
 * Ordered label pairs. Order is preserved in the rendered sample line.
 */
export type LabelSet = ReadonlyArray<readonly [name: string, value: string]>;

export interface MetricSample {
  labels?: LabelSet;
  value: string;
}

export interface MetricFamily {
  name: string;
  help: string;
  type: MetricType;
  samples: MetricSample[];
}

/**
 * Per-metric values shared by every shape rule.
 */
export interface ResourceMetricContext {
  subscription: string;
  resourceType: ResourceType;
  metricName: string;
  aggregation: string;
  interval: string;
}

export interface ResourceTypeRule {
  readonly resourceType: Exclude<ResourceType, 'unknown'>;
  matches(target: string): boolean;
}

export interface MetricShapeRule {
  readonly name: string;
  matches(metricName: string): boolean;
  build(context: ResourceMetricContext, random: RandomSource): MetricFamily;
}
