/**
 * MetricsGenerator
 *
 * Builds the synthetic Prometheus text served by the exporter.
 *
 * Responsibilities:
 *   - Baseline families (up, server_start_time, system and HTTP counters)
 *   - Resource section when subscription, target and metric are all given
 *   - The missing-parameters block returned by the probe route instead
 *
 * Sample values are drawn fresh on every call; labels and structure depend
 * only on the parameters.
 */

import type {
  MetricFamily,
  MetricShapeRule,
  ResourceTypeRule,
} from '../strategies/metric-rule.interface';
import { RESOURCE_TYPE_RULES, classifyResourceType } from '../strategies/resource-type.rules';
import { METRIC_SHAPE_RULES, selectMetricShape } from '../strategies/metric-shape.rules';
import { renderExposition } from './exposition-format';
import { randomInt, uniform } from './random-source';
import type { RandomSource } from './random-source';
import { config } from '../config';

export interface MetricRequestParameters {
  subscription?: string;
  target?: string;
  metric?: string;
  interval?: string;
  aggregation?: string;
}

/**
 * Parameters known to carry a resource section.
 */
export interface ResourceRequest {
  subscription: string;
  target: string;
  metric: string;
  interval: string;
  aggregation: string;
}

export type Clock = () => number;

export interface MetricsGeneratorOptions {
  /** Process start, Unix seconds. */
  startTime: number;
  random?: RandomSource;
  /** Milliseconds since the epoch. */
  clock?: Clock;
  resourceTypeRules?: readonly ResourceTypeRule[];
  metricShapeRules?: readonly MetricShapeRule[];
}

export function hasRequiredParameters(
  params: MetricRequestParameters
): params is MetricRequestParameters & Pick<ResourceRequest, 'subscription' | 'target' | 'metric'> {
  return Boolean(params.subscription && params.target && params.metric);
}

export class MetricsGenerator {
  readonly startTime: number;
  private readonly random: RandomSource;
  private readonly clock: Clock;
  private readonly resourceTypeRules: readonly ResourceTypeRule[];
  private readonly metricShapeRules: readonly MetricShapeRule[];

  constructor(options: MetricsGeneratorOptions) {
    this.startTime = options.startTime;
    this.random = options.random ?? Math.random;
    this.clock = options.clock ?? Date.now;
    this.resourceTypeRules = options.resourceTypeRules ?? RESOURCE_TYPE_RULES;
    this.metricShapeRules = options.metricShapeRules ?? METRIC_SHAPE_RULES;
  }

  /**
   * Current Unix time in whole seconds.
   */
  timestamp(): number {
    return Math.floor(this.clock() / 1000);
  }

  generate(params: MetricRequestParameters = {}): string {
    const families = this.baselineFamilies();

    if (hasRequiredParameters(params)) {
      families.push(
        ...this.resourceFamilies({
          subscription: params.subscription,
          target: params.target,
          metric: params.metric,
          interval: params.interval ?? config.probe.defaultInterval,
          aggregation: params.aggregation ?? config.probe.defaultAggregation,
        })
      );
    }

    return renderExposition(families, this.timestamp());
  }

  /**
   * Probe response: full text when the required parameters are present,
   * otherwise the missing-parameters block.
   */
  probe(params: MetricRequestParameters): string {
    return hasRequiredParameters(params)
      ? this.generate(params)
      : this.generateMissingParameters(params);
  }

  generateMissingParameters(params: MetricRequestParameters): string {
    const interval = params.interval ?? config.probe.defaultInterval;
    const aggregation = params.aggregation ?? config.probe.defaultAggregation;
    const hasTarget = params.target ? 'True' : 'False';
    const hasMetric = params.metric ? 'True' : 'False';

    const families: MetricFamily[] = [
      {
        name: 'azure_exporter_error',
        help: 'Error in Azure exporter',
        type: 'gauge',
        samples: [
          {
            labels: [
              ['reason', 'missing_required_parameters'],
              ['subscription', params.subscription || 'missing'],
              ['target_provided', hasTarget],
              ['metric_provided', hasMetric],
            ],
            value: '1',
          },
        ],
      },
      {
        name: 'azure_exporter_request_info',
        help: 'Information about the request',
        type: 'gauge',
        samples: [
          {
            labels: [
              ['subscription', params.subscription || 'none'],
              ['has_target', hasTarget],
              ['has_metric', hasMetric],
              ['interval', interval],
              ['aggregation', aggregation],
            ],
            value: '0',
          },
        ],
      },
    ];

    return renderExposition(families, this.timestamp());
  }

  private baselineFamilies(): MetricFamily[] {
    return [
      {
        name: 'up',
        help: 'Server status (1=up, 0=down)',
        type: 'gauge',
        samples: [{ value: '1' }],
      },
      {
        name: 'server_start_time',
        help: 'Server start timestamp',
        type: 'gauge',
        samples: [{ value: String(this.startTime) }],
      },
      {
        name: 'system_cpu_usage',
        help: 'CPU usage percentage',
        type: 'gauge',
        samples: [{ value: uniform(this.random, 10, 90, 2) }],
      },
      {
        name: 'system_memory_used_bytes',
        help: 'Memory usage in bytes',
        type: 'gauge',
        samples: [{ value: randomInt(this.random, 1_000_000_000, 8_000_000_000) }],
      },
      {
        name: 'http_requests_total',
        help: 'HTTP requests counter',
        type: 'counter',
        samples: [
          {
            labels: [['method', 'GET'], ['status', '200']],
            value: randomInt(this.random, 100, 1000),
          },
          {
            labels: [['method', 'POST'], ['status', '200']],
            value: randomInt(this.random, 50, 500),
          },
          {
            labels: [['method', 'GET'], ['status', '404']],
            value: randomInt(this.random, 1, 50),
          },
        ],
      },
    ];
  }

  private resourceFamilies(request: ResourceRequest): MetricFamily[] {
    const resourceType = classifyResourceType(request.target, this.resourceTypeRules);

    const families = request.metric.split(',').map((entry) => {
      const metricName = entry.trim();
      const rule = selectMetricShape(metricName, this.metricShapeRules);
      return rule.build(
        {
          subscription: request.subscription,
          resourceType,
          metricName,
          aggregation: request.aggregation,
          interval: request.interval,
        },
        this.random
      );
    });

    families.push(
      {
        name: 'azure_exporter_scrape_duration_seconds',
        help: 'Time spent scraping Azure API',
        type: 'gauge',
        samples: [
          {
            labels: [['subscription', request.subscription]],
            value: uniform(this.random, 0.1, 2.0, 3),
          },
        ],
      },
      {
        name: 'azure_exporter_scrape_success',
        help: 'Whether the Azure API scrape was successful',
        type: 'gauge',
        samples: [{ labels: [['subscription', request.subscription]], value: '1' }],
      }
    );

    return families;
  }
}
