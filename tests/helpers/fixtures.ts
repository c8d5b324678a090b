/**
 * Shared fixtures: a pinned clock and random source so generated text is
 * fully deterministic.
 */

import type { MetricsGeneratorOptions } from '../../src/services/metrics-generator';

export const START_TIME = 1699999000;
export const NOW_MS = 1700000000500;
export const NOW = 1700000000;

export function fixedRandom(value: number) {
  return () => value;
}

export function testGeneratorOptions(random = 0.5): MetricsGeneratorOptions {
  return {
    startTime: START_TIME,
    random: fixedRandom(random),
    clock: () => NOW_MS,
  };
}

export const BASELINE_TEXT = [
  '# HELP up Server status (1=up, 0=down)',
  '# TYPE up gauge',
  `up 1 ${NOW}`,
  '',
  '# HELP server_start_time Server start timestamp',
  '# TYPE server_start_time gauge',
  `server_start_time ${START_TIME} ${NOW}`,
  '',
  '# HELP system_cpu_usage CPU usage percentage',
  '# TYPE system_cpu_usage gauge',
  `system_cpu_usage 50.00 ${NOW}`,
  '',
  '# HELP system_memory_used_bytes Memory usage in bytes',
  '# TYPE system_memory_used_bytes gauge',
  `system_memory_used_bytes 4500000000 ${NOW}`,
  '',
  '# HELP http_requests_total HTTP requests counter',
  '# TYPE http_requests_total counter',
  `http_requests_total{method="GET",status="200"} 550 ${NOW}`,
  `http_requests_total{method="POST",status="200"} 275 ${NOW}`,
  `http_requests_total{method="GET",status="404"} 26 ${NOW}`,
  '',
].join('\n');
