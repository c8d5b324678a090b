/**
 * Parses `key=value` command-line arguments into probe parameters for the
 * sample script. Arguments without `=` and unknown keys are skipped and
 * reported back to the caller.
 */

import type { MetricRequestParameters } from './metrics-generator';

export const SAMPLE_PARAMETER_KEYS = [
  'subscription',
  'target',
  'metric',
  'interval',
  'aggregation',
] as const;

export interface ParsedSampleArgs {
  params: MetricRequestParameters;
  ignored: string[];
}

export function parseSampleArgs(args: readonly string[]): ParsedSampleArgs {
  const params: MetricRequestParameters = {};
  const ignored: string[] = [];

  for (const arg of args) {
    const separator = arg.indexOf('=');
    if (separator === -1) {
      ignored.push(`Ignoring argument without '=': ${arg}`);
      continue;
    }

    const key = arg.slice(0, separator);
    const known = SAMPLE_PARAMETER_KEYS.find((candidate) => candidate === key);
    if (!known) {
      ignored.push(`Ignoring unknown parameter: ${key}`);
      continue;
    }
    params[known] = arg.slice(separator + 1);
  }

  return { params, ignored };
}
