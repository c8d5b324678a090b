/**
 * Print the probe response for a set of query parameters without starting
 * the server.
 *
 * Usage:
 *   npm run sample -- subscription=test-sub target=Microsoft.Sql/managedInstances/db1 metric=avg_cpu_percent
 */

import { MetricsGenerator } from '../src/services/metrics-generator';
import { parseSampleArgs } from '../src/services/sample-args';

const { params, ignored } = parseSampleArgs(process.argv.slice(2));

for (const message of ignored) {
  console.error(message);
}

const generator = new MetricsGenerator({ startTime: Math.floor(Date.now() / 1000) });
process.stdout.write(generator.probe(params));
