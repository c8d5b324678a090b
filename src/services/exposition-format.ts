/**
 * Prometheus text exposition rendering.
 *
 * Each family renders as a HELP line, a TYPE line and its sample lines, every
 * sample suffixed with the scrape timestamp in Unix seconds. Families are
 * separated by one blank line and the document ends with a newline.
 *
 * Label values are written verbatim. Quotes or braces in a value produce
 * malformed lines on purpose, so agents see exactly what was requested.
 */

import type { LabelSet, MetricFamily } from '../strategies/metric-rule.interface';

export function renderLabels(labels: LabelSet | undefined): string {
  if (!labels || labels.length === 0) {
    return '';
  }
  return `{${labels.map(([name, value]) => `${name}="${value}"`).join(',')}}`;
}

export function renderFamily(family: MetricFamily, timestamp: number): string {
  const lines = [
    `# HELP ${family.name} ${family.help}`,
    `# TYPE ${family.name} ${family.type}`,
    ...family.samples.map(
      (sample) => `${family.name}${renderLabels(sample.labels)} ${sample.value} ${timestamp}`
    ),
  ];
  return `${lines.join('\n')}\n`;
}

export function renderExposition(families: MetricFamily[], timestamp: number): string {
  return families.map((family) => renderFamily(family, timestamp)).join('\n');
}
