import { MetricFamily, MetricType, isHistogramValue } from '../types.js';
import { escapeHelpText, formatLabels, formatValue, serializeHistogram } from './prometheus-text.js';

/**
 * Serializes metrics to OpenMetrics 1.0.0.
 *
 * Differences from the Prometheus text format:
 * - counter samples carry the `_total` suffix, the family name does not
 * - the exposition ends with `# EOF`
 */
export class OpenMetricsSerializer {
  readonly contentType = 'application/openmetrics-text; version=1.0.0; charset=utf-8';

  serialize(families: MetricFamily[]): string {
    let output = '';
    for (const family of families) {
      output += this.serializeFamily(family);
    }
    return output + '# EOF\n';
  }

  private serializeFamily(family: MetricFamily): string {
    const isCounter = family.type === MetricType.Counter;
    const familyName = isCounter ? family.name.replace(/_total$/, '') : family.name;

    let output = `# TYPE ${familyName} ${family.type}\n`;
    output += `# HELP ${familyName} ${escapeHelpText(family.help)}\n`;

    for (const metric of family.metrics) {
      if (family.type === MetricType.Histogram && isHistogramValue(metric)) {
        output += serializeHistogram(familyName, metric);
        continue;
      }

      const sampleName = isCounter ? `${familyName}_total` : familyName;
      output += `${sampleName}${formatLabels(metric.labels)} ${formatValue(metric.value)}\n`;
    }

    return output;
  }
}
