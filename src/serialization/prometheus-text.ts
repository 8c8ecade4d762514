import { MetricFamily, MetricType, HistogramValue, Labels, isHistogramValue } from '../types.js';

/**
 * Serializes metrics to Prometheus text exposition format v0.0.4.
 * See: https://prometheus.io/docs/instrumenting/exposition_formats/
 */
export class PrometheusTextSerializer {
  readonly contentType = 'text/plain; version=0.0.4; charset=utf-8';

  serialize(families: MetricFamily[]): string {
    let output = '';
    for (const family of families) {
      output += this.serializeFamily(family);
    }
    return output;
  }

  private serializeFamily(family: MetricFamily): string {
    let output = '';

    output += `# HELP ${family.name} ${escapeHelpText(family.help)}\n`;
    output += `# TYPE ${family.name} ${family.type}\n`;

    for (const metric of family.metrics) {
      if (family.type === MetricType.Histogram && isHistogramValue(metric)) {
        output += serializeHistogram(family.name, metric);
      } else {
        output += `${family.name}${formatLabels(metric.labels)} ${formatValue(metric.value)}\n`;
      }
    }

    return output;
  }
}

/**
 * Bucket, sum and count lines of one histogram series.
 * Bucket counts are already cumulative.
 */
export function serializeHistogram(name: string, histogram: HistogramValue, suffix = ''): string {
  let output = '';

  for (const [le, count] of histogram.buckets.entries()) {
    output += `${name}_bucket${formatLabelsWithLe(histogram.labels, le)} ${count}${suffix}\n`;
  }

  const baseLabels = formatLabels(histogram.labels);
  output += `${name}_sum${baseLabels} ${formatValue(histogram.sum)}${suffix}\n`;
  output += `${name}_count${baseLabels} ${histogram.count}${suffix}\n`;

  return output;
}

/**
 * Escape help text: backslashes and newlines.
 */
export function escapeHelpText(text: string): string {
  return text.replace(/\\/g, '\\\\').replace(/\n/g, '\\n');
}

/**
 * Escape label value: backslashes, quotes, and newlines.
 */
export function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

/**
 * Format labels as `{a="1",b="2"}` with names sorted; empty string for no labels.
 */
export function formatLabels(labels: Labels): string {
  const pairs = Object.keys(labels)
    .sort()
    .map((key) => `${key}="${escapeLabelValue(labels[key] ?? '')}"`);
  return pairs.length === 0 ? '' : `{${pairs.join(',')}}`;
}

/**
 * Format labels with a trailing `le` label for histogram buckets.
 */
export function formatLabelsWithLe(labels: Labels, le: number): string {
  const pairs = Object.keys(labels)
    .sort()
    .map((key) => `${key}="${escapeLabelValue(labels[key] ?? '')}"`);
  pairs.push(`le="${le === Infinity ? '+Inf' : formatValue(le)}"`);
  return `{${pairs.join(',')}}`;
}

/**
 * Format a numeric value: NaN, +Inf, -Inf, or the shortest decimal form.
 */
export function formatValue(value: number): string {
  if (Number.isNaN(value)) {
    return 'NaN';
  }
  if (!Number.isFinite(value)) {
    return value > 0 ? '+Inf' : '-Inf';
  }
  return value.toString();
}
