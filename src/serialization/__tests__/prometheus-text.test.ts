import { describe, it, expect } from 'vitest';
import {
  PrometheusTextSerializer,
  escapeHelpText,
  escapeLabelValue,
  formatLabels,
  formatLabelsWithLe,
  formatValue,
} from '../prometheus-text.js';
import { MetricType, type HistogramValue, type MetricFamily } from '../../types.js';

function histogramValue(labels: Record<string, string>, entries: Array<[number, number]>, sum: number): HistogramValue {
  const buckets = new Map<number, number>(entries);
  const count = entries[entries.length - 1]?.[1] ?? 0;
  return { labels, value: 0, buckets, sum, count };
}

describe('PrometheusTextSerializer', () => {
  const serializer = new PrometheusTextSerializer();

  describe('escapeHelpText', () => {
    it('should escape backslashes and newlines', () => {
      expect(escapeHelpText('foo\\bar\nbaz')).toBe('foo\\\\bar\\nbaz');
    });

    it('should leave quotes alone', () => {
      expect(escapeHelpText('say "hi"')).toBe('say "hi"');
    });
  });

  describe('escapeLabelValue', () => {
    it('should escape backslashes, quotes and newlines', () => {
      expect(escapeLabelValue('foo\\bar"baz\nqux')).toBe('foo\\\\bar\\"baz\\nqux');
    });
  });

  describe('formatLabels', () => {
    it('should return empty string for no labels', () => {
      expect(formatLabels({})).toBe('');
    });

    it('should format multiple labels in sorted order', () => {
      expect(formatLabels({ status: '200', method: 'GET', path: '/api' })).toBe(
        '{method="GET",path="/api",status="200"}'
      );
    });

    it('should append le after the sorted labels', () => {
      expect(formatLabelsWithLe({ method: 'GET' }, 250)).toBe('{method="GET",le="250"}');
      expect(formatLabelsWithLe({}, Infinity)).toBe('{le="+Inf"}');
    });
  });

  describe('formatValue', () => {
    it('should format finite numbers in shortest form', () => {
      expect(formatValue(42)).toBe('42');
      expect(formatValue(-100)).toBe('-100');
      expect(formatValue(0.1)).toBe('0.1');
    });

    it('should format special values', () => {
      expect(formatValue(NaN)).toBe('NaN');
      expect(formatValue(Infinity)).toBe('+Inf');
      expect(formatValue(-Infinity)).toBe('-Inf');
    });
  });

  describe('serialize', () => {
    it('should serialize counters and gauges', () => {
      const families: MetricFamily[] = [
        {
          name: 'http_reqs_total',
          help: 'Total HTTP requests',
          type: MetricType.Counter,
          metrics: [
            { labels: { method: 'GET', status: '200' }, value: 1234 },
            { labels: { method: 'POST', status: '201' }, value: 567 },
          ],
        },
        {
          name: 'vus',
          help: 'Virtual users',
          type: MetricType.Gauge,
          metrics: [{ labels: {}, value: 23.5 }],
        },
      ];

      expect(serializer.serialize(families)).toBe(
        '# HELP http_reqs_total Total HTTP requests\n' +
          '# TYPE http_reqs_total counter\n' +
          'http_reqs_total{method="GET",status="200"} 1234\n' +
          'http_reqs_total{method="POST",status="201"} 567\n' +
          '# HELP vus Virtual users\n' +
          '# TYPE vus gauge\n' +
          'vus 23.5\n'
      );
    });

    it('should serialize histogram buckets, sum and count', () => {
      const family: MetricFamily = {
        name: 'req_duration',
        help: 'Request duration',
        type: MetricType.Histogram,
        metrics: [histogramValue({ method: 'GET' }, [[100, 1], [500, 2], [Infinity, 3]], 1120)],
      };

      expect(serializer.serialize([family])).toBe(
        '# HELP req_duration Request duration\n' +
          '# TYPE req_duration histogram\n' +
          'req_duration_bucket{method="GET",le="100"} 1\n' +
          'req_duration_bucket{method="GET",le="500"} 2\n' +
          'req_duration_bucket{method="GET",le="+Inf"} 3\n' +
          'req_duration_sum{method="GET"} 1120\n' +
          'req_duration_count{method="GET"} 3\n'
      );
    });

    it('should write HELP and TYPE for a family with no series', () => {
      const family: MetricFamily = { name: 'empty', help: 'Nothing yet', type: MetricType.Gauge, metrics: [] };
      expect(serializer.serialize([family])).toBe('# HELP empty Nothing yet\n# TYPE empty gauge\n');
    });

    it('should return an empty body for no families', () => {
      expect(serializer.serialize([])).toBe('');
    });
  });
});
