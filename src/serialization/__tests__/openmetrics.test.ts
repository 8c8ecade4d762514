import { describe, it, expect } from 'vitest';
import { OpenMetricsSerializer } from '../openmetrics.js';
import { createSerializer } from '../index.js';
import { PrometheusTextSerializer } from '../prometheus-text.js';
import { MetricType, type MetricFamily } from '../../types.js';

describe('OpenMetricsSerializer', () => {
  const serializer = new OpenMetricsSerializer();

  it('should end with EOF', () => {
    expect(serializer.serialize([])).toBe('# EOF\n');
  });

  it('should strip _total from the family and add it to counter samples', () => {
    const family: MetricFamily = {
      name: 'iterations_total',
      help: 'Iterations',
      type: MetricType.Counter,
      metrics: [{ labels: { scenario: 'smoke' }, value: 3 }],
    };

    expect(serializer.serialize([family])).toBe(
      '# TYPE iterations counter\n' +
        '# HELP iterations Iterations\n' +
        'iterations_total{scenario="smoke"} 3\n' +
        '# EOF\n'
    );
  });

  it('should write each family type by its own name', () => {
    const families: MetricFamily[] = [
      { name: 'vus', help: 'VUs', type: MetricType.Gauge, metrics: [{ labels: {}, value: 4 }] },
      { name: 'data_received', help: 'Bytes', type: MetricType.Counter, metrics: [{ labels: {}, value: 512 }] },
    ];

    expect(serializer.serialize(families)).toBe(
      '# TYPE vus gauge\n' +
        '# HELP vus VUs\n' +
        'vus 4\n' +
        '# TYPE data_received counter\n' +
        '# HELP data_received Bytes\n' +
        'data_received_total 512\n' +
        '# EOF\n'
    );
  });

  it('should create a serializer per format', () => {
    expect(createSerializer('prometheus')).toBeInstanceOf(PrometheusTextSerializer);
    expect(createSerializer('openmetrics')).toBeInstanceOf(OpenMetricsSerializer);
  });

  it('should expose the content type of each format', () => {
    expect(createSerializer('prometheus').contentType).toBe('text/plain; version=0.0.4; charset=utf-8');
    expect(createSerializer('openmetrics').contentType).toBe(
      'application/openmetrics-text; version=1.0.0; charset=utf-8'
    );
  });
});
