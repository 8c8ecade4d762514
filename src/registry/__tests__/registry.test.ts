import { describe, it, expect, beforeEach } from 'vitest';
import { MetricsRegistry } from '../registry.js';
import { RegistrationError } from '../../errors/index.js';
import { MetricType } from '../../types.js';

describe('MetricsRegistry', () => {
  let registry: MetricsRegistry;

  beforeEach(() => {
    registry = new MetricsRegistry();
  });

  describe('counterVec', () => {
    it('should return the same vector for a repeated registration', () => {
      const first = registry.counterVec({ name: 'reqs_total', help: 'Requests', labelNames: ['method'] });
      const second = registry.counterVec({ name: 'reqs_total', help: 'Requests', labelNames: ['method'] });

      expect(first).toBe(second);
      expect(registry.size).toBe(1);
      expect(registry.has('reqs_total')).toBe(true);
      expect(registry.get('reqs_total')).toBe(first);
    });

    it('should reject a different label set under the same name', () => {
      registry.counterVec({ name: 'reqs_total', help: 'Requests', labelNames: ['method'] });
      expect(() =>
        registry.counterVec({ name: 'reqs_total', help: 'Requests', labelNames: ['status'] })
      ).toThrow('Metric reqs_total already registered with labels [method]');
    });
  });

  describe('type conflicts', () => {
    it('should reject a name registered with another type', () => {
      registry.gaugeVec({ name: 'vus', help: 'Virtual users' });
      expect(() => registry.counterVec({ name: 'vus', help: 'Virtual users' })).toThrow(
        'Metric vus already registered as gauge, not counter'
      );
    });

    it('should raise RegistrationError with the metric name', () => {
      registry.histogramVec({ name: 'latency', help: 'Latency' });
      try {
        registry.gaugeVec({ name: 'latency', help: 'Latency' });
        expect.fail('expected a RegistrationError');
      } catch (error) {
        expect(error).toBeInstanceOf(RegistrationError);
        expect(error).toMatchObject({ metricName: 'latency', category: 'registration' });
      }
    });
  });

  describe('validation', () => {
    it('should reject an invalid metric name', () => {
      expect(() => registry.counterVec({ name: 'bad-name', help: 'x' })).toThrow(
        'Invalid metric name "bad-name"'
      );
    });

    it('should reject an invalid label name', () => {
      expect(() =>
        registry.gaugeVec({ name: 'vus', help: 'x', labelNames: ['__reserved'] })
      ).toThrow('Invalid label name "__reserved" for metric vus');
    });
  });

  describe('gather', () => {
    it('should return families sorted by name', () => {
      registry.gaugeVec({ name: 'vus', help: 'Virtual users' }).withLabelValues().set(3);
      registry.counterVec({ name: 'iterations_total', help: 'Iterations' }).withLabelValues().inc(7);

      const families = registry.gather();
      expect(families.map((family) => family.name)).toEqual(['iterations_total', 'vus']);
      expect(families[0]).toEqual({
        name: 'iterations_total',
        help: 'Iterations',
        type: MetricType.Counter,
        metrics: [{ labels: {}, value: 7 }],
      });
    });

    it('should not reflect updates made after gathering', () => {
      const gauge = registry.gaugeVec({ name: 'vus', help: 'Virtual users' }).withLabelValues();
      gauge.set(1);

      const families = registry.gather();
      gauge.set(2);

      expect(families[0]?.metrics[0]?.value).toBe(1);
    });
  });

  describe('metrics', () => {
    it('should serialize in the text format by default', () => {
      registry.counterVec({ name: 'iterations_total', help: 'Iterations' }).withLabelValues().inc(2);

      expect(registry.metrics()).toBe(
        '# HELP iterations_total Iterations\n' +
          '# TYPE iterations_total counter\n' +
          'iterations_total 2\n'
      );
    });

    it('should serialize OpenMetrics on request', () => {
      registry.counterVec({ name: 'iterations_total', help: 'Iterations' }).withLabelValues().inc(2);

      expect(registry.metrics('openmetrics')).toBe(
        '# TYPE iterations counter\n' +
          '# HELP iterations Iterations\n' +
          'iterations_total 2\n' +
          '# EOF\n'
      );
    });
  });
});
