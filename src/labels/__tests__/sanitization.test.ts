import { describe, it, expect } from 'vitest';
import { buildIdentity, sanitizeLabelNames, sanitizeName } from '../sanitization.js';
import { isValidLabelName, isValidMetricName, RESERVED_HISTOGRAM_LABELS } from '../validation.js';
import { ClassificationError } from '../../errors/index.js';

describe('sanitizeName', () => {
  it('should replace characters outside [a-zA-Z0-9_]', () => {
    expect(sanitizeName('http-req.duration')).toBe('http_req_duration');
    expect(sanitizeName('group::login')).toBe('group__login');
  });

  it('should prefix a leading digit', () => {
    expect(sanitizeName('2xx_responses')).toBe('_2xx_responses');
  });

  it('should leave valid names unchanged', () => {
    expect(sanitizeName('vus_max')).toBe('vus_max');
  });
});

describe('buildIdentity', () => {
  it('should join namespace, subsystem and name', () => {
    expect(buildIdentity('http_req_duration', 'k6', 'run')).toBe('k6_run_http_req_duration');
  });

  it('should elide empty segments', () => {
    expect(buildIdentity('vus')).toBe('vus');
    expect(buildIdentity('vus', 'k6')).toBe('k6_vus');
    expect(buildIdentity('vus', '', 'run')).toBe('run_vus');
  });

  it('should sanitize the joined identity', () => {
    expect(buildIdentity('data.sent', 'load-test')).toBe('load_test_data_sent');
    expect(buildIdentity('9lives')).toBe('_9lives');
  });

  it('should reject an empty name', () => {
    expect(() => buildIdentity('', 'k6')).toThrow(ClassificationError);
    expect(() => buildIdentity('', 'k6')).toThrow('Metric name cannot be empty');
  });
});

describe('sanitizeLabelNames', () => {
  it('should map tag keys to label names in order', () => {
    expect(sanitizeLabelNames(['method', 'expected-response', '1st'])).toEqual([
      ['method', 'method'],
      ['expected-response', 'expected_response'],
      ['1st', '_1st'],
    ]);
  });

  it('should reject keys that collapse onto one label name', () => {
    expect(() => sanitizeLabelNames(['a-b', 'a.b'])).toThrow(
      'Tags "a-b" and "a.b" both map to label name "a_b"'
    );
  });

  it('should reject reserved names', () => {
    expect(() => sanitizeLabelNames(['__name__'])).toThrow(ClassificationError);
    expect(() => sanitizeLabelNames(['le'], RESERVED_HISTOGRAM_LABELS)).toThrow(
      'Tag "le" maps to reserved label name "le"'
    );
  });

  it('should allow le outside distributions', () => {
    expect(sanitizeLabelNames(['le'])).toEqual([['le', 'le']]);
  });

  it('should reject an empty key', () => {
    try {
      sanitizeLabelNames(['']);
      expect.fail('expected a ClassificationError');
    } catch (error) {
      expect(error).toBeInstanceOf(ClassificationError);
      expect(error).toMatchObject({ field: 'tags' });
    }
  });
});

describe('validation', () => {
  it('should validate label names', () => {
    expect(isValidLabelName('status')).toBe(true);
    expect(isValidLabelName('_private')).toBe(true);
    expect(isValidLabelName('__internal')).toBe(false);
    expect(isValidLabelName('123_abc')).toBe(false);
  });

  it('should validate metric names', () => {
    expect(isValidMetricName('http_requests_total')).toBe(true);
    expect(isValidMetricName('node_cpu:seconds')).toBe(true);
    expect(isValidMetricName('requests-total')).toBe(false);
  });
});
