import { describe, it, expect } from 'vitest';
import { ValidationError } from '../errors';
import { Contains, ExactMatch, IsJson, RegexMatch } from '../evaluation/metrics';

describe('ExactMatch', () => {
  const metric = new ExactMatch();

  it('should score 1 for identical strings', () => {
    expect(metric.score({ output: 'Paris', expectedOutput: 'Paris' })).toEqual({
      name: 'exact_match',
      value: 1,
      reason: 'Exact match',
    });
  });

  it('should score 0 for different strings', () => {
    expect(metric.score({ output: 'paris', expectedOutput: 'Paris' })).toEqual({
      name: 'exact_match',
      value: 0,
      reason: 'Output differs from expected output',
    });
  });

  it('should require string inputs', () => {
    expect(() => metric.score({ output: 'Paris' })).toThrow(ValidationError);
    expect(() => metric.score({ output: 42, expectedOutput: '42' })).toThrow(
      'exact_match requires a string "output", got number'
    );
    expect(() => metric.score({ output: 'Paris' })).toThrow('exact_match requires a string "expectedOutput", got nothing');
  });
});

describe('Contains', () => {
  it('should ignore case by default', () => {
    expect(new Contains().score({ output: 'The capital is PARIS.', expectedOutput: 'paris' }).value).toBe(1);
  });

  it('should respect case when asked', () => {
    const result = new Contains({ caseSensitive: true }).score({ output: 'The capital is PARIS.', expectedOutput: 'paris' });
    expect(result).toEqual({ name: 'contains', value: 0, reason: 'Expected output not found in output' });
  });

  it('should use a custom name', () => {
    expect(new Contains({ name: 'mentions_city' }).score({ output: 'Lima', expectedOutput: 'Lima' }).name).toBe(
      'mentions_city'
    );
  });
});

describe('RegexMatch', () => {
  it('should match a string pattern', () => {
    expect(new RegexMatch('^\\d{4}-\\d{2}-\\d{2}$').score({ output: '2024-01-15' })).toEqual({
      name: 'regex_match',
      value: 1,
      reason: 'Output matches /^\\d{4}-\\d{2}-\\d{2}$/',
    });
  });

  it('should give the same answer on repeated calls with a global regex', () => {
    const metric = new RegexMatch(/ok/g);
    expect(metric.score({ output: 'ok' }).value).toBe(1);
    expect(metric.score({ output: 'ok' }).value).toBe(1);
  });

  it('should score 0 when the output does not match', () => {
    expect(new RegexMatch(/^yes$/).score({ output: 'no' })).toEqual({
      name: 'regex_match',
      value: 0,
      reason: 'Output does not match /^yes$/',
    });
  });
});

describe('IsJson', () => {
  const metric = new IsJson();

  it('should accept objects and arrays', () => {
    expect(metric.score({ output: '{"a":1}' }).value).toBe(1);
    expect(metric.score({ output: '[1,2]' }).value).toBe(1);
  });

  it('should reject scalars', () => {
    expect(metric.score({ output: '42' })).toEqual({
      name: 'is_json',
      value: 0,
      reason: 'Output is a JSON scalar, not an object or array',
    });
  });

  it('should reject invalid JSON', () => {
    const result = metric.score({ output: '{a:1}' });
    expect(result.value).toBe(0);
    expect(result.reason).toMatch(/^Output is not valid JSON: /);
  });
});
