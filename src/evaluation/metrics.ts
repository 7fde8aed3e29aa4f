/**
 * Scoring metrics for evaluations
 *
 * Metrics read the task output under `output` and the dataset reference under
 * `expectedOutput`. Use `scoringKeyMapping` in `evaluate` when the task or the
 * dataset uses other keys.
 */

import { errorMessage, ValidationError } from '../errors';
import type { ScoreResult, ScoringInput } from './types';

export abstract class BaseMetric {
  readonly name: string;
  /** Log each scoring call as its own span */
  readonly trackMetric: boolean;

  constructor(name: string, trackMetric = true) {
    this.name = name;
    this.trackMetric = trackMetric;
  }

  abstract score(input: ScoringInput): ScoreResult | ScoreResult[] | Promise<ScoreResult | ScoreResult[]>;

  protected requireString(input: ScoringInput, key: string): string {
    const value = input[key];
    if (typeof value !== 'string') {
      throw new ValidationError(`${this.name} requires a string "${key}", got ${value === undefined ? 'nothing' : typeof value}`);
    }
    return value;
  }
}

/**
 * 1 when the output equals the expected output exactly, else 0
 */
export class ExactMatch extends BaseMetric {
  constructor(name = 'exact_match', trackMetric = true) {
    super(name, trackMetric);
  }

  score(input: ScoringInput): ScoreResult {
    const output = this.requireString(input, 'output');
    const expected = this.requireString(input, 'expectedOutput');
    const value = output === expected ? 1 : 0;
    return {
      name: this.name,
      value,
      reason: value === 1 ? 'Exact match' : 'Output differs from expected output',
    };
  }
}

/**
 * 1 when the output contains the expected output as a substring
 */
export class Contains extends BaseMetric {
  private caseSensitive: boolean;

  constructor(options: { name?: string; caseSensitive?: boolean; trackMetric?: boolean } = {}) {
    super(options.name ?? 'contains', options.trackMetric ?? true);
    this.caseSensitive = options.caseSensitive ?? false;
  }

  score(input: ScoringInput): ScoreResult {
    let output = this.requireString(input, 'output');
    let expected = this.requireString(input, 'expectedOutput');
    if (!this.caseSensitive) {
      output = output.toLowerCase();
      expected = expected.toLowerCase();
    }
    const value = output.includes(expected) ? 1 : 0;
    return {
      name: this.name,
      value,
      reason: value === 1 ? 'Expected output found in output' : 'Expected output not found in output',
    };
  }
}

/**
 * 1 when the output matches the regular expression
 */
export class RegexMatch extends BaseMetric {
  private regex: RegExp;

  constructor(regex: RegExp | string, options: { name?: string; trackMetric?: boolean } = {}) {
    super(options.name ?? 'regex_match', options.trackMetric ?? true);
    this.regex = typeof regex === 'string' ? new RegExp(regex) : regex;
  }

  score(input: ScoringInput): ScoreResult {
    const output = this.requireString(input, 'output');
    // A global regex keeps lastIndex between calls
    this.regex.lastIndex = 0;
    const value = this.regex.test(output) ? 1 : 0;
    return {
      name: this.name,
      value,
      reason: value === 1 ? `Output matches ${this.regex}` : `Output does not match ${this.regex}`,
    };
  }
}

/**
 * 1 when the output parses as a JSON object or array
 */
export class IsJson extends BaseMetric {
  constructor(name = 'is_json', trackMetric = true) {
    super(name, trackMetric);
  }

  score(input: ScoringInput): ScoreResult {
    const output = this.requireString(input, 'output');
    try {
      const parsed: unknown = JSON.parse(output);
      if (typeof parsed === 'object' && parsed !== null) {
        return { name: this.name, value: 1, reason: 'Output is valid JSON' };
      }
      return { name: this.name, value: 0, reason: 'Output is a JSON scalar, not an object or array' };
    } catch (error) {
      return { name: this.name, value: 0, reason: `Output is not valid JSON: ${errorMessage(error)}` };
    }
  }
}
