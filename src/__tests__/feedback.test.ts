import { describe, it, expect } from 'vitest';
import { ValidationError } from '../errors';
import { normalizeFeedbackScores } from '../feedback';

describe('normalizeFeedbackScores', () => {
  it('should fill in source and project', () => {
    expect(normalizeFeedbackScores([{ id: 'trace-1', name: 'accuracy', value: 0 }], 'proj')).toEqual([
      { id: 'trace-1', name: 'accuracy', value: 0, source: 'sdk', projectName: 'proj' },
    ]);
  });

  it('should keep explicit fields', () => {
    const [score] = normalizeFeedbackScores(
      [
        {
          id: 'span-1',
          name: 'tone',
          value: 1,
          reason: 'polite',
          categoryName: 'friendly',
          source: 'ui',
          projectName: 'support-bot',
        },
      ],
      'proj'
    );

    expect(score).toEqual({
      id: 'span-1',
      name: 'tone',
      value: 1,
      reason: 'polite',
      categoryName: 'friendly',
      source: 'ui',
      projectName: 'support-bot',
    });
  });

  it('should not add keys for absent optional fields', () => {
    const [score] = normalizeFeedbackScores([{ id: 'trace-1', name: 'accuracy', value: 1 }], 'proj');
    expect(Object.keys(score).sort()).toEqual(['id', 'name', 'projectName', 'source', 'value']);
  });

  it('should report the index and field of an invalid score', () => {
    let caught: unknown;
    try {
      normalizeFeedbackScores(
        [
          { id: 'trace-1', name: 'accuracy', value: 1 },
          { id: 'trace-2', name: '', value: 1 },
        ],
        'proj'
      );
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({
      message: 'Invalid feedback score at index 1: name: name is required',
      issues: ['name: name is required'],
    });
  });

  it('should reject infinite values', () => {
    expect(() =>
      normalizeFeedbackScores([{ id: 'trace-1', name: 'accuracy', value: Number.POSITIVE_INFINITY }], 'proj')
    ).toThrow('Invalid feedback score at index 0: value:');
  });
});
