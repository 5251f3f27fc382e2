/**
 * Tests for Match Configuration
 */

import { resolveMatchConfig } from '../../src/matching/matchConfig';
import { AppError } from '../../src/utils/AppError';

describe('resolveMatchConfig', () => {
  it('should apply defaults', () => {
    expect(resolveMatchConfig()).toEqual({ fuzzyThreshold: 0.85, issuePenalty: 0.05 });
  });

  it('should keep given values', () => {
    expect(resolveMatchConfig({ fuzzyThreshold: 0.9 })).toEqual({
      fuzzyThreshold: 0.9,
      issuePenalty: 0.05,
    });
  });

  it('should accept both bounds', () => {
    expect(resolveMatchConfig({ fuzzyThreshold: 0, issuePenalty: 1 })).toEqual({
      fuzzyThreshold: 0,
      issuePenalty: 1,
    });
  });

  it('should reject a threshold above 1', () => {
    expect(() => resolveMatchConfig({ fuzzyThreshold: 1.5 })).toThrow(
      'Invalid match configuration: fuzzyThreshold must be between 0 and 1'
    );
  });

  it('should reject a negative penalty', () => {
    expect(() => resolveMatchConfig({ issuePenalty: -0.1 })).toThrow(
      'issuePenalty must be between 0 and 1'
    );
  });

  it('should reject NaN', () => {
    expect(() => resolveMatchConfig({ fuzzyThreshold: NaN })).toThrow(
      'fuzzyThreshold must be a number'
    );
  });

  it('should throw an INVALID_CONFIG AppError', () => {
    let caught: unknown;
    try {
      resolveMatchConfig({ fuzzyThreshold: 2 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(AppError);
    expect(caught).toMatchObject({ code: 'INVALID_CONFIG', exitCode: 2 });
  });
});
