import { describe, expect, it } from 'vitest';
import {
  CheckError,
  createRuleMatch,
  lineAndColumnAt,
  sortMatchesByPosition,
  toActivationRequest,
  validateRuleMatch,
  wrapError,
  ruleSelectionSchema,
} from '../src/index.js';

describe('createRuleMatch', () => {
  it('derives line and column from the text', () => {
    const text = 'First line.\nSecond teh line.';
    const match = createRuleMatch(text, {
      ruleId: 'SPELLING',
      fromPos: 19,
      toPos: 22,
      message: 'Possible typo',
      suggestedReplacements: ['the'],
    });

    expect(match).toEqual({
      ruleId: 'SPELLING',
      fromPos: 19,
      toPos: 22,
      line: 1,
      endLine: 1,
      column: 7,
      endColumn: 10,
      message: 'Possible typo',
      suggestedReplacements: ['the'],
    });
  });

  it('tracks spans crossing a line break', () => {
    const match = createRuleMatch('ab\ncd', {
      ruleId: 'X',
      fromPos: 1,
      toPos: 4,
      message: 'm',
    });

    expect(match.line).toBe(0);
    expect(match.column).toBe(1);
    expect(match.endLine).toBe(1);
    expect(match.endColumn).toBe(1);
    expect(match.suggestedReplacements).toEqual([]);
  });
});

describe('lineAndColumnAt', () => {
  it('returns 0-based coordinates', () => {
    expect(lineAndColumnAt('a\nb\nc', 4)).toEqual({ line: 2, column: 0 });
    expect(lineAndColumnAt('abc', 0)).toEqual({ line: 0, column: 0 });
  });
});

describe('validateRuleMatch', () => {
  it('rejects a reversed span', () => {
    const invalid = {
      ruleId: 'X',
      fromPos: 5,
      toPos: 2,
      line: 0,
      endLine: 0,
      column: 5,
      endColumn: 2,
      message: 'm',
      suggestedReplacements: [],
    };

    expect(() => validateRuleMatch(invalid)).toThrowError(CheckError);
    try {
      validateRuleMatch(invalid);
    } catch (error) {
      expect(error).toBeInstanceOf(CheckError);
      expect(error).toMatchObject({
        code: 'INVALID_MATCH',
        message: 'Invalid rule match at toPos: fromPos must not be greater than toPos',
      });
    }
  });

  it('rejects a missing rule id', () => {
    expect(() =>
      validateRuleMatch({
        fromPos: 0,
        toPos: 1,
        line: 0,
        endLine: 0,
        column: 0,
        endColumn: 1,
        message: 'm',
        suggestedReplacements: [],
      })
    ).toThrowError(/Invalid rule match at ruleId/);
  });
});

describe('sortMatchesByPosition', () => {
  it('orders by start then end and keeps ties stable', () => {
    const make = (ruleId: string, fromPos: number, toPos: number) =>
      createRuleMatch('0123456789', { ruleId, fromPos, toPos, message: '' });
    const input = [make('c', 4, 6), make('a', 0, 3), make('b1', 4, 5), make('b2', 4, 5)];

    const sorted = sortMatchesByPosition(input);

    expect(sorted.map((m) => m.ruleId)).toEqual(['a', 'b1', 'b2', 'c']);
    expect(input[0]?.ruleId).toBe('c');
  });
});

describe('toActivationRequest', () => {
  it('applies schema defaults', () => {
    const selection = ruleSelectionSchema.parse({ enable: ['A'] });
    const request = toActivationRequest(selection);

    expect([...request.enabledIds]).toEqual(['A']);
    expect(request.disabledIds.size).toBe(0);
    expect(request.exclusiveEnable).toBe(true);
  });
});

describe('CheckError', () => {
  it('formats an actionable message', () => {
    const error = new CheckError({
      code: 'RESOURCE_LOAD_FAILED',
      message: 'Could not load /en/bitext.xml',
      suggestion: 'Check the rules directory.',
    });

    expect(error.toActionableMessage()).toBe(
      'Error [RESOURCE_LOAD_FAILED]: Could not load /en/bitext.xml\nSuggested action: Check the rules directory.'
    );
  });

  it('wraps plain errors once', () => {
    const wrapped = wrapError(new Error('boom'), 'READER_FAILED');
    expect(wrapped.code).toBe('READER_FAILED');
    expect(wrapped.cause).toBeInstanceOf(Error);
    expect(wrapError(wrapped)).toBe(wrapped);
  });
});
