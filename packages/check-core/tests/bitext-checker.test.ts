import { describe, expect, it } from 'vitest';
import { createActivationRequest, createRuleMatch, NO_MATCHES } from '@proofmark/core';
import { BitextChecker } from '../src/checker/index.js';
import {
  CallbackBitextRule,
  FakeEngine,
  ScriptedBitextReader,
  WordRule,
  scriptedClock,
} from './fixtures/fake-engine.js';

const sourceEngine = new FakeEngine([], { code: 'en' });
const targetEngine = new FakeEngine([new WordRule('TEH', 'Teh', ['Ten'])], { code: 'pl' });

const copyRule = new CallbackBitextRule('COPY', (source, target) =>
  source.text === target.text
    ? [
        createRuleMatch(target.text, {
          ruleId: 'COPY',
          fromPos: 0,
          toPos: target.text.length,
          message: 'Target is a copy of the source',
        }),
      ]
    : NO_MATCHES
);

function createReader(): ScriptedBitextReader {
  return new ScriptedBitextReader([
    {
      pair: { source: 'The cat.', target: 'Teh kot.' },
      position: {
        sentenceByteOffset: 9,
        columnCount: 9,
        lineCount: 0,
        currentLineText: 'The cat.\tTeh kot.',
        lineStartOffset: 0,
      },
    },
    {
      pair: { source: 'A dog.', target: 'Teh pies.' },
      position: {
        sentenceByteOffset: 25,
        columnCount: 7,
        lineCount: 1,
        currentLineText: 'A dog.\tTeh pies.',
        lineStartOffset: 18,
      },
    },
    {
      pair: { source: 'Same.', target: 'Same.' },
      position: {
        sentenceByteOffset: 41,
        columnCount: 6,
        lineCount: 2,
        currentLineText: 'Same.\tSame.',
        lineStartOffset: 35,
      },
    },
  ]);
}

describe('BitextChecker.checkPair', () => {
  it('keeps positions relative to the target and adds the line offset', () => {
    const checker = new BitextChecker(sourceEngine, targetEngine, [copyRule]);

    const matches = checker.checkPair('The cat.', 'Teh kot.', 3);

    expect(matches.map((m) => [m.ruleId, m.fromPos, m.toPos, m.line, m.column])).toEqual([
      ['TEH', 0, 3, 3, 0],
    ]);
  });

  it('runs bitext rules after target rules', () => {
    const checker = new BitextChecker(sourceEngine, targetEngine, [copyRule]);

    expect(checker.checkPair('Teh.', 'Teh.').map((m) => m.ruleId)).toEqual(['TEH', 'COPY']);
  });
});

describe('BitextChecker.streamMatches', () => {
  it('lifts each pair to document coordinates', () => {
    const checker = new BitextChecker(sourceEngine, targetEngine, [copyRule]);

    const results = [...checker.streamMatches(createReader())];

    expect(results.map((r) => r.index)).toEqual([0, 1, 2]);
    expect(
      results.flatMap((r) => r.matches.map((m) => [m.ruleId, m.fromPos, m.toPos, m.line, m.column]))
    ).toEqual([
      ['TEH', 9, 12, 0, 9],
      ['TEH', 25, 28, 1, 7],
      ['COPY', 41, 46, 2, 6],
    ]);
  });

  it('reads the reader one pair at a time', () => {
    const checker = new BitextChecker(sourceEngine, targetEngine, []);
    const reader = createReader();
    const stream = checker.streamMatches(reader);

    const first = stream.next();

    expect(first.done).toBe(false);
    expect(reader.getPosition().lineCount).toBe(0);
    stream.next();
    expect(reader.getPosition().lineCount).toBe(1);
  });
});

describe('BitextChecker.checkReader', () => {
  it('collects every match and counts pairs', () => {
    const checker = new BitextChecker(sourceEngine, targetEngine, [copyRule], {
      clock: scriptedClock([0, 15]),
    });

    const report = checker.checkReader(createReader());

    expect(report.sentenceCount).toBe(3);
    expect(report.matches.map((m) => m.fromPos)).toEqual([9, 25, 41]);
    expect(report.elapsedMs).toBe(15);
  });

  it('respects the selected target rules', () => {
    const checker = new BitextChecker(sourceEngine, targetEngine, [copyRule]).selectRules(
      createActivationRequest(['TEH'], [], true)
    );

    expect(checker.checkReader(createReader()).matches.map((m) => m.ruleId)).toEqual(['COPY']);
  });
});

describe('BitextChecker.correctPairs', () => {
  it('yields the corrected target of every pair', () => {
    const checker = new BitextChecker(sourceEngine, targetEngine, [copyRule]);

    expect([...checker.correctPairs(createReader())]).toEqual(['Ten kot.', 'Ten pies.', 'Same.']);
  });
});
