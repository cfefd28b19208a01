import { describe, expect, it } from 'vitest';
import { CheckError } from '@proofmark/core';
import { median, RuleProfiler, summarizeSample } from '../src/profiling/index.js';
import { FakeEngine, WordRule, scriptedClock } from './fixtures/fake-engine.js';

describe('median', () => {
  it('averages the two middle values of an even sample', () => {
    expect(median([5, 1, 9, 3, 7, 2, 8, 4, 6, 10])).toBe(5.5);
  });

  it('takes the middle value of an odd sample', () => {
    expect(median([3, 1, 2])).toBe(2);
  });

  it('does not reorder its input', () => {
    const samples = [3, 1, 2];
    median(samples);
    expect(samples).toEqual([3, 1, 2]);
  });

  it('rejects an empty sample', () => {
    expect(() => median([])).toThrow(RangeError);
  });
});

describe('RuleProfiler', () => {
  const text = 'Teh cat sat. Teh dog ran teh race.';
  const tehRule = new WordRule('TEH', 'Teh', ['The']);
  const dogRule = new WordRule('DOG', 'dog', ['hound']);

  it('reports the median time, cumulative matches and throughput', () => {
    const engine = new FakeEngine([tehRule]);
    const durations = [5, 1, 9, 3, 7, 2, 8, 4, 6, 10];
    const clock = scriptedClock(durations.flatMap((d) => [100, 100 + d]));
    const profiler = new RuleProfiler(engine, { clock });

    const report = profiler.profileRulesOnText(text, [tehRule]);

    expect(report.ruleCount).toBe(1);
    expect(report.sentenceCount).toBe(2);
    expect(report.entries).toHaveLength(1);
    const [entry] = report.entries;
    expect(entry?.ruleId).toBe('TEH');
    expect(entry?.medianMillis).toBe(5.5);
    expect(entry?.sentenceCount).toBe(2);
    // "Teh" occurs twice per run; "teh" does not match the case-sensitive rule.
    expect(entry?.matchCount).toBe(20);
    expect(entry?.sentencesPerSecond).toBeCloseTo(363.636, 2);
  });

  it('analyzes sentences inside every run', () => {
    const engine = new FakeEngine([tehRule, dogRule]);
    const profiler = new RuleProfiler(engine, { runs: 3, clock: () => 0 });

    profiler.profileRulesOnText(text, [tehRule, dogRule]);

    expect(engine.analyzeCalls).toBe(2 * 3 * 2);
  });

  it('keeps rule order in the report', () => {
    const engine = new FakeEngine([tehRule, dogRule]);
    const profiler = new RuleProfiler(engine, { runs: 1, clock: () => 0 });

    const report = profiler.profileRulesOnText(text, [dogRule, tehRule]);

    expect(report.entries.map((e) => [e.ruleId, e.matchCount])).toEqual([
      ['DOG', 1],
      ['TEH', 2],
    ]);
  });

  it('counts the matches of one rule without timing', () => {
    const engine = new FakeEngine([tehRule]);
    let clockCalls = 0;
    const profiler = new RuleProfiler(engine, {
      clock: () => {
        clockCalls++;
        return 0;
      },
    });

    expect(profiler.profileRulesOnLine(text, tehRule)).toBe(2);
    expect(clockCalls).toBe(0);
  });

  it('rejects a run count below one', () => {
    const engine = new FakeEngine([tehRule]);
    expect(() => new RuleProfiler(engine, { runs: 0 })).toThrowError(CheckError);
  });
});

describe('summarizeSample', () => {
  it('reports infinite throughput for a zero median', () => {
    const entry = summarizeSample({ ruleId: 'R', perRunMillis: [0, 0, 1], matchCount: 4, sentenceCount: 3 });

    expect(entry.medianMillis).toBe(0);
    expect(entry.sentencesPerSecond).toBe(Number.POSITIVE_INFINITY);
  });

  it('reports zero throughput for an empty corpus', () => {
    const entry = summarizeSample({ ruleId: 'R', perRunMillis: [2, 2], matchCount: 0, sentenceCount: 0 });

    expect(entry.sentencesPerSecond).toBe(0);
  });
});
