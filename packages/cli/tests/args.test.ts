import { describe, expect, it } from 'vitest';
import { parseArgs } from '../src/args.js';

describe('parseArgs', () => {
  it('reads the config and input with the default mode', () => {
    expect(parseArgs(['--config', 'proofmark.config.json', 'essay.txt'])).toEqual({
      configPath: 'proofmark.config.json',
      mode: 'check',
      lineOffset: undefined,
      inputPath: 'essay.txt',
    });
  });

  it('reads options in any order', () => {
    expect(
      parseArgs(['corpus.tsv', '--line-offset', '4', '--mode', 'bitext-check', '--config', 'c.json'])
    ).toEqual({
      configPath: 'c.json',
      mode: 'bitext-check',
      lineOffset: 4,
      inputPath: 'corpus.tsv',
    });
  });

  it('rejects incomplete or ambiguous command lines', () => {
    expect(parseArgs(['essay.txt'])).toBeNull();
    expect(parseArgs(['--config', 'c.json'])).toBeNull();
    expect(parseArgs(['--config', 'c.json', 'a.txt', 'b.txt'])).toBeNull();
    expect(parseArgs(['--config', 'c.json', '--line-offset', '-1', 'a.txt'])).toBeNull();
  });
});
