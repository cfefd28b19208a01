import { afterEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CheckError } from '@proofmark/core';
import type { StreamingPosition } from '@proofmark/core';
import { TabBitextReader } from '../src/index.js';

let tmpDir = '';

afterEach(() => {
  if (tmpDir) {
    rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = '';
  }
});

interface ReadPair {
  source: string;
  target: string;
  position: StreamingPosition;
}

function readAll(reader: TabBitextReader): ReadPair[] {
  const seen: ReadPair[] = [];
  for (const pair of reader) {
    seen.push({ ...pair, position: reader.getPosition() });
  }
  return seen;
}

describe('TabBitextReader', () => {
  it('yields pairs with the position of each target', () => {
    const reader = new TabBitextReader('Hello world.\tHallo Welt.\n\nA cat.\tEine Katze.\r\n');

    const pairs = readAll(reader);

    expect(pairs).toEqual([
      {
        source: 'Hello world.',
        target: 'Hallo Welt.',
        position: {
          sentenceByteOffset: 13,
          columnCount: 13,
          lineCount: 0,
          currentLineText: 'Hello world.\tHallo Welt.',
          lineStartOffset: 0,
        },
      },
      {
        source: 'A cat.',
        target: 'Eine Katze.',
        position: {
          sentenceByteOffset: 33,
          columnCount: 7,
          lineCount: 2,
          currentLineText: 'A cat.\tEine Katze.',
          lineStartOffset: 26,
        },
      },
    ]);
  });

  it('starts at the origin before the first pair', () => {
    const reader = new TabBitextReader('a\tb');

    expect(reader.getPosition()).toEqual({
      sentenceByteOffset: 0,
      columnCount: 0,
      lineCount: 0,
      currentLineText: '',
      lineStartOffset: 0,
    });
  });

  it('keeps extra tabs inside the target', () => {
    const reader = new TabBitextReader('Name\tVorname\tNachname');

    expect([...reader]).toEqual([{ source: 'Name', target: 'Vorname\tNachname' }]);
  });

  it('does not treat quotes as field delimiters', () => {
    const reader = new TabBitextReader('He said "hi".\tEr sagte "hallo".');

    expect([...reader]).toEqual([{ source: 'He said "hi".', target: 'Er sagte "hallo".' }]);
  });

  it('counts a leading byte order mark in document offsets', () => {
    const content = '\uFEFFYes.\tJa.\nNo.\tNein.';
    const reader = new TabBitextReader(content);

    const pairs = readAll(reader);

    expect(pairs[0]?.source).toBe('Yes.');
    expect(pairs[0]?.position).toEqual({
      sentenceByteOffset: 6,
      columnCount: 5,
      lineCount: 0,
      currentLineText: 'Yes.\tJa.',
      lineStartOffset: 1,
    });
    expect(pairs.map((pair) => content.slice(pair.position.sentenceByteOffset))).toEqual([
      'Ja.\nNo.\tNein.',
      'Nein.',
    ]);
  });

  it('fails on a line without a target', () => {
    const reader = new TabBitextReader('One.\tEins.\nno tab here\n', { name: 'corpus.tsv' });
    const iterator = reader[Symbol.iterator]();
    iterator.next();

    try {
      iterator.next();
      expect.unreachable('reader accepted a line without a tab');
    } catch (error) {
      expect(error).toBeInstanceOf(CheckError);
      if (error instanceof CheckError) {
        expect(error.code).toBe('READER_FAILED');
        expect(error.message).toBe('Line 2 of corpus.tsv has no tab-separated target');
      }
    }
  });

  it('never moves its position backwards', () => {
    const reader = new TabBitextReader('a\tb\nlonger source\tc\nx\ty');

    const offsets = readAll(reader).map((pair) => pair.position.sentenceByteOffset);

    expect(offsets).toEqual([2, 18, 22]);
  });

  describe('fromFile', () => {
    it('reads a corpus file', async () => {
      tmpDir = mkdtempSync(join(tmpdir(), 'bitext-reader-'));
      const filePath = join(tmpDir, 'corpus.tsv');
      writeFileSync(filePath, 'Good night.\tGute Nacht.\n');

      const reader = await TabBitextReader.fromFile(filePath);

      expect([...reader]).toEqual([{ source: 'Good night.', target: 'Gute Nacht.' }]);
    });

    it('fails on a missing file', async () => {
      tmpDir = mkdtempSync(join(tmpdir(), 'bitext-reader-'));

      const error = await TabBitextReader.fromFile(join(tmpDir, 'absent.tsv')).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CheckError);
      if (error instanceof CheckError) {
        expect(error.code).toBe('RESOURCE_LOAD_FAILED');
      }
    });
  });
});
