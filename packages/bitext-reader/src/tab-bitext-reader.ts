/**
 * Tab Bitext Reader
 *
 * Reads a parallel corpus with one aligned pair per line, source and target
 * separated by a tab.
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import type { AlignedPair, IBitextReader, StreamingPosition } from '@proofmark/core';
import { CheckError } from '@proofmark/core';

export interface TabBitextReaderOptions {
  /** Name reported in errors (default: "<input>") */
  name?: string;
}

const INITIAL_POSITION: StreamingPosition = {
  sentenceByteOffset: 0,
  columnCount: 0,
  lineCount: 0,
  currentLineText: '',
  lineStartOffset: 0,
};

export class TabBitextReader implements IBitextReader {
  private position: StreamingPosition = INITIAL_POSITION;
  private readonly name: string;

  constructor(
    private readonly content: string,
    options: TabBitextReaderOptions = {}
  ) {
    this.name = options.name ?? '<input>';
  }

  /**
   * Read a whole corpus file.
   */
  static async fromFile(filePath: string, encoding: BufferEncoding = 'utf-8'): Promise<TabBitextReader> {
    let content: string;
    try {
      content = await readFile(filePath, encoding);
    } catch (error) {
      throw new CheckError({
        code: 'RESOURCE_LOAD_FAILED',
        message: `Could not read bitext file: ${filePath}`,
        cause: error instanceof Error ? error : undefined,
        context: { filePath },
      });
    }
    return new TabBitextReader(content, { name: filePath });
  }

  /**
   * Position of the pair most recently yielded.
   *
   * The target starts one column after the source and its tab; offsets count
   * from the start of the document, including a leading byte order mark,
   * which is not part of the first line.
   */
  getPosition(): StreamingPosition {
    return this.position;
  }

  *[Symbol.iterator](): Iterator<AlignedPair> {
    let lineStart = this.content.startsWith('\uFEFF') ? 1 : 0;
    let lineIndex = 0;

    while (lineStart <= this.content.length) {
      const newline = this.content.indexOf('\n', lineStart);
      const lineEnd = newline === -1 ? this.content.length : newline;
      const line = this.content.slice(lineStart, lineEnd).replace(/\r$/, '');

      if (line.trim() !== '') {
        const pair = this.parseLine(line, lineIndex);
        const columnCount = pair.source.length + 1;

        // Updated before yielding: callers read it as soon as they get the pair.
        this.position = {
          sentenceByteOffset: lineStart + columnCount,
          columnCount,
          lineCount: lineIndex,
          currentLineText: line,
          lineStartOffset: lineStart,
        };
        yield pair;
      }

      if (newline === -1) {
        break;
      }
      lineStart = newline + 1;
      lineIndex++;
    }
  }

  private parseLine(line: string, lineIndex: number): AlignedPair {
    const rows: unknown = parse(line, {
      delimiter: '\t',
      quote: false,
      relax_column_count: true,
    });

    const fields = Array.isArray(rows) && Array.isArray(rows[0]) ? rows[0].map(String) : [];
    if (fields.length < 2) {
      throw new CheckError({
        code: 'READER_FAILED',
        message: `Line ${lineIndex + 1} of ${this.name} has no tab-separated target`,
        suggestion: 'Write each aligned pair as "source<TAB>target" on its own line.',
        context: { line: lineIndex + 1 },
      });
    }

    return {
      source: fields[0] ?? '',
      target: fields.slice(1).join('\t'),
    };
  }
}
