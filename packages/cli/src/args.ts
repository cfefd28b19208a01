/**
 * Command line arguments
 */

import { runModeSchema } from './runner.js';

export const USAGE = [
  'Usage: proofmark --config <proofmark.config.json> [--mode <mode>] [--line-offset <n>] <input>',
  '',
  `Modes: ${runModeSchema.options.join(', ')} (default: check)`,
  'Bitext modes read one "source<TAB>target" pair per line.',
].join('\n');

export interface CliArgs {
  configPath: string;
  mode: string;
  lineOffset?: number;
  inputPath: string;
}

function optionValue(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  return index !== -1 ? args[index + 1] : undefined;
}

export function parseArgs(args: string[]): CliArgs | null {
  const configPath = optionValue(args, '--config');
  const mode = optionValue(args, '--mode') ?? 'check';
  const rawLineOffset = optionValue(args, '--line-offset');

  const optionIndexes = new Set<number>();
  for (const name of ['--config', '--mode', '--line-offset']) {
    const index = args.indexOf(name);
    if (index !== -1) {
      optionIndexes.add(index);
      optionIndexes.add(index + 1);
    }
  }
  const positional = args.filter((_, i) => !optionIndexes.has(i));
  const inputPath = positional[0];

  if (!configPath || !inputPath || positional.length > 1) {
    return null;
  }

  let lineOffset: number | undefined;
  if (rawLineOffset !== undefined) {
    lineOffset = Number(rawLineOffset);
    if (!Number.isInteger(lineOffset) || lineOffset < 0) {
      return null;
    }
  }

  return { configPath, mode, lineOffset, inputPath };
}
