#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   proofmark --config ./proofmark.config.json [--mode check] [--line-offset N] <input>
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { CheckError } from '@proofmark/core';
import { ConfigError, loadConfig } from './config.js';
import { loadEngineModule } from './engine-loader.js';
import { Logger } from './logger.js';
import { Runner, runModeSchema } from './runner.js';
import { parseArgs, USAGE } from './args.js';

async function main(): Promise<void> {
  let logger = new Logger();
  const args = parseArgs(process.argv.slice(2));

  if (!args) {
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }

  try {
    const mode = runModeSchema.safeParse(args.mode);
    if (!mode.success) {
      throw new ConfigError(
        `Unknown mode '${args.mode}'. Modes: ${runModeSchema.options.join(', ')}`
      );
    }

    const config = await loadConfig(args.configPath);
    logger = new Logger({ level: config.logging.level, format: config.logging.format });

    const engineModule = await loadEngineModule(config.engine.module);
    const inputPath = resolve(process.cwd(), args.inputPath);
    const content = await readFile(inputPath, 'utf-8').catch((error: unknown) => {
      throw new CheckError({
        code: 'RESOURCE_LOAD_FAILED',
        message: `Could not read input file: ${inputPath}`,
        cause: error instanceof Error ? error : undefined,
      });
    });

    await new Runner({ config, engineModule, logger }).run(
      mode.data,
      { name: args.inputPath, content },
      { lineOffset: args.lineOffset }
    );
  } catch (error) {
    if (error instanceof CheckError) {
      logger.error(error.toActionableMessage(), { code: error.code, context: error.context });
    } else if (error instanceof ConfigError) {
      logger.error(error.message);
    } else {
      logger.error('Run failed', { error });
    }
    process.exitCode = 1;
  }
}

await main();
