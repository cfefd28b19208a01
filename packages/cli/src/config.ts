/**
 * Configuration
 *
 * proofmark.config.json: which engine to load, the language pair for bitext
 * checks, rule selection, report and logging settings. String values may
 * reference environment variables as ${NAME} or ${NAME:-default}.
 */

import { readFile } from 'node:fs/promises';
import { dirname, isAbsolute, resolve } from 'node:path';
import { z } from 'zod';
import { ruleSelectionSchema } from '@proofmark/core';
import { DEFAULT_CONTEXT_SIZE, DEFAULT_PROFILE_RUNS } from '@proofmark/check-core';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false.
   */
  allowMissing?: boolean;
  env?: NodeJS.ProcessEnv;
};

function expandEnvInString(input: string, options: EnvExpansionOptions): string {
  const env = options.env ?? process.env;

  return input.replace(/\$\{([^}]+)\}/g, (placeholder, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return placeholder;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options.allowMissing) return placeholder;

    throw new ConfigError(`Missing required environment variable: ${name}`);
  });
}

export function expandEnvVars(value: unknown, options: EnvExpansionOptions = {}): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

const languageCode = z.string().min(1);

const engineSchema = z
  .object({
    /** Module specifier or path (relative to the config file) */
    module: z.string().min(1),
    language: languageCode,
    options: z.record(z.unknown()).default({}),
  })
  .strict();

const bitextSchema = z
  .object({
    sourceLanguage: languageCode,
    targetLanguage: languageCode,
    /** JSON message bundle handed to bitext rule factories */
    messages: z.string().min(1).optional(),
  })
  .strict();

const checkSchema = z
  .object({
    contextSize: z.number().int().min(0).default(DEFAULT_CONTEXT_SIZE),
    lineOffset: z.number().int().min(0).default(0),
  })
  .strict();

const profileSchema = z
  .object({
    runs: z.number().int().min(1).max(1000).default(DEFAULT_PROFILE_RUNS),
  })
  .strict();

const loggingSchema = z
  .object({
    format: z.enum(['text', 'json']).default('text'),
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  })
  .strict();

export const configFileSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    engine: engineSchema,
    bitext: bitextSchema.optional(),
    check: checkSchema.default({}),
    rules: ruleSelectionSchema.default({}),
    profile: profileSchema.default({}),
    logging: loggingSchema.default({}),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export function formatZodError(err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `Invalid proofmark.config.json:\n${issues}`;
}

/**
 * Validate an already parsed config object.
 *
 * Relative engine and message paths are resolved against baseDir; bare
 * module names are left for the module resolver.
 */
export function parseConfig(
  raw: unknown,
  baseDir: string,
  options: EnvExpansionOptions = {}
): ConfigFile {
  const result = configFileSchema.safeParse(expandEnvVars(raw, options));
  if (!result.success) {
    throw new ConfigError(formatZodError(result.error));
  }

  const config = result.data;
  const specifier = config.engine.module;
  const isPath = specifier.startsWith('.') || isAbsolute(specifier);

  return {
    ...config,
    engine: { ...config.engine, module: isPath ? resolve(baseDir, specifier) : specifier },
    bitext: config.bitext && {
      ...config.bitext,
      messages: config.bitext.messages && resolve(baseDir, config.bitext.messages),
    },
  };
}

export async function loadConfig(
  configPath: string,
  options: EnvExpansionOptions = {}
): Promise<ConfigFile> {
  const absolutePath = resolve(process.cwd(), configPath);

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Could not read config file: ${absolutePath}`, { cause: error });
  }

  let parsed: unknown;
  try {
    // Editors on Windows like to prepend a BOM.
    parsed = JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (error) {
    throw new ConfigError(`Config file is not valid JSON: ${absolutePath}`, { cause: error });
  }

  return parseConfig(parsed, dirname(absolutePath), options);
}
