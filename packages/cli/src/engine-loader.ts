/**
 * Engine Loader
 *
 * Loads the analysis engine plugin named in the config. A plugin module
 * exports:
 *
 *   createEngine(language, options)      required, may return a promise
 *   bitextRuleSources(source, target)    optional, declarative bitext rules
 *   registerBitextRules(registry)        optional, built-in bitext rules
 */

import { isAbsolute } from 'node:path';
import { pathToFileURL } from 'node:url';
import type { IAnalysisEngine, IBitextRuleSource, LanguageInfo } from '@proofmark/core';
import { CheckError } from '@proofmark/core';
import type { BitextRuleRegistry } from '@proofmark/check-core';

export interface EngineModule {
  createEngine(language: string, options: Record<string, unknown>): Promise<IAnalysisEngine>;
  bitextRuleSources(source: LanguageInfo, target: LanguageInfo): IBitextRuleSource[];
  registerBitextRules(registry: BitextRuleRegistry): void;
}

export type ModuleImporter = (specifier: string) => Promise<unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isLanguageInfo(value: unknown): value is LanguageInfo {
  return isRecord(value) && typeof value.code === 'string';
}

export function isAnalysisEngine(value: unknown): value is IAnalysisEngine {
  return (
    isRecord(value) &&
    isLanguageInfo(value.language) &&
    typeof value.tokenizeSentences === 'function' &&
    typeof value.analyze === 'function' &&
    typeof value.matchAll === 'function' &&
    typeof value.getAllRules === 'function'
  );
}

function isBitextRuleSource(value: unknown): value is IBitextRuleSource {
  return isRecord(value) && typeof value.name === 'string' && typeof value.load === 'function';
}

function invalidModule(specifier: string, message: string): CheckError {
  return new CheckError({
    code: 'RESOURCE_LOAD_FAILED',
    message: `Engine module ${specifier} ${message}`,
    suggestion: 'Export createEngine(language, options) returning an analysis engine.',
    context: { module: specifier },
  });
}

const defaultImporter: ModuleImporter = (specifier) =>
  import(isAbsolute(specifier) ? pathToFileURL(specifier).href : specifier);

/**
 * Import an engine plugin and check its exports.
 */
export async function loadEngineModule(
  specifier: string,
  importModule: ModuleImporter = defaultImporter
): Promise<EngineModule> {
  let loaded: unknown;
  try {
    loaded = await importModule(specifier);
  } catch (error) {
    throw new CheckError({
      code: 'RESOURCE_LOAD_FAILED',
      message: `Could not load engine module: ${specifier}`,
      cause: error instanceof Error ? error : undefined,
      context: { module: specifier },
    });
  }

  if (!isRecord(loaded)) {
    throw invalidModule(specifier, 'does not export createEngine');
  }

  const { createEngine, bitextRuleSources, registerBitextRules } = loaded;
  if (typeof createEngine !== 'function') {
    throw invalidModule(specifier, 'does not export createEngine');
  }

  return {
    async createEngine(language, options) {
      const engine: unknown = await Reflect.apply(createEngine, loaded, [language, options]);
      if (!isAnalysisEngine(engine)) {
        throw invalidModule(specifier, `returned an invalid engine for '${language}'`);
      }
      return engine;
    },

    bitextRuleSources(source, target) {
      if (typeof bitextRuleSources !== 'function') {
        return [];
      }
      const sources: unknown = Reflect.apply(bitextRuleSources, loaded, [source, target]);
      if (!Array.isArray(sources) || !sources.every(isBitextRuleSource)) {
        throw invalidModule(specifier, 'returned invalid bitext rule sources');
      }
      return sources;
    },

    registerBitextRules(registry) {
      if (typeof registerBitextRules === 'function') {
        Reflect.apply(registerBitextRules, loaded, [registry]);
      }
    },
  };
}
