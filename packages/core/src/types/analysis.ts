/**
 * Analysis Types
 *
 * Output of the external tokenizer/tagger/disambiguator pipeline.
 */

/** A language known to an analysis engine */
export interface LanguageInfo {
  /** Short code such as "en" or "de-DE" */
  code: string;
  name?: string;
}

export interface AnalyzedToken {
  readonly token: string;
  /** Offset of the token in its sentence */
  readonly startPos: number;
  readonly lemma?: string;
  readonly posTag?: string;
}

/**
 * A tokenized and tagged sentence
 */
export interface AnalyzedSentence {
  /** The sentence text exactly as it appears in the checked input */
  readonly text: string;
  readonly tokens: readonly AnalyzedToken[];
}
