/**
 * Profiling Types
 */

/** Raw timings of one rule over a corpus */
export interface ProfileSample {
  ruleId: string;
  /** Wall-clock milliseconds of each run */
  perRunMillis: number[];
  /** Matches summed over every run */
  matchCount: number;
  sentenceCount: number;
}

/** Summary row for one rule */
export interface ProfileEntry {
  ruleId: string;
  medianMillis: number;
  sentenceCount: number;
  matchCount: number;
  sentencesPerSecond: number;
}

export interface ProfileReport {
  ruleCount: number;
  sentenceCount: number;
  entries: ProfileEntry[];
}
