/**
 * Profile Report Formatter
 */

import { stringify } from 'csv-stringify/sync';
import type { ProfileReport } from '@proofmark/core';

const PROFILE_COLUMNS = [
  { key: 'ruleId', header: 'Rule ID' },
  { key: 'medianMillis', header: 'Time' },
  { key: 'sentenceCount', header: 'Sentences' },
  { key: 'matchCount', header: 'Matches' },
  { key: 'sentencesPerSecond', header: 'Sentences per sec.' },
];

/**
 * Format a profile report as a heading and a tab-separated table.
 */
export function formatProfileReport(report: ProfileReport): string {
  const rows = report.entries.map((entry) => ({
    ruleId: entry.ruleId,
    medianMillis: String(entry.medianMillis),
    sentenceCount: String(entry.sentenceCount),
    matchCount: String(entry.matchCount),
    sentencesPerSecond: entry.sentencesPerSecond.toFixed(1),
  }));

  const table = stringify(rows, {
    delimiter: '\t',
    header: true,
    columns: PROFILE_COLUMNS,
  });

  return `Testing ${report.ruleCount} rules\n${table}`;
}
