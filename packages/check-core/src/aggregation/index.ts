/**
 * Aggregation Module Exports
 */

export { MatchAggregator } from './match-aggregator.js';
