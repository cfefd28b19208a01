/**
 * Bitext Reader Interface
 */

import type { AlignedPair, StreamingPosition } from '../types/index.js';

/**
 * Pull-based reader of aligned sentence pairs.
 *
 * Implementations must update their position before yielding a pair, so that
 * `getPosition()` called right after receiving a pair describes that pair.
 */
export interface IBitextReader extends Iterable<AlignedPair> {
  getPosition(): StreamingPosition;
}
