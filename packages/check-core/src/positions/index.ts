/**
 * Position Module Exports
 */

export {
  shiftLines,
  adjustMatchPosition,
  shiftFromStreamingPosition,
  adjustToStreamingPosition,
  SentencePositionTracker,
} from './position-adjuster.js';
