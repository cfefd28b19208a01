/**
 * @proofmark/bitext-reader
 *
 * Parallel corpus readers implementing the streaming position contract.
 */

export { TabBitextReader } from './tab-bitext-reader.js';
export type { TabBitextReaderOptions } from './tab-bitext-reader.js';
