/**
 * Source adapter contract
 */

import type { RawRecord } from '../types.js';

/**
 * A data source yields raw records lazily. Total failure throws AdapterFailure;
 * an empty source yields nothing.
 */
export interface SourceAdapter {
  readonly sourceId: string;
  describe(): Record<string, unknown>;
  fetch(): AsyncIterable<RawRecord>;
}

export type Clock = () => Date;
