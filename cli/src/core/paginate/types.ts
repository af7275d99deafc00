/**
 * Types for splitting the corrected image sequence into archive sections.
 */

import type { CorrectedEntry } from '../corrections/index.js';

/**
 *   manual — section breaks come from the review artifact
 *   auto   — sections are bounded by estimated output size
 */
export type SplitMode = 'manual' | 'auto';

/** A non-empty, contiguous run of entries destined for one archive. */
export interface Section {
  /** Zero-based position in the split sequence. */
  index: number;
  entries: CorrectedEntry[];
  /** Sum of estimated output bytes of the entries. */
  estimatedBytes: number;
}

export interface SplitOptions {
  /** Upper bound on estimated bytes per section (automatic mode only). */
  maxBytes: number;
  /** Estimated output/input size ratio after re-encoding. Default 0.85. */
  sizeRatio?: number;
}

export interface SplitResult {
  mode: SplitMode;
  sections: Section[];
}
