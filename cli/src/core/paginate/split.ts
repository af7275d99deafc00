/**
 * Section splitting for archive output.
 *
 * Two mutually exclusive modes, chosen by whether the review artifact has any
 * section breaks:
 *   manual — a new section starts at each break filename, unless the current
 *            section is still empty
 *   auto   — entries are packed greedily until the next one would push the
 *            estimated size over maxBytes
 *
 * Both modes partition the input exactly: concatenating the sections gives
 * back the input sequence, and no section is empty.
 */

import type { CorrectedEntry } from '../corrections/index.js';
import type { ReviewArtifact } from '../review/index.js';
import type { ImageRecord } from '../sequence/index.js';
import type { Section, SplitOptions, SplitResult } from './types.js';

/** Estimated output size relative to source file size after JPEG re-encoding. */
export const DEFAULT_SIZE_RATIO = 0.85;

const BYTES_PER_MB = 1024 * 1024;

export function megabytesToBytes(mb: number): number {
  return mb * BYTES_PER_MB;
}

export function estimateBytes(record: ImageRecord, sizeRatio: number = DEFAULT_SIZE_RATIO): number {
  return record.sizeBytes * sizeRatio;
}

function closeSection(
  out: Section[],
  entries: CorrectedEntry[],
  sizeRatio: number,
): void {
  const estimatedBytes = entries.reduce((sum, e) => sum + estimateBytes(e.record, sizeRatio), 0);
  out.push({ index: out.length, entries, estimatedBytes });
}

/**
 * Split at manual break markers. The entry carrying the marker opens the next
 * section. A marker on the first entry, or on a filename not in `entries`,
 * produces no split.
 */
export function splitManual(
  entries: readonly CorrectedEntry[],
  breaks: ReadonlySet<string>,
  sizeRatio: number = DEFAULT_SIZE_RATIO,
): Section[] {
  const sections: Section[] = [];
  let current: CorrectedEntry[] = [];

  for (const entry of entries) {
    if (breaks.has(entry.record.filename) && current.length > 0) {
      closeSection(sections, current, sizeRatio);
      current = [];
    }
    current.push(entry);
  }

  if (current.length > 0) closeSection(sections, current, sizeRatio);
  return sections;
}

/**
 * Greedy size-bounded split. A single entry larger than `maxBytes` still
 * gets a section of its own; with `maxBytes <= 0` every entry does.
 */
export function splitBySize(
  entries: readonly CorrectedEntry[],
  maxBytes: number,
  sizeRatio: number = DEFAULT_SIZE_RATIO,
): Section[] {
  const sections: Section[] = [];
  let current: CorrectedEntry[] = [];
  let currentSize = 0;

  for (const entry of entries) {
    const estimate = estimateBytes(entry.record, sizeRatio);

    if (currentSize + estimate > maxBytes && current.length > 0) {
      closeSection(sections, current, sizeRatio);
      current = [];
      currentSize = 0;
    }

    current.push(entry);
    currentSize += estimate;
  }

  if (current.length > 0) closeSection(sections, current, sizeRatio);
  return sections;
}

/** Partition corrected entries into sections (manual if any breaks are defined). */
export function splitSections(
  entries: readonly CorrectedEntry[],
  artifact: ReviewArtifact,
  opts: SplitOptions,
): SplitResult {
  const sizeRatio = opts.sizeRatio ?? DEFAULT_SIZE_RATIO;

  if (artifact.sectionBreaks.size > 0) {
    return { mode: 'manual', sections: splitManual(entries, artifact.sectionBreaks, sizeRatio) };
  }
  return { mode: 'auto', sections: splitBySize(entries, opts.maxBytes, sizeRatio) };
}
