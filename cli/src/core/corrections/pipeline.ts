import { rotationFor } from '../review/index.js';
import type { ReviewArtifact, RotationAngle } from '../review/index.js';
import type { ImageRecord } from '../sequence/index.js';

/** A surviving (non-discarded) image paired with its rotation. */
export interface CorrectedEntry {
  record: ImageRecord;
  rotation: RotationAngle;
}

/**
 * Apply review corrections to an ordered image sequence.
 *
 * Discarded filenames are dropped; every other record is emitted once, in
 * input order, with its rotation (0 when the artifact has none).
 */
export function applyCorrections(
  sequence: readonly ImageRecord[],
  artifact: ReviewArtifact,
): CorrectedEntry[] {
  const entries: CorrectedEntry[] = [];
  for (const record of sequence) {
    if (artifact.discards.has(record.filename)) continue;
    entries.push({ record, rotation: rotationFor(artifact, record.filename) });
  }
  return entries;
}

/** Number of images in the sequence that the artifact discards. */
export function countDiscarded(sequence: readonly ImageRecord[], artifact: ReviewArtifact): number {
  return sequence.filter((r) => artifact.discards.has(r.filename)).length;
}
