/**
 * Types for the manual review artifact (rotation corrections, discards,
 * section breaks) produced by the scan review tool.
 */

/** Counter-clockwise correction angle in degrees. */
export type RotationAngle = 0 | 90 | 180 | 270;

export const ROTATION_ANGLES: readonly RotationAngle[] = [0, 90, 180, 270];

/**
 * Which JSON shape the artifact was read from.
 *   legacy  — bare `{ "<filename>": <angle> }` map
 *   current — `{ corrections, sectionBreaks, discards }`
 *   empty   — no artifact file; nothing to apply
 */
export type ReviewFormat = 'legacy' | 'current' | 'empty';

/** Canonical, read-only form of a review artifact. */
export interface ReviewArtifact {
  rotations: ReadonlyMap<string, RotationAngle>;
  discards: ReadonlySet<string>;
  sectionBreaks: ReadonlySet<string>;
  format: ReviewFormat;
  /** Entries that were ignored or coerced while normalizing. */
  warnings: string[];
}

export interface NormalizeOptions {
  /** Reject rotation values outside {0, 90, 180, 270} instead of treating them as 0. */
  strictAngles?: boolean;
}

export interface LoadReviewOptions extends NormalizeOptions {
  /** Missing file is an ArtifactMissingError when true, an empty artifact otherwise. */
  required: boolean;
}
