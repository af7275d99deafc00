/**
 * Types for archive output: image codec collaborator, archive jobs and
 * per-run summaries.
 */

import type { RotationAngle } from '../review/index.js';
import type { Section } from '../paginate/index.js';

// ── Codec ────────────────────────────────────────────────────

/** A decoded, rotated and JPEG re-encoded page image. */
export interface RenderedPage {
  jpeg: Uint8Array;
  /** Pixel size after rotation. */
  width: number;
  height: number;
}

/** Decode/rotate/encode collaborator. Rejects when the source cannot be decoded. */
export interface ImageCodec {
  /** First frame as an sRGB JPEG, rotated per the review angle. */
  renderPage(path: string, rotation: RotationAngle, quality: number): Promise<RenderedPage>;
  /** Rotated image bytes in the source file's own format. */
  encodeRotated(path: string, rotation: RotationAngle, quality: number): Promise<Uint8Array>;
}

// ── Jobs ─────────────────────────────────────────────────────

export interface ArchiveJob {
  section: Section;
  outputPath: string;
  /** 1-based part number, used in the output filename. */
  sequenceNumber: number;
}

// ── Results ──────────────────────────────────────────────────

export interface ImageFailure {
  filename: string;
  error: string;
}

export interface ArchiveResult {
  outputPath: string;
  sequenceNumber: number;
  /** Pages actually included. */
  pageCount: number;
  /** False when no page could be decoded (no file is produced). */
  written: boolean;
  bytesWritten: number;
  failures: ImageFailure[];
}

export interface ArchiveWriteFailure {
  outputPath: string;
  sequenceNumber: number;
  error: string;
}

export interface BindSummary {
  sections: number;
  written: number;
  /** Sections where every image failed to decode. */
  empty: number;
  pages: number;
  unreadable: number;
  writeFailures: ArchiveWriteFailure[];
  archives: ArchiveResult[];
}

export type RotationOutcome = 'rotated' | 'copied' | 'skipped' | 'error';

export interface RotationSummary {
  total: number;
  rotated: number;
  copied: number;
  skipped: number;
  discarded: number;
  errors: number;
  outputDir: string;
}
