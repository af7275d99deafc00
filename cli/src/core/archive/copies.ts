/**
 * Rotation-apply workflow: writes a corrected copy of each surviving image
 * under the output directory, keeping its filename.
 */

import { copyFileSync, mkdirSync, writeFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { applyCorrections, countDiscarded } from '../corrections/index.js';
import type { CorrectedEntry } from '../corrections/index.js';
import { ImageUnreadableError, InputValidationError, ScanbookError, WriteFailureError } from '../errors.js';
import type { ReviewArtifact } from '../review/index.js';
import type { ImageRecord } from '../sequence/index.js';
import { sharpCodec } from './codec.js';
import { DEFAULT_QUALITY } from './writer.js';
import type { ImageCodec, RotationOutcome, RotationSummary } from './types.js';

export interface ApplyRotationsOptions {
  outputDir: string;
  /** Copy images absent from the review through unchanged (otherwise they are skipped). */
  copyUnchanged?: boolean;
  quality?: number;
  codec?: ImageCodec;
  onProgress?: (index: number, total: number, entry: CorrectedEntry, outcome: RotationOutcome) => void;
  onWarning?: (warning: ScanbookError) => void;
}

/**
 * Apply review rotations to a scanned sequence.
 *
 * Every image listed in the review's rotations is re-encoded and written,
 * including those whose angle is 0. Images absent from the review are copied
 * or skipped per `copyUnchanged`. Discarded images are never written. A single
 * unreadable or unwritable image is counted in `errors` and the run continues.
 *
 * @throws InputValidationError if the output directory is the input directory.
 * @throws WriteFailureError if the output directory cannot be created.
 */
export async function applyRotations(
  sequence: readonly ImageRecord[],
  artifact: ReviewArtifact,
  opts: ApplyRotationsOptions,
): Promise<RotationSummary> {
  const outputDir = resolve(opts.outputDir);
  const quality = opts.quality ?? DEFAULT_QUALITY;
  const codec = opts.codec ?? sharpCodec;

  if (sequence.some((r) => dirname(r.path) === outputDir)) {
    throw new InputValidationError(`Output directory must differ from the input directory: ${opts.outputDir}`);
  }

  try {
    mkdirSync(outputDir, { recursive: true });
  } catch (err) {
    throw new WriteFailureError(outputDir, { cause: err });
  }

  const entries = applyCorrections(sequence, artifact);
  const summary: RotationSummary = {
    total: sequence.length,
    rotated: 0,
    copied: 0,
    skipped: 0,
    discarded: countDiscarded(sequence, artifact),
    errors: 0,
    outputDir,
  };

  for (let i = 0; i < entries.length; i++) {
    const entry = entries[i];
    const outPath = join(outputDir, entry.record.filename);
    let outcome: RotationOutcome;

    try {
      const listed = artifact.rotations.has(entry.record.filename);
      outcome = await processEntry(entry, outPath, codec, quality, listed, opts.copyUnchanged ?? false);
    } catch (err) {
      if (!(err instanceof ScanbookError)) throw err;
      opts.onWarning?.(err);
      outcome = 'error';
    }

    if (outcome === 'error') summary.errors++;
    else summary[outcome]++;

    opts.onProgress?.(i, entries.length, entry, outcome);
  }

  return summary;
}

async function processEntry(
  entry: CorrectedEntry,
  outPath: string,
  codec: ImageCodec,
  quality: number,
  listed: boolean,
  copyUnchanged: boolean,
): Promise<RotationOutcome> {
  if (!listed) {
    if (!copyUnchanged) return 'skipped';
    try {
      copyFileSync(entry.record.path, outPath);
    } catch (err) {
      throw new WriteFailureError(outPath, { cause: err });
    }
    return 'copied';
  }

  let bytes: Uint8Array;
  try {
    bytes = await codec.encodeRotated(entry.record.path, entry.rotation, quality);
  } catch (err) {
    throw new ImageUnreadableError(entry.record.filename, { cause: err });
  }

  try {
    writeFileSync(outPath, bytes);
  } catch (err) {
    throw new WriteFailureError(outPath, { cause: err });
  }
  return 'rotated';
}
