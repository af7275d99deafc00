import { existsSync, readFileSync } from 'node:fs';
import { ArtifactMissingError, MalformedArtifactError, errorMessage } from '../errors.js';
import { emptyReview, normalizeReview } from './normalize.js';
import type { LoadReviewOptions, ReviewArtifact } from './types.js';

/**
 * Read and normalize a review artifact file.
 *
 * A missing file is fatal only for workflows that need something to apply
 * (`required: true`); otherwise it means "no corrections".
 */
export function loadReview(path: string, opts: LoadReviewOptions): ReviewArtifact {
  if (!existsSync(path)) {
    if (opts.required) throw new ArtifactMissingError(path);
    return emptyReview();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new MalformedArtifactError(`Invalid JSON in ${path}: ${errorMessage(err)}`, { cause: err });
  }

  return normalizeReview(parsed, { strictAngles: opts.strictAngles });
}
