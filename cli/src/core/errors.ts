/**
 * Error types for scanbook workflows.
 *
 * Structural errors (missing/malformed review artifact, bad input directory)
 * abort a command before any output is written. Per-image and per-archive
 * errors are caught inside the workflows and counted in the run summary.
 */

export type ScanbookErrorKind =
  | 'ArtifactMissing'
  | 'MalformedArtifact'
  | 'ImageUnreadable'
  | 'WriteFailure'
  | 'InputValidation';

export class ScanbookError extends Error {
  readonly kind: ScanbookErrorKind;

  constructor(kind: ScanbookErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = 'ScanbookError';
  }
}

/** Review artifact required by the workflow does not exist. */
export class ArtifactMissingError extends ScanbookError {
  readonly path: string;

  constructor(path: string) {
    super('ArtifactMissing', `Corrections file not found: ${path}`);
    this.name = 'ArtifactMissingError';
    this.path = path;
  }
}

/** Review artifact is not valid JSON, or its root is not an object. */
export class MalformedArtifactError extends ScanbookError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('MalformedArtifact', message, options);
    this.name = 'MalformedArtifactError';
  }
}

/** A single source image could not be decoded. Non-fatal. */
export class ImageUnreadableError extends ScanbookError {
  readonly filename: string;

  constructor(filename: string, options?: { cause?: unknown }) {
    super('ImageUnreadable', `Could not read ${filename}: ${describeCause(options?.cause)}`, options);
    this.name = 'ImageUnreadableError';
    this.filename = filename;
  }
}

/** An output file could not be written. Non-fatal per section/image. */
export class WriteFailureError extends ScanbookError {
  readonly outputPath: string;

  constructor(outputPath: string, options?: { cause?: unknown }) {
    super('WriteFailure', `Could not write ${outputPath}: ${describeCause(options?.cause)}`, options);
    this.name = 'WriteFailureError';
    this.outputPath = outputPath;
  }
}

/** Bad input location or option value. */
export class InputValidationError extends ScanbookError {
  constructor(message: string) {
    super('InputValidation', message);
    this.name = 'InputValidationError';
  }
}

/** Message text of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function describeCause(cause: unknown): string {
  return cause === undefined ? 'unknown error' : errorMessage(cause);
}
