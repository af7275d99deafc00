/**
 * Review artifact normalization.
 *
 * Accepts both JSON shapes written by the review tool and produces the same
 * canonical ReviewArtifact. Unknown angles become 0 and missing keys become
 * empty; only a non-object root is fatal.
 */

import { MalformedArtifactError } from '../errors.js';
import { ROTATION_ANGLES } from './types.js';
import type { NormalizeOptions, ReviewArtifact, RotationAngle } from './types.js';

type JsonObject = Record<string, unknown>;

const VALID_ANGLES = new Set<unknown>(ROTATION_ANGLES);

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Narrow an arbitrary value to a valid rotation angle. */
export function isRotationAngle(value: unknown): value is RotationAngle {
  return VALID_ANGLES.has(value);
}

/** The "no corrections" artifact. */
export function emptyReview(): ReviewArtifact {
  return {
    rotations: new Map(),
    discards: new Set(),
    sectionBreaks: new Set(),
    format: 'empty',
    warnings: [],
  };
}

function readRotations(
  raw: unknown,
  key: string,
  warnings: string[],
  opts: NormalizeOptions,
): Map<string, RotationAngle> {
  const rotations = new Map<string, RotationAngle>();
  if (raw === undefined) return rotations;

  if (!isJsonObject(raw)) {
    warnings.push(`"${key}" is not an object — ignored`);
    return rotations;
  }

  for (const [filename, value] of Object.entries(raw)) {
    if (isRotationAngle(value)) {
      rotations.set(filename, value);
      continue;
    }
    if (opts.strictAngles) {
      throw new MalformedArtifactError(
        `Invalid rotation for "${filename}": ${JSON.stringify(value)} (expected 0, 90, 180 or 270)`,
      );
    }
    warnings.push(`${filename}: rotation ${JSON.stringify(value)} is not 0/90/180/270 — treated as 0`);
    rotations.set(filename, 0);
  }
  return rotations;
}

function readFilenameSet(raw: unknown, key: string, warnings: string[]): Set<string> {
  const names = new Set<string>();
  if (raw === undefined) return names;

  if (!Array.isArray(raw)) {
    warnings.push(`"${key}" is not an array — ignored`);
    return names;
  }

  for (const item of raw) {
    if (typeof item === 'string') {
      names.add(item);
    } else {
      warnings.push(`"${key}" entry ${JSON.stringify(item)} is not a filename — ignored`);
    }
  }
  return names;
}

/**
 * Normalize parsed review JSON into a ReviewArtifact.
 *
 * @throws MalformedArtifactError if the root is not an object, or (with
 *   `strictAngles`) a rotation value is outside {0, 90, 180, 270}.
 */
export function normalizeReview(raw: unknown, opts: NormalizeOptions = {}): ReviewArtifact {
  if (!isJsonObject(raw)) {
    const got = raw === null ? 'null' : Array.isArray(raw) ? 'array' : typeof raw;
    throw new MalformedArtifactError(`Review artifact must be a JSON object (got ${got})`);
  }

  const warnings: string[] = [];

  if (!('corrections' in raw)) {
    return {
      rotations: readRotations(raw, 'root', warnings, opts),
      discards: new Set(),
      sectionBreaks: new Set(),
      format: 'legacy',
      warnings,
    };
  }

  return {
    rotations: readRotations(raw.corrections, 'corrections', warnings, opts),
    sectionBreaks: readFilenameSet(raw.sectionBreaks, 'sectionBreaks', warnings),
    discards: readFilenameSet(raw.discards, 'discards', warnings),
    format: 'current',
    warnings,
  };
}

/** Rotation recorded for a filename, 0 when none. */
export function rotationFor(artifact: ReviewArtifact, filename: string): RotationAngle {
  return artifact.rotations.get(filename) ?? 0;
}
