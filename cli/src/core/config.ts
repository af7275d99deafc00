/**
 * Run configuration for the scanbook commands.
 *
 * Every option has a default here and an environment fallback (wired through
 * commander's Option.env in the commands). `resolve*Config` turn the raw
 * commander option bag into typed configs.
 */

import { DEFAULT_SIZE_RATIO, megabytesToBytes } from './paginate/index.js';
import { InputValidationError } from './errors.js';

export const DEFAULTS = {
  correctionsFile: 'rotation_corrections.json',
  reviewFile: 'image_review.json',
  rotateInput: '.',
  bindInput: 'final_preprocessed',
  bindOutput: 'pdfs',
  prefix: 'scan_archive',
  quality: 85,
  maxSizeMb: 200,
  sizeRatio: DEFAULT_SIZE_RATIO,
} as const;

export const ENV_VARS = {
  input: 'SCANBOOK_INPUT',
  output: 'SCANBOOK_OUTPUT',
  prefix: 'SCANBOOK_PREFIX',
  quality: 'SCANBOOK_QUALITY',
  maxSize: 'SCANBOOK_MAX_SIZE_MB',
  sizeRatio: 'SCANBOOK_SIZE_RATIO',
} as const;

export interface RotateConfig {
  correctionsPath: string;
  inputDir: string;
  outputDir: string;
  copyUnchanged: boolean;
  quality: number;
  strictAngles: boolean;
}

export interface PlanConfig {
  reviewPath: string;
  inputDir: string;
  outputDir: string;
  prefix: string;
  maxSizeMb: number;
  maxBytes: number;
  sizeRatio: number;
  strictAngles: boolean;
}

export interface BindConfig extends PlanConfig {
  quality: number;
  /** Overwrite existing parts without asking. */
  assumeYes: boolean;
}

// ── Option readers ───────────────────────────────────────────

function readString(value: unknown, name: string, fallback?: string): string {
  if (value === undefined || value === '') {
    if (fallback === undefined) throw new InputValidationError(`${name} is required`);
    return fallback;
  }
  if (typeof value !== 'string') {
    throw new InputValidationError(`${name} must be a string (got ${typeof value})`);
  }
  return value;
}

function readNumber(value: unknown, name: string, fallback: number): number {
  if (value === undefined) return fallback;
  const n = typeof value === 'string' ? Number(value) : value;
  if (typeof n !== 'number' || !Number.isFinite(n)) {
    throw new InputValidationError(`${name} must be a number (got ${String(value)})`);
  }
  return n;
}

function readQuality(value: unknown): number {
  const q = readNumber(value, '--quality', DEFAULTS.quality);
  if (!Number.isInteger(q) || q < 1 || q > 100) {
    throw new InputValidationError(`--quality must be an integer 1–100 (got ${q})`);
  }
  return q;
}

function readRatio(value: unknown): number {
  const r = readNumber(value, '--size-ratio', DEFAULTS.sizeRatio);
  if (r <= 0 || r > 1) {
    throw new InputValidationError(`--size-ratio must be greater than 0 and at most 1 (got ${r})`);
  }
  return r;
}

// ── Resolvers ────────────────────────────────────────────────

export function resolveRotateConfig(opts: Record<string, unknown>): RotateConfig {
  return {
    correctionsPath: readString(opts.corrections, '--corrections', DEFAULTS.correctionsFile),
    inputDir: readString(opts.input, '--input', DEFAULTS.rotateInput),
    outputDir: readString(opts.output, '--output'),
    copyUnchanged: opts.copyUnchanged === true,
    quality: readQuality(opts.quality),
    strictAngles: opts.strictAngles === true,
  };
}

export function resolvePlanConfig(opts: Record<string, unknown>): PlanConfig {
  const maxSizeMb = readNumber(opts.maxSize, '--max-size', DEFAULTS.maxSizeMb);
  return {
    reviewPath: readString(opts.review, '--review', DEFAULTS.reviewFile),
    inputDir: readString(opts.input, '--input', DEFAULTS.bindInput),
    outputDir: readString(opts.output, '--output', DEFAULTS.bindOutput),
    prefix: readString(opts.prefix, '--prefix', DEFAULTS.prefix),
    maxSizeMb,
    maxBytes: megabytesToBytes(maxSizeMb),
    sizeRatio: readRatio(opts.sizeRatio),
    strictAngles: opts.strictAngles === true,
  };
}

export function resolveBindConfig(opts: Record<string, unknown>): BindConfig {
  return {
    ...resolvePlanConfig(opts),
    quality: readQuality(opts.quality),
    assumeYes: opts.yes === true,
  };
}
