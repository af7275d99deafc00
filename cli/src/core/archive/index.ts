/**
 * Archive output: PDF sections and rotated image copies.
 *
 * Usage:
 *   import { planArchiveJobs, writeArchives, applyRotations } from '../core/archive/index.js';
 */

export { applyRotations } from './copies.js';
export { sharpCodec } from './codec.js';
export { archiveFileName, planArchiveJobs } from './jobs.js';
export { DEFAULT_QUALITY, writeArchive, writeArchives } from './writer.js';
export type { ApplyRotationsOptions } from './copies.js';
export type { WriteArchiveOptions, WriteArchivesOptions } from './writer.js';
export type {
  ArchiveJob,
  ArchiveResult,
  ArchiveWriteFailure,
  BindSummary,
  ImageCodec,
  ImageFailure,
  RenderedPage,
  RotationOutcome,
  RotationSummary,
} from './types.js';
