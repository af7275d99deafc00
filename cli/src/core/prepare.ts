/**
 * Shared front half of the `plan` and `bind` commands: load the review,
 * scan the input, apply corrections, split into sections and plan one
 * archive job per section. Nothing is decoded or written here.
 */

import { planArchiveJobs } from './archive/index.js';
import type { ArchiveJob } from './archive/index.js';
import type { PlanConfig } from './config.js';
import { applyCorrections, countDiscarded } from './corrections/index.js';
import type { CorrectedEntry } from './corrections/index.js';
import { splitSections } from './paginate/index.js';
import type { SplitMode } from './paginate/index.js';
import { loadReview } from './review/index.js';
import type { ReviewArtifact } from './review/index.js';
import { scanImageDirectory } from './sequence/index.js';
import type { ImageRecord } from './sequence/index.js';

export interface PreparedRun {
  artifact: ReviewArtifact;
  sequence: ImageRecord[];
  entries: CorrectedEntry[];
  discarded: number;
  mode: SplitMode;
  jobs: ArchiveJob[];
}

/**
 * @throws MalformedArtifactError for an unreadable review file.
 * @throws InputValidationError for a missing input directory.
 */
export function prepareRun(config: PlanConfig): PreparedRun {
  const artifact = loadReview(config.reviewPath, {
    required: false,
    strictAngles: config.strictAngles,
  });
  const sequence = scanImageDirectory(config.inputDir);
  const entries = applyCorrections(sequence, artifact);
  const { mode, sections } = splitSections(entries, artifact, {
    maxBytes: config.maxBytes,
    sizeRatio: config.sizeRatio,
  });

  return {
    artifact,
    sequence,
    entries,
    discarded: countDiscarded(sequence, artifact),
    mode,
    jobs: planArchiveJobs(sections, config.outputDir, config.prefix),
  };
}
