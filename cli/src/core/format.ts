/**
 * CLI output formatting for scanbook results.
 */

import chalk from 'chalk';
import { basename } from 'node:path';
import type { ArchiveJob, ArchiveResult, BindSummary, RotationSummary } from './archive/index.js';
import type { SplitMode } from './paginate/index.js';
import type { PreparedRun } from './prepare.js';
import type { ReviewArtifact } from './review/index.js';

const line = (w: number): string => chalk.dim('─'.repeat(w));

export function formatMegabytes(bytes: number): string {
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

const plural = (n: number, word: string): string => `${n} ${word}${n === 1 ? '' : 's'}`;

/** One-line description of what was loaded from the review artifact. */
export function describeReview(artifact: ReviewArtifact, path: string): string {
  if (artifact.format === 'empty') {
    return `No review file found (${path}), using defaults`;
  }
  return `Loaded review (${artifact.format}): ${plural(artifact.rotations.size, 'rotation')}, `
    + `${plural(artifact.sectionBreaks.size, 'section break')}, ${plural(artifact.discards.size, 'discard')}`;
}

export function printReviewLoaded(artifact: ReviewArtifact, path: string): void {
  const text = describeReview(artifact, path);
  console.log(artifact.format === 'empty' ? chalk.yellow(text) : text);
  for (const w of artifact.warnings) {
    console.log(chalk.yellow(`  • ${w}`));
  }
}

/** "first.jpg – last.jpg" for a job's section. */
export function describeRange(job: ArchiveJob): string {
  const entries = job.section.entries;
  const first = entries[0].record.filename;
  const last = entries[entries.length - 1].record.filename;
  return first === last ? first : `${first} – ${last}`;
}

export function printSectionPlan(mode: SplitMode, jobs: readonly ArchiveJob[], maxSizeMb: number): void {
  console.log();
  if (mode === 'manual') {
    console.log(chalk.bold(`Using ${plural(jobs.length, 'manual section')}`));
  } else {
    console.log(chalk.bold(`Auto-split into ${plural(jobs.length, 'section')} (max ${maxSizeMb} MB each)`));
  }
  for (const job of jobs) {
    const count = plural(job.section.entries.length, 'image');
    console.log(
      `  Part ${job.sequenceNumber}: ${count} (${describeRange(job)})`
      + chalk.dim(`  ~${formatMegabytes(job.section.estimatedBytes)} → ${basename(job.outputPath)}`),
    );
  }
}

/** Machine-readable section plan (`--json`). */
export function sectionPlanJson(mode: SplitMode, jobs: readonly ArchiveJob[]): object {
  return {
    mode,
    sectionCount: jobs.length,
    sections: jobs.map((job) => ({
      part: job.sequenceNumber,
      outputPath: job.outputPath,
      imageCount: job.section.entries.length,
      estimatedBytes: Math.round(job.section.estimatedBytes),
      images: job.section.entries.map((e) => ({ filename: e.record.filename, rotation: e.rotation })),
    })),
  };
}

/** Machine-readable `bind` result (`--json`). */
export function bindResultJson(reviewPath: string, run: PreparedRun, summary: BindSummary): object {
  return {
    review: reviewPath,
    format: run.artifact.format,
    warnings: run.artifact.warnings,
    mode: run.mode,
    images: run.sequence.length,
    discarded: run.discarded,
    ...summary,
  };
}

/** Per-archive progress line, on stderr. */
export function printArchiveResult(result: ArchiveResult): void {
  if (result.written) {
    console.error(chalk.green(`  Created: ${formatMegabytes(result.bytesWritten)} (${plural(result.pageCount, 'page')})`));
  } else {
    console.error(chalk.yellow('  Skipped: no readable images in this section'));
  }
}

export function printBindSummary(summary: BindSummary, outputDir: string): void {
  const W = 50;
  const hasErrors = summary.unreadable > 0 || summary.writeFailures.length > 0;

  console.log();
  console.log(line(W));
  console.log(chalk.bold(hasErrors ? 'DONE WITH ERRORS' : 'DONE'));
  console.log(`  Sections:          ${summary.sections}`);
  console.log(`  PDFs written:      ${summary.written}`);
  console.log(`  Pages:             ${summary.pages}`);
  if (summary.empty > 0) {
    console.log(chalk.yellow(`  Empty sections:    ${summary.empty}`));
  }
  if (summary.unreadable > 0) {
    console.log(chalk.yellow(`  Unreadable images: ${summary.unreadable}`));
  }
  if (summary.writeFailures.length > 0) {
    console.log(chalk.red(`  Write failures:    ${summary.writeFailures.length}`));
    for (const f of summary.writeFailures) {
      console.log(chalk.red(`    • part ${f.sequenceNumber}: ${f.error}`));
    }
  }
  console.log(`  Output:            ${chalk.cyan(outputDir)}`);
  console.log(line(W));
}

export function printRotationSummary(summary: RotationSummary): void {
  const W = 50;

  console.log();
  console.log(line(W));
  console.log(chalk.bold(summary.errors > 0 ? 'COMPLETE WITH ERRORS' : 'COMPLETE'));
  console.log(`  Rotated:           ${summary.rotated}`);
  console.log(`  Copied unchanged:  ${summary.copied}`);
  console.log(`  Skipped:           ${summary.skipped}`);
  console.log(`  Discarded:         ${summary.discarded}`);
  const errors = `  Errors:            ${summary.errors}`;
  console.log(summary.errors > 0 ? chalk.red(errors) : errors);
  console.log(`  Output:            ${chalk.cyan(summary.outputDir)}`);
  console.log(line(W));
}
