/**
 * scanbook bind / scanbook plan — paginate reviewed scans into PDFs.
 *
 * Sections come from the review's section breaks when it has any, otherwise
 * from a size bound (--max-size). `plan` prints the partition only; `bind`
 * writes `<prefix>_part<N>.pdf` per section.
 *
 * Usage:
 *   scanbook plan -r image_review.json -i scans
 *   scanbook bind -r image_review.json -i scans -o pdfs -p archive -m 150
 *   scanbook bind --json -y
 */

import chalk from 'chalk';
import { existsSync } from 'node:fs';
import { basename } from 'node:path';
import { Command, Option } from 'commander';
import prompts from 'prompts';
import { writeArchives } from '../core/archive/index.js';
import type { ArchiveJob } from '../core/archive/index.js';
import { DEFAULTS, ENV_VARS, resolveBindConfig, resolvePlanConfig } from '../core/config.js';
import type { BindConfig } from '../core/config.js';
import {
  bindResultJson,
  printArchiveResult,
  printBindSummary,
  printReviewLoaded,
  printSectionPlan,
  sectionPlanJson,
} from '../core/format.js';
import { prepareRun } from '../core/prepare.js';
import type { PreparedRun } from '../core/prepare.js';
import { cliAction } from './action.js';
import { parsePositiveNumber, parseQuality, parseRatio } from './parsers.js';

/** Options shared by `plan` and `bind`. */
function addPlanOptions(cmd: Command): Command {
  return cmd
    .option('-r, --review <path>', 'Review JSON with corrections/sections/discards', DEFAULTS.reviewFile)
    .addOption(new Option('-i, --input <dir>', 'Input directory with images').env(ENV_VARS.input).default(DEFAULTS.bindInput))
    .addOption(new Option('-o, --output <dir>', 'Output directory for PDFs').env(ENV_VARS.output).default(DEFAULTS.bindOutput))
    .addOption(new Option('-p, --prefix <name>', 'PDF filename prefix').env(ENV_VARS.prefix).default(DEFAULTS.prefix))
    .addOption(
      new Option('-m, --max-size <mb>', 'Max estimated PDF size in MB (used if no sections defined)')
        .env(ENV_VARS.maxSize)
        .argParser(parsePositiveNumber)
        .default(DEFAULTS.maxSizeMb),
    )
    .addOption(
      new Option('--size-ratio <ratio>', 'Estimated PDF bytes per source byte after re-encoding')
        .env(ENV_VARS.sizeRatio)
        .argParser(parseRatio)
        .default(DEFAULTS.sizeRatio),
    )
    .option('--strict-angles', 'Reject rotation values other than 0, 90, 180, 270')
    .option('--json', 'Output as JSON');
}

function printPrepared(run: PreparedRun, inputDir: string, maxSizeMb: number, reviewPath: string): void {
  printReviewLoaded(run.artifact, reviewPath);
  console.log(`Found ${run.sequence.length} images in ${inputDir}`);
  console.log(`After removing discards: ${run.entries.length} images`);
  if (run.jobs.length > 0) printSectionPlan(run.mode, run.jobs, maxSizeMb);
}

async function confirmOverwrite(jobs: readonly ArchiveJob[], config: BindConfig, json: boolean): Promise<boolean> {
  const existing = jobs.filter((j) => existsSync(j.outputPath));
  if (existing.length === 0 || config.assumeYes || json || !process.stdin.isTTY) return true;

  const response = await prompts({
    type: 'confirm',
    name: 'overwrite',
    message: `Overwrite ${existing.length} existing PDF(s) in ${config.outputDir}?`,
    initial: false,
  });
  return response.overwrite === true;
}

export function registerBindCommands(program: Command): void {
  // ── scanbook plan ─────────────────────────────────────────────
  addPlanOptions(
    program
      .command('plan')
      .description('Show how reviewed images would be split into PDFs (nothing is written)'),
  ).action(cliAction(async (opts: Record<string, unknown>) => {
    const config = resolvePlanConfig(opts);
    const run = prepareRun(config);

    if (opts.json === true) {
      console.log(JSON.stringify({
        review: config.reviewPath,
        format: run.artifact.format,
        warnings: run.artifact.warnings,
        images: run.sequence.length,
        discarded: run.discarded,
        ...sectionPlanJson(run.mode, run.jobs),
      }, null, 2));
      return;
    }

    printPrepared(run, config.inputDir, config.maxSizeMb, config.reviewPath);
    if (run.jobs.length === 0) console.log(chalk.yellow('No images to process!'));
  }));

  // ── scanbook bind ─────────────────────────────────────────────
  addPlanOptions(
    program
      .command('bind')
      .description('Create size-bounded PDFs from reviewed images (sections, discards, rotations)'),
  )
    .addOption(
      new Option('-q, --quality <n>', 'JPEG quality for PDF pages (1-100)')
        .env(ENV_VARS.quality)
        .argParser(parseQuality)
        .default(DEFAULTS.quality),
    )
    .option('-y, --yes', 'Overwrite existing PDFs without asking')
    .action(cliAction(async (opts: Record<string, unknown>) => {
      const config = resolveBindConfig(opts);
      const json = opts.json === true;
      const run = prepareRun(config);

      if (!json) printPrepared(run, config.inputDir, config.maxSizeMb, config.reviewPath);

      if (run.jobs.length === 0 && !json) {
        console.log(chalk.yellow('No images to process!'));
        return;
      }

      if (!(await confirmOverwrite(run.jobs, config, json))) {
        console.log(chalk.yellow('Aborted — no files written.'));
        return;
      }

      if (!json) console.error('\nCreating PDFs...');

      const summary = await writeArchives(run.jobs, {
        quality: config.quality,
        onArchiveStart: json
          ? undefined
          : (job, total) => {
              console.error(`\n[${job.sequenceNumber}/${total}] Creating ${basename(job.outputPath)} (${job.section.entries.length} images)...`);
            },
        onArchiveDone: json ? undefined : (result) => printArchiveResult(result),
        onWarning: json
          ? undefined
          : (warning) => {
              console.error(chalk.yellow(`  Warning: ${warning.message}`));
            },
        onWriteFailure: json
          ? undefined
          : (error) => {
              console.error(chalk.red(`  ${error.message}`));
            },
      });

      if (json) {
        console.log(JSON.stringify(bindResultJson(config.reviewPath, run, summary), null, 2));
      } else {
        printBindSummary(summary, config.outputDir);
      }

      if (summary.unreadable > 0 || summary.writeFailures.length > 0) process.exitCode = 1;
    }));
}
