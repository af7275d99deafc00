/**
 * scanbook rotate — apply review rotations to individual image files.
 *
 * Usage:
 *   scanbook rotate -o corrected                      # rotation_corrections.json in cwd
 *   scanbook rotate -c review.json -i scans -o out --copy-unchanged
 *   scanbook rotate -o out --json                     # summary as JSON
 */

import chalk from 'chalk';
import { Command, Option } from 'commander';
import { applyRotations } from '../core/archive/index.js';
import { DEFAULTS, ENV_VARS, resolveRotateConfig } from '../core/config.js';
import { printReviewLoaded, printRotationSummary } from '../core/format.js';
import { loadReview } from '../core/review/index.js';
import { scanImageDirectory } from '../core/sequence/index.js';
import { cliAction } from './action.js';
import { parseQuality } from './parsers.js';

export function registerRotateCommand(program: Command): void {
  program
    .command('rotate')
    .description('Write rotated copies of scanned images using the review corrections')
    .option('-c, --corrections <path>', 'Review JSON with rotations (legacy or current format)', DEFAULTS.correctionsFile)
    .addOption(new Option('-i, --input <dir>', 'Input directory with images').env(ENV_VARS.input).default(DEFAULTS.rotateInput))
    .addOption(new Option('-o, --output <dir>', 'Output directory').env(ENV_VARS.output).makeOptionMandatory())
    .option('--copy-unchanged', 'Also copy images that need no rotation')
    .addOption(
      new Option('-q, --quality <n>', 'JPEG quality for rotated JPEGs (1-100)')
        .env(ENV_VARS.quality)
        .argParser(parseQuality)
        .default(DEFAULTS.quality),
    )
    .option('--strict-angles', 'Reject rotation values other than 0, 90, 180, 270')
    .option('--json', 'Output as JSON')
    .action(cliAction(async (opts: Record<string, unknown>) => {
      const config = resolveRotateConfig(opts);
      const json = opts.json === true;

      const artifact = loadReview(config.correctionsPath, {
        required: true,
        strictAngles: config.strictAngles,
      });
      if (!json) printReviewLoaded(artifact, config.correctionsPath);

      const sequence = scanImageDirectory(config.inputDir);
      if (!json) console.log(`Found ${sequence.length} images in ${config.inputDir}`);

      const summary = await applyRotations(sequence, artifact, {
        outputDir: config.outputDir,
        copyUnchanged: config.copyUnchanged,
        quality: config.quality,
        onProgress: json
          ? undefined
          : (index, total, entry, outcome) => {
              const prefix = chalk.dim(`[${index + 1}/${total}]`);
              if (outcome === 'rotated') {
                process.stderr.write(`${prefix} ${entry.record.filename}: rotated ${entry.rotation}°\n`);
              } else if (outcome === 'copied') {
                process.stderr.write(`${prefix} ${entry.record.filename}: ${chalk.dim('copied')}\n`);
              }
            },
        onWarning: json
          ? undefined
          : (warning) => {
              process.stderr.write(chalk.red(`  ERROR: ${warning.message}\n`));
            },
      });

      if (json) {
        console.log(JSON.stringify({
          corrections: config.correctionsPath,
          format: artifact.format,
          warnings: artifact.warnings,
          ...summary,
        }, null, 2));
      } else {
        printRotationSummary(summary);
      }

      if (summary.errors > 0) process.exitCode = 1;
    }));
}
