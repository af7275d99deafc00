#!/usr/bin/env node
/**
 * scanbook — post-process reviewed document scans.
 *
 *   scanbook rotate   write rotated copies of individual images
 *   scanbook plan     show the PDF section split without writing anything
 *   scanbook bind     write size-bounded PDFs, one per section
 */

import { Command } from 'commander';
import { registerBindCommands } from './commands/bind.js';
import { registerRotateCommand } from './commands/rotate.js';

const program = new Command();

program
  .name('scanbook')
  .description('Apply manual review corrections to scanned page images and bind them into PDFs')
  .version('0.1.0');

registerRotateCommand(program);
registerBindCommands(program);

await program.parseAsync(process.argv);
