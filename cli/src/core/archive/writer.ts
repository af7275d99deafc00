/**
 * PDF archive writer.
 *
 * Builds one PDF per section with pdf-lib: each surviving image becomes one
 * page sized to its (rotated) pixel dimensions. Sections are processed
 * strictly one after another, pages in section order.
 *
 * Failure isolation:
 *   - an image that fails to decode is skipped with a warning
 *   - a section with no decodable image produces no file
 *   - a write failure is recorded and the remaining sections still run
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { basename, dirname, extname } from 'node:path';
import { PDFDocument } from 'pdf-lib';
import { ImageUnreadableError, WriteFailureError, errorMessage } from '../errors.js';
import type { Section } from '../paginate/index.js';
import { sharpCodec } from './codec.js';
import type {
  ArchiveJob,
  ArchiveResult,
  BindSummary,
  ImageCodec,
  ImageFailure,
} from './types.js';

export const DEFAULT_QUALITY = 85;

const PRODUCER = 'scanbook';

export interface WriteArchiveOptions {
  /** JPEG quality (1–100) for re-encoded pages. */
  quality?: number;
  codec?: ImageCodec;
  /** Called for every skipped image. */
  onWarning?: (warning: ImageUnreadableError) => void;
  /** Part number reported in the result. Defaults to `section.index + 1`. */
  sequenceNumber?: number;
}

/**
 * Write one section as a PDF.
 *
 * @throws WriteFailureError if the document could not be serialized or saved.
 */
export async function writeArchive(
  section: Section,
  outputPath: string,
  opts: WriteArchiveOptions = {},
): Promise<ArchiveResult> {
  const quality = opts.quality ?? DEFAULT_QUALITY;
  const codec = opts.codec ?? sharpCodec;
  const failures: ImageFailure[] = [];

  const doc = await PDFDocument.create();
  doc.setTitle(basename(outputPath, extname(outputPath)));
  doc.setProducer(PRODUCER);
  doc.setCreator(PRODUCER);

  let pageCount = 0;
  for (const entry of section.entries) {
    try {
      const rendered = await codec.renderPage(entry.record.path, entry.rotation, quality);
      const image = await doc.embedJpg(rendered.jpeg);
      const page = doc.addPage([rendered.width, rendered.height]);
      page.drawImage(image, { x: 0, y: 0, width: rendered.width, height: rendered.height });
      pageCount++;
    } catch (err) {
      const warning = new ImageUnreadableError(entry.record.filename, { cause: err });
      failures.push({ filename: entry.record.filename, error: errorMessage(err) });
      opts.onWarning?.(warning);
    }
  }

  const result: ArchiveResult = {
    outputPath,
    sequenceNumber: opts.sequenceNumber ?? section.index + 1,
    pageCount,
    written: false,
    bytesWritten: 0,
    failures,
  };
  if (pageCount === 0) return result;

  try {
    const bytes = await doc.save();
    mkdirSync(dirname(outputPath), { recursive: true });
    writeFileSync(outputPath, bytes);
    result.written = true;
    result.bytesWritten = bytes.length;
  } catch (err) {
    throw new WriteFailureError(outputPath, { cause: err });
  }

  return result;
}

export interface WriteArchivesOptions extends Omit<WriteArchiveOptions, 'sequenceNumber'> {
  onArchiveStart?: (job: ArchiveJob, total: number) => void;
  onArchiveDone?: (result: ArchiveResult, total: number) => void;
  onWriteFailure?: (error: WriteFailureError, job: ArchiveJob) => void;
}

/**
 * Write every job in order. Never aborts mid-batch: write failures are
 * collected in the summary.
 */
export async function writeArchives(
  jobs: readonly ArchiveJob[],
  opts: WriteArchivesOptions = {},
): Promise<BindSummary> {
  const summary: BindSummary = {
    sections: jobs.length,
    written: 0,
    empty: 0,
    pages: 0,
    unreadable: 0,
    writeFailures: [],
    archives: [],
  };

  for (const job of jobs) {
    opts.onArchiveStart?.(job, jobs.length);

    let result: ArchiveResult;
    try {
      result = await writeArchive(job.section, job.outputPath, {
        quality: opts.quality,
        codec: opts.codec,
        onWarning: (warning) => {
          summary.unreadable++;
          opts.onWarning?.(warning);
        },
        sequenceNumber: job.sequenceNumber,
      });
    } catch (err) {
      if (!(err instanceof WriteFailureError)) throw err;
      summary.writeFailures.push({
        outputPath: job.outputPath,
        sequenceNumber: job.sequenceNumber,
        error: errorMessage(err.cause),
      });
      opts.onWriteFailure?.(err, job);
      continue;
    }

    summary.archives.push(result);
    summary.pages += result.pageCount;
    if (result.written) summary.written++;
    else summary.empty++;

    opts.onArchiveDone?.(result, jobs.length);
  }

  return summary;
}
