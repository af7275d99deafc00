import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PDFDocument } from 'pdf-lib';
import sharp from 'sharp';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { CorrectedEntry } from '../corrections/index.js';
import type { ImageUnreadableError } from '../errors.js';
import type { Section } from '../paginate/index.js';
import type { RotationAngle } from '../review/index.js';
import { planArchiveJobs } from './jobs.js';
import type { ImageCodec } from './types.js';
import { writeArchive, writeArchives } from './writer.js';

async function jpegFile(path: string, width: number, height: number): Promise<void> {
  await sharp({ create: { width, height, channels: 3, background: { r: 90, g: 90, b: 90 } } })
    .jpeg()
    .toFile(path);
}

function entryFor(dir: string, filename: string, rotation: RotationAngle = 0): CorrectedEntry {
  return { record: { filename, path: join(dir, filename), sizeBytes: 1 }, rotation };
}

function sectionOf(entries: CorrectedEntry[], index = 0): Section {
  return { index, entries, estimatedBytes: 0 };
}

async function pageSizes(path: string): Promise<Array<[number, number]>> {
  const pdf = await PDFDocument.load(readFileSync(path), { updateMetadata: false });
  return pdf.getPages().map((p) => {
    const { width, height } = p.getSize();
    return [width, height];
  });
}

describe('writeArchive', () => {
  let dir: string;

  beforeEach(async () => {
    dir = mkdtempSync(join(tmpdir(), 'scanbook-writer-'));
    await jpegFile(join(dir, 'a.jpg'), 40, 20);
    await jpegFile(join(dir, 'b.jpg'), 30, 10);
    writeFileSync(join(dir, 'corrupt.jpg'), 'not an image');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes one page per image in section order, rotated', async () => {
    const out = join(dir, 'out', 'box_part1.pdf');
    const result = await writeArchive(
      sectionOf([entryFor(dir, 'a.jpg', 90), entryFor(dir, 'b.jpg')]),
      out,
    );

    expect(result).toMatchObject({ outputPath: out, sequenceNumber: 1, pageCount: 2, written: true, failures: [] });
    expect(result.bytesWritten).toBe(readFileSync(out).length);
    expect(await pageSizes(out)).toEqual([[20, 40], [30, 10]]);
  });

  it('sets the document title from the output filename', async () => {
    const out = join(dir, 'box_part3.pdf');
    await writeArchive(sectionOf([entryFor(dir, 'b.jpg')]), out, { sequenceNumber: 3 });

    const pdf = await PDFDocument.load(readFileSync(out), { updateMetadata: false });
    expect(pdf.getTitle()).toBe('box_part3');
    expect(pdf.getProducer()).toBe('scanbook');
  });

  it('skips an unreadable image with a warning and keeps the rest', async () => {
    const warnings: ImageUnreadableError[] = [];
    const out = join(dir, 'box_part1.pdf');
    const result = await writeArchive(
      sectionOf([entryFor(dir, 'a.jpg'), entryFor(dir, 'corrupt.jpg'), entryFor(dir, 'b.jpg')]),
      out,
      { onWarning: (w) => warnings.push(w) },
    );

    expect(result.pageCount).toBe(2);
    expect(result.failures.map((f) => f.filename)).toEqual(['corrupt.jpg']);
    expect(warnings.map((w) => [w.kind, w.filename])).toEqual([['ImageUnreadable', 'corrupt.jpg']]);
    expect(await pageSizes(out)).toEqual([[40, 20], [30, 10]]);
  });

  it('writes no file when no image can be decoded', async () => {
    const out = join(dir, 'box_part1.pdf');
    const result = await writeArchive(sectionOf([entryFor(dir, 'corrupt.jpg')]), out);

    expect(result).toMatchObject({ pageCount: 0, written: false, bytesWritten: 0 });
    expect(existsSync(out)).toBe(false);
  });

  it('hands rotation and quality to the codec, one entry at a time', async () => {
    const jpeg = await sharp({ create: { width: 2, height: 2, channels: 3, background: '#808080' } }).jpeg().toBuffer();
    const calls: string[] = [];
    const codec: ImageCodec = {
      renderPage: async (path, rotation, quality) => {
        calls.push(`${path.slice(dir.length + 1)}:${rotation}:${quality}`);
        return { jpeg, width: 10 * calls.length, height: 5 };
      },
      encodeRotated: async () => {
        throw new Error('not used');
      },
    };

    const out = join(dir, 'fake.pdf');
    await writeArchive(
      sectionOf([entryFor(dir, 'x.jpg', 270), entryFor(dir, 'y.jpg'), entryFor(dir, 'z.jpg', 180)]),
      out,
      { codec, quality: 60 },
    );

    expect(calls).toEqual(['x.jpg:270:60', 'y.jpg:0:60', 'z.jpg:180:60']);
    expect(await pageSizes(out)).toEqual([[10, 5], [20, 5], [30, 5]]);
  });
});

describe('writeArchives', () => {
  let dir: string;

  beforeEach(async () => {
    dir = mkdtempSync(join(tmpdir(), 'scanbook-archives-'));
    await jpegFile(join(dir, 'a.jpg'), 12, 8);
    await jpegFile(join(dir, 'b.jpg'), 12, 8);
    await jpegFile(join(dir, 'c.jpg'), 12, 8);
    writeFileSync(join(dir, 'corrupt.jpg'), 'not an image');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes every section and totals the results', async () => {
    const sections = [
      sectionOf([entryFor(dir, 'a.jpg'), entryFor(dir, 'corrupt.jpg')], 0),
      sectionOf([entryFor(dir, 'b.jpg'), entryFor(dir, 'c.jpg')], 1),
    ];
    const jobs = planArchiveJobs(sections, join(dir, 'pdfs'), 'box');

    const summary = await writeArchives(jobs);

    expect(summary).toMatchObject({ sections: 2, written: 2, empty: 0, pages: 3, unreadable: 1, writeFailures: [] });
    expect(existsSync(join(dir, 'pdfs', 'box_part1.pdf'))).toBe(true);
    expect(await pageSizes(join(dir, 'pdfs', 'box_part2.pdf'))).toHaveLength(2);
  });

  it('counts a section with no readable image as empty', async () => {
    const jobs = planArchiveJobs([sectionOf([entryFor(dir, 'corrupt.jpg')])], join(dir, 'pdfs'), 'box');
    const summary = await writeArchives(jobs);

    expect(summary).toMatchObject({ sections: 1, written: 0, empty: 1, pages: 0, unreadable: 1 });
  });

  it('records a write failure and continues with the next section', async () => {
    // A regular file where the output directory should be
    const blocker = join(dir, 'blocked');
    writeFileSync(blocker, '');

    const jobs = [
      { section: sectionOf([entryFor(dir, 'a.jpg')], 0), outputPath: join(blocker, 'box_part1.pdf'), sequenceNumber: 1 },
      { section: sectionOf([entryFor(dir, 'b.jpg')], 1), outputPath: join(dir, 'pdfs', 'box_part2.pdf'), sequenceNumber: 2 },
    ];
    const failed: number[] = [];

    const summary = await writeArchives(jobs, { onWriteFailure: (_err, job) => failed.push(job.sequenceNumber) });

    expect(failed).toEqual([1]);
    expect(summary.writeFailures.map((f) => f.sequenceNumber)).toEqual([1]);
    expect(summary.written).toBe(1);
    expect(summary.archives.map((a) => a.sequenceNumber)).toEqual([2]);
    expect(existsSync(join(dir, 'pdfs', 'box_part2.pdf'))).toBe(true);
  });

  it('does nothing for no jobs', async () => {
    const summary = await writeArchives([]);
    expect(summary).toEqual({ sections: 0, written: 0, empty: 0, pages: 0, unreadable: 0, writeFailures: [], archives: [] });
  });
});
