import { describe, expect, it } from 'vitest';
import { normalizeReview } from '../review/index.js';
import type { ImageRecord } from '../sequence/index.js';
import { applyCorrections, countDiscarded } from './pipeline.js';

const record = (filename: string, sizeBytes = 100): ImageRecord => ({ filename, path: `/scans/${filename}`, sizeBytes });

describe('applyCorrections', () => {
  const sequence = ['a.jpg', 'b.jpg', 'c.jpg', 'd.jpg'].map((f) => record(f));

  it('drops discards and attaches rotations in sequence order', () => {
    const review = normalizeReview({
      corrections: { 'a.jpg': 90 },
      sectionBreaks: ['c.jpg'],
      discards: ['b.jpg'],
    });

    const entries = applyCorrections(sequence, review);
    expect(entries.map((e) => [e.record.filename, e.rotation])).toEqual([
      ['a.jpg', 90],
      ['c.jpg', 0],
      ['d.jpg', 0],
    ]);
    expect(entries[0].record).toBe(sequence[0]);
  });

  it('emits every record unchanged when the review is empty', () => {
    const entries = applyCorrections(sequence, normalizeReview({}));
    expect(entries.map((e) => e.record)).toEqual(sequence);
    expect(entries.every((e) => e.rotation === 0)).toBe(true);
  });

  it('ignores discards and rotations for files not in the sequence', () => {
    const review = normalizeReview({ corrections: { 'x.jpg': 180 }, discards: ['y.jpg', 'd.jpg'] });
    const entries = applyCorrections(sequence, review);

    expect(entries).toHaveLength(sequence.length - countDiscarded(sequence, review));
    expect(entries.map((e) => e.record.filename)).toEqual(['a.jpg', 'b.jpg', 'c.jpg']);
  });

  it('discard wins over a rotation for the same file', () => {
    const review = normalizeReview({ corrections: { 'a.jpg': 270 }, discards: ['a.jpg'] });
    expect(applyCorrections(sequence, review).map((e) => e.record.filename)).toEqual(['b.jpg', 'c.jpg', 'd.jpg']);
  });

  it('returns nothing for an empty sequence', () => {
    expect(applyCorrections([], normalizeReview({ 'a.jpg': 90 }))).toEqual([]);
  });
});

describe('countDiscarded', () => {
  it('counts only discards present in the sequence', () => {
    const sequence = [record('a.jpg'), record('b.jpg')];
    expect(countDiscarded(sequence, normalizeReview({ corrections: {}, discards: ['b.jpg', 'q.jpg'] }))).toBe(1);
  });
});
