import { join } from 'node:path';
import type { Section } from '../paginate/index.js';
import type { ArchiveJob } from './types.js';

/** `<prefix>_part<N>.<ext>` */
export function archiveFileName(prefix: string, sequenceNumber: number, ext = 'pdf'): string {
  return `${prefix}_part${sequenceNumber}.${ext}`;
}

/** One job per section, numbered from 1 in section order. */
export function planArchiveJobs(sections: readonly Section[], outputDir: string, prefix: string): ArchiveJob[] {
  return sections.map((section, i) => ({
    section,
    outputPath: join(outputDir, archiveFileName(prefix, i + 1)),
    sequenceNumber: i + 1,
  }));
}
