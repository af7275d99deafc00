/** One source image. Identity is the filename; immutable once scanned. */
export interface ImageRecord {
  filename: string;
  /** Absolute path on disk. */
  path: string;
  sizeBytes: number;
}
