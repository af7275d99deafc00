export {
  IMAGE_EXTENSIONS,
  compareFilenames,
  isImageFile,
  scanImageDirectory,
  sortByFilename,
} from './scanner.js';
export type { ImageRecord } from './types.js';
