export {
  DEFAULT_SIZE_RATIO,
  estimateBytes,
  megabytesToBytes,
  splitBySize,
  splitManual,
  splitSections,
} from './split.js';
export type { Section, SplitMode, SplitOptions, SplitResult } from './types.js';
