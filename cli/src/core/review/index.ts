export { emptyReview, isRotationAngle, normalizeReview, rotationFor } from './normalize.js';
export { loadReview } from './load.js';
export { ROTATION_ANGLES } from './types.js';
export type {
  LoadReviewOptions,
  NormalizeOptions,
  ReviewArtifact,
  ReviewFormat,
  RotationAngle,
} from './types.js';
