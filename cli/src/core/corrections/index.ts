export { applyCorrections, countDiscarded } from './pipeline.js';
export { asRotationAngle, composeRotations, toClockwiseDegrees } from './rotation.js';
export type { CorrectedEntry } from './pipeline.js';
export type { ClockwiseDegrees } from './rotation.js';
