/**
 * Rotation direction contract with the review tool.
 *
 * Review angles are counter-clockwise:
 *   90  → quarter turn counter-clockwise
 *   180 → half turn
 *   270 → quarter turn clockwise
 *   any other value → no rotation
 *
 * Image codecs (sharp) rotate clockwise, so every angle is converted with
 * `toClockwiseDegrees` before it reaches the codec.
 */

import { isRotationAngle } from '../review/index.js';
import type { RotationAngle } from '../review/index.js';

export type ClockwiseDegrees = 0 | 90 | 180 | 270;

const CLOCKWISE: Record<RotationAngle, ClockwiseDegrees> = {
  0: 0,
  90: 270,
  180: 180,
  270: 90,
};

/** Clockwise turn equivalent to a review angle. Unknown values map to 0. */
export function toClockwiseDegrees(angle: unknown): ClockwiseDegrees {
  return isRotationAngle(angle) ? CLOCKWISE[angle] : 0;
}

/** Coerce any value to a review angle, unknown values becoming 0. */
export function asRotationAngle(angle: unknown): RotationAngle {
  return isRotationAngle(angle) ? angle : 0;
}

/**
 * Counter-clockwise angle equivalent to applying each angle in turn.
 * Unknown values contribute nothing.
 */
export function composeRotations(angles: readonly unknown[]): RotationAngle {
  const total = angles.reduce<number>((sum, a) => sum + asRotationAngle(a), 0);
  return asRotationAngle(total % 360);
}
