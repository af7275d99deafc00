/**
 * sharp-backed image codec.
 *
 * Only the first frame is decoded (multi-frame MPO/PNG sources yield one page),
 * alpha is flattened onto white and the result converted to sRGB before
 * re-encoding.
 */

import sharp from 'sharp';
import { extname } from 'node:path';
import { toClockwiseDegrees } from '../corrections/index.js';
import type { RotationAngle } from '../review/index.js';
import type { ImageCodec, RenderedPage } from './types.js';

const WHITE = '#ffffff';

function open(path: string, rotation: RotationAngle): sharp.Sharp {
  const img = sharp(path, { pages: 1 });
  const degrees = toClockwiseDegrees(rotation);
  return degrees === 0 ? img : img.rotate(degrees);
}

async function renderPage(path: string, rotation: RotationAngle, quality: number): Promise<RenderedPage> {
  const { data, info } = await open(path, rotation)
    .flatten({ background: WHITE })
    .toColourspace('srgb')
    .jpeg({ quality })
    .toBuffer({ resolveWithObject: true });

  return { jpeg: data, width: info.width, height: info.height };
}

async function encodeRotated(path: string, rotation: RotationAngle, quality: number): Promise<Uint8Array> {
  const img = open(path, rotation);
  const ext = extname(path).toLowerCase();
  return ext === '.png'
    ? img.png().toBuffer()
    : img.jpeg({ quality }).toBuffer();
}

export const sharpCodec: ImageCodec = { renderPage, encodeRotated };
