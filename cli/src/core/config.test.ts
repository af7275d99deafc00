import { describe, expect, it } from 'vitest';
import { DEFAULTS, resolveBindConfig, resolvePlanConfig, resolveRotateConfig } from './config.js';
import { InputValidationError } from './errors.js';

describe('resolveRotateConfig', () => {
  it('fills defaults around the required output', () => {
    expect(resolveRotateConfig({ output: 'out' })).toEqual({
      correctionsPath: 'rotation_corrections.json',
      inputDir: '.',
      outputDir: 'out',
      copyUnchanged: false,
      quality: 85,
      strictAngles: false,
    });
  });

  it('requires an output directory', () => {
    expect(() => resolveRotateConfig({})).toThrow('--output is required');
  });

  it('reads flags and numeric strings', () => {
    const config = resolveRotateConfig({ output: 'out', copyUnchanged: true, quality: '70', strictAngles: true });
    expect(config).toMatchObject({ copyUnchanged: true, quality: 70, strictAngles: true });
  });

  it.each([0, 101, 2.5, 'high'])('rejects quality %j', (quality) => {
    expect(() => resolveRotateConfig({ output: 'out', quality })).toThrow(InputValidationError);
  });
});

describe('resolvePlanConfig', () => {
  it('converts the MB bound to bytes', () => {
    const config = resolvePlanConfig({ maxSize: 150 });
    expect(config).toEqual({
      reviewPath: DEFAULTS.reviewFile,
      inputDir: 'final_preprocessed',
      outputDir: 'pdfs',
      prefix: 'scan_archive',
      maxSizeMb: 150,
      maxBytes: 150 * 1024 * 1024,
      sizeRatio: 0.85,
      strictAngles: false,
    });
  });

  it('validates the size ratio', () => {
    expect(resolvePlanConfig({ sizeRatio: '0.5' }).sizeRatio).toBe(0.5);
    expect(() => resolvePlanConfig({ sizeRatio: 0 })).toThrow('--size-ratio must be greater than 0 and at most 1 (got 0)');
    expect(() => resolvePlanConfig({ sizeRatio: 1.5 })).toThrow(InputValidationError);
  });

  it('rejects non-string paths', () => {
    expect(() => resolvePlanConfig({ input: 42 })).toThrow('--input must be a string (got number)');
  });
});

describe('resolveBindConfig', () => {
  it('adds quality and the overwrite flag', () => {
    const config = resolveBindConfig({ prefix: 'box', quality: 60, yes: true });
    expect(config).toMatchObject({ prefix: 'box', quality: 60, assumeYes: true, maxSizeMb: 200 });
  });
});
