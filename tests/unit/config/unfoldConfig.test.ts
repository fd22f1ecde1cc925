import { describe, it, expect } from 'vitest';
import { validateConfig, DEFAULT_UNFOLD_CONFIG } from '../../../src/config/unfoldConfig';
import { ConfigError } from '../../../src/engine/errors';

function configError(raw: unknown): ConfigError {
  try {
    validateConfig(raw);
  } catch (e) {
    if (e instanceof ConfigError) return e;
    throw e;
  }
  throw new Error('Expected ConfigError');
}

describe('validateConfig', () => {
  it('fills defaults around the tape width', () => {
    expect(validateConfig({ tapeWidth: 15 })).toEqual({ ...DEFAULT_UNFOLD_CONFIG, tapeWidth: 15 });
  });

  it('keeps explicit values and skips undefined ones', () => {
    const config = validateConfig({
      tapeWidth: 15,
      mode: 'hamiltonian',
      beamWidth: 8,
      searchTimeout: 0,
      allowFallback: false,
      gap: undefined,
      maxSheetWidth: 300,
    });
    expect(config.mode).toBe('hamiltonian');
    expect(config.beamWidth).toBe(8);
    expect(config.searchTimeout).toBe(0);
    expect(config.allowFallback).toBe(false);
    expect(config.gap).toBe(2);
    expect(config.maxSheetWidth).toBe(300);
    expect(config.maxSheetHeight).toBeUndefined();
  });

  it('requires the tape width', () => {
    expect(configError({}).details.field).toBe('tapeWidth');
  });

  it('rejects unknown fields', () => {
    const error = configError({ tapeWidth: 15, seed: 3 });
    expect(error.message).toBe('Unknown configuration field: "seed"');
    expect(error.stage).toBe('config');
  });

  it.each([
    ['tapeWidth', 0],
    ['tapeWidth', Number.NaN],
    ['beamWidth', 0],
    ['beamWidth', 2.5],
    ['searchTimeout', -1],
    ['shrink', -0.5],
    ['duplicates', 0],
    ['gap', '2'],
    ['margin', -1],
    ['maxSheetWidth', 0],
    ['maxSheetHeight', -10],
  ])('rejects %s = %s', (field, value) => {
    const error = configError({ tapeWidth: 15, [field]: value });
    expect(error.details.field).toBe(field);
  });

  it('rejects an unknown mode', () => {
    expect(configError({ tapeWidth: 15, mode: 'dfs' }).details.field).toBe('mode');
  });

  it('rejects a non-boolean fallback flag', () => {
    expect(configError({ tapeWidth: 15, allowFallback: 'no' }).details.field).toBe('allowFallback');
  });

  it('rejects non-objects', () => {
    expect(() => validateConfig(null)).toThrow(ConfigError);
    expect(() => validateConfig([15])).toThrow(ConfigError);
  });
});
