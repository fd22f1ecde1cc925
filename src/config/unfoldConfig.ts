/**
 * Centralized run configuration for the unfolding pipeline.
 * All lengths are millimetres; the search timeout is in seconds.
 */

import { ConfigError } from '../engine/errors';

export type UnfoldMode = 'bfs' | 'hamiltonian';

export interface UnfoldConfig {
  mode: UnfoldMode;
  tapeWidth: number;

  // ===== Hamiltonian search =====
  beamWidth: number;
  searchTimeout: number;
  allowFallback: boolean;

  // ===== Layout =====
  shrink: number;
  duplicates: number;
  gap: number;
  margin: number;
  /** Hard sheet limits; unset means unbounded */
  maxSheetWidth?: number;
  maxSheetHeight?: number;
}

export const DEFAULT_UNFOLD_CONFIG: Omit<UnfoldConfig, 'tapeWidth'> = {
  mode: 'bfs',
  beamWidth: 24,
  searchTimeout: 2.0,
  allowFallback: true,
  shrink: 0,
  duplicates: 1,
  gap: 2,
  margin: 1,
};

// =============================================================================
// Validation
// =============================================================================

const KNOWN_KEYS = new Set([
  'mode', 'tapeWidth', 'beamWidth', 'searchTimeout', 'allowFallback',
  'shrink', 'duplicates', 'gap', 'margin', 'maxSheetWidth', 'maxSheetHeight',
]);

function assertNumber(value: unknown, field: string): asserts value is number {
  if (typeof value !== 'number' || !isFinite(value)) {
    throw new ConfigError(`${field} must be a finite number, got ${typeof value}`, { field, value });
  }
}

function assertPositiveNumber(value: unknown, field: string): asserts value is number {
  assertNumber(value, field);
  if (value <= 0) {
    throw new ConfigError(`${field} must be positive, got ${value}`, { field, value });
  }
}

function assertNonNegativeNumber(value: unknown, field: string): asserts value is number {
  assertNumber(value, field);
  if (value < 0) {
    throw new ConfigError(`${field} must be zero or more, got ${value}`, { field, value });
  }
}

function assertInteger(value: unknown, field: string, min: number): asserts value is number {
  assertNumber(value, field);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${field} must be an integer ≥ ${min}, got ${value}`, { field, value });
  }
}

/**
 * Merge a partial configuration over the defaults and validate it.
 *
 * @throws ConfigError on unknown keys, wrong types or out-of-range values
 */
export function validateConfig(raw: unknown): UnfoldConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError('Configuration must be an object');
  }

  const obj: Record<string, unknown> = { ...raw };

  for (const key of Object.keys(obj)) {
    if (!KNOWN_KEYS.has(key)) {
      throw new ConfigError(`Unknown configuration field: "${key}"`, { field: key });
    }
  }

  const merged: Record<string, unknown> = { ...DEFAULT_UNFOLD_CONFIG };
  for (const [key, value] of Object.entries(obj)) {
    if (value !== undefined) merged[key] = value;
  }

  const { mode, tapeWidth, beamWidth, searchTimeout, allowFallback, shrink, duplicates, gap, margin } = merged;

  if (mode !== 'bfs' && mode !== 'hamiltonian') {
    throw new ConfigError(`mode must be "bfs" or "hamiltonian", got "${String(mode)}"`, { field: 'mode', value: mode });
  }
  if (tapeWidth === undefined) {
    throw new ConfigError('tapeWidth is required', { field: 'tapeWidth' });
  }
  assertPositiveNumber(tapeWidth, 'tapeWidth');
  assertInteger(beamWidth, 'beamWidth', 1);
  assertNonNegativeNumber(searchTimeout, 'searchTimeout');
  if (typeof allowFallback !== 'boolean') {
    throw new ConfigError(`allowFallback must be a boolean, got ${typeof allowFallback}`, { field: 'allowFallback' });
  }
  assertNonNegativeNumber(shrink, 'shrink');
  assertInteger(duplicates, 'duplicates', 1);
  assertNonNegativeNumber(gap, 'gap');
  assertNonNegativeNumber(margin, 'margin');

  const config: UnfoldConfig = {
    mode,
    tapeWidth,
    beamWidth,
    searchTimeout,
    allowFallback,
    shrink,
    duplicates,
    gap,
    margin,
  };

  if (merged.maxSheetWidth !== undefined) {
    assertPositiveNumber(merged.maxSheetWidth, 'maxSheetWidth');
    config.maxSheetWidth = merged.maxSheetWidth;
  }
  if (merged.maxSheetHeight !== undefined) {
    assertPositiveNumber(merged.maxSheetHeight, 'maxSheetHeight');
    config.maxSheetHeight = merged.maxSheetHeight;
  }

  return config;
}
