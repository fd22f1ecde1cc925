/**
 * Error taxonomy for the unfolding pipeline.
 *
 * Every error names the stage it came from and carries a details record
 * (face ids, edge keys, strip ids) so the top-level caller can report
 * exactly where a run stopped.
 */

export type UnfoldStage =
  | 'config'
  | 'mesh'
  | 'adjacency'
  | 'unfold'
  | 'bfs'
  | 'hamiltonian'
  | 'layout';

export type ErrorDetails = Record<string, unknown>;

export class UnfoldError extends Error {
  readonly stage: UnfoldStage;
  readonly details: ErrorDetails;

  constructor(message: string, stage: UnfoldStage, details: ErrorDetails = {}) {
    super(message);
    this.name = 'UnfoldError';
    this.stage = stage;
    this.details = details;
  }
}

/** Adjacency derivation found an edge with ≠ 2 faces, or a degenerate face */
export class MalformedMeshError extends UnfoldError {
  constructor(message: string, details: ErrorDetails = {}, stage: UnfoldStage = 'adjacency') {
    super(message, stage, details);
    this.name = 'MalformedMeshError';
  }
}

/** The hinge edge of an unfolding step has zero length */
export class DegenerateEdgeError extends UnfoldError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, 'unfold', details);
    this.name = 'DegenerateEdgeError';
  }
}

/** A single face is wider than the tape, so no valid strip can hold it */
export class TapeWidthError extends UnfoldError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, 'bfs', details);
    this.name = 'TapeWidthError';
  }
}

export type HamiltonianFailureReason =
  | 'deadline-exceeded'
  | 'beam-exhausted'
  | 'face-exceeds-width';

/** Surfaced only when fallback to strip planning is disabled */
export class HamiltonianSearchFailure extends UnfoldError {
  readonly reason: HamiltonianFailureReason;

  constructor(reason: HamiltonianFailureReason, details: ErrorDetails = {}) {
    super(`No Hamiltonian ribbon found (${reason})`, 'hamiltonian', { reason, ...details });
    this.name = 'HamiltonianSearchFailure';
    this.reason = reason;
  }
}

/** The packed sheet does not fit the configured limits */
export class LayoutOverflowError extends UnfoldError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, 'layout', details);
    this.name = 'LayoutOverflowError';
  }
}

export class ConfigError extends UnfoldError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, 'config', details);
    this.name = 'ConfigError';
  }
}
