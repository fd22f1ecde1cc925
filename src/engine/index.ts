/**
 * Engine Module - Public API
 *
 * Mesh faces in, packed strip layout out:
 * - AdjacencyGraph derives faces and hinges
 * - Planners group faces into tape-width strips
 * - LayoutPacker places strips on the sheet
 */

// Main entry point
export { Engine, createEngine } from './Engine';
export type { EngineHooks, UnfoldRun } from './Engine';

// Stages
export { AdjacencyGraph, vertexKey, WELD_PRECISION } from './AdjacencyGraph';
export {
  computeUnfoldTransform,
  unfoldFace,
  seedPlacement,
  applyTransform,
  IDENTITY_TRANSFORM,
  MIN_HINGE_LENGTH,
} from './unfoldTransform';
export { planBfsStrips, assertFacesFitTape } from './planners/BFSStripPlanner';
export type { BfsPlannerOptions } from './planners/BFSStripPlanner';
export {
  findHamiltonianRibbon,
  defaultRanking,
  DEFAULT_BEAM_WIDTH,
  DEFAULT_TIMEOUT_SECONDS,
} from './planners/HamiltonianRibbonPlanner';
export type {
  HamiltonianPlannerOptions,
  RankingPolicy,
  RankedStateInfo,
  RibbonSearchResult,
  RibbonSearchStats,
} from './planners/HamiltonianRibbonPlanner';
export { packLayout, layoutPolygons } from './LayoutPacker';
export type { LayoutOptions } from './LayoutPacker';

// Validators
export {
  OverlapChecker,
  checkOverlap,
  formatOverlapCheckResult,
  penetrationDepth,
  OVERLAP_TOLERANCE,
} from './validators/OverlapChecker';
export type { OverlapCheckResult, OverlapQueryResult, OverlapValidationError } from './validators/OverlapChecker';

// Errors
export {
  UnfoldError,
  MalformedMeshError,
  DegenerateEdgeError,
  TapeWidthError,
  HamiltonianSearchFailure,
  LayoutOverflowError,
  ConfigError,
} from './errors';
export type { UnfoldStage, HamiltonianFailureReason } from './errors';

// Types
export type * from './types';
