/**
 * Engine - Main entry point for unfolding a die blank
 *
 * The Engine:
 * - Builds the adjacency graph from the mesh faces
 * - Runs the configured planner (Hamiltonian with optional BFS fallback, or BFS)
 * - Packs the resulting strips onto the sheet
 * - Reports which planner produced the strips and why a fallback happened
 */

import type { Layout, MeshFace, Strip } from './types';
import { AdjacencyGraph } from './AdjacencyGraph';
import { HamiltonianSearchFailure } from './errors';
import type { HamiltonianFailureReason } from './errors';
import { planBfsStrips } from './planners/BFSStripPlanner';
import { findHamiltonianRibbon } from './planners/HamiltonianRibbonPlanner';
import type { RankingPolicy, RibbonSearchStats } from './planners/HamiltonianRibbonPlanner';
import { OverlapChecker } from './validators/OverlapChecker';
import { packLayout } from './LayoutPacker';
import { validateConfig } from '../config/unfoldConfig';
import type { UnfoldConfig, UnfoldMode } from '../config/unfoldConfig';
import { debug } from '../utils/debug';

/**
 * Injection points for tests and tooling. Production runs leave these unset.
 */
export interface EngineHooks {
  /** Millisecond clock for the search deadline */
  clock?: () => number;
  rank?: RankingPolicy;
}

export interface UnfoldRun {
  graph: AdjacencyGraph;
  strips: Strip[];
  layout: Layout;
  /** Planner whose strips were laid out */
  planner: UnfoldMode;
  /** Set when the Hamiltonian search failed and BFS took over */
  fallback: { reason: HamiltonianFailureReason } | null;
  /** Search statistics; null when no Hamiltonian search ran */
  search: RibbonSearchStats | null;
}

export class Engine {
  readonly config: UnfoldConfig;
  private readonly hooks: EngineHooks;
  private readonly checker = new OverlapChecker();

  constructor(config: UnfoldConfig, hooks: EngineHooks = {}) {
    this.config = config;
    this.hooks = hooks;
  }

  /**
   * Unfold a validated face list into a packed layout.
   *
   * @throws MalformedMeshError, TapeWidthError, LayoutOverflowError
   * @throws HamiltonianSearchFailure when the search fails and fallback is off
   */
  run(faces: MeshFace[]): UnfoldRun {
    const graph = AdjacencyGraph.fromFaces(faces);
    const { strips, planner, fallback, search } = this.plan(graph);

    const layout = packLayout(strips, {
      tapeWidth: this.config.tapeWidth,
      shrink: this.config.shrink,
      gap: this.config.gap,
      margin: this.config.margin,
      duplicates: this.config.duplicates,
      maxSheetWidth: this.config.maxSheetWidth,
      maxSheetHeight: this.config.maxSheetHeight,
    });

    debug('engine', `Run complete: planner ${planner}, ${strips.length} strip(s), ${graph.faceCount} faces`);
    return { graph, strips, layout, planner, fallback, search };
  }

  private plan(graph: AdjacencyGraph): Omit<UnfoldRun, 'graph' | 'layout'> {
    const { mode, tapeWidth } = this.config;

    if (mode === 'bfs') {
      return { strips: this.planBfs(graph), planner: 'bfs', fallback: null, search: null };
    }

    const result = findHamiltonianRibbon(graph, {
      tapeWidth,
      beamWidth: this.config.beamWidth,
      timeoutSeconds: this.config.searchTimeout,
      clock: this.hooks.clock,
      rank: this.hooks.rank,
      overlapChecker: this.checker,
    });

    if (result.ok) {
      return { strips: [result.strip], planner: 'hamiltonian', fallback: null, search: result.stats };
    }

    if (!this.config.allowFallback) {
      throw new HamiltonianSearchFailure(result.reason, { ...result.details, stats: result.stats });
    }

    debug('engine', `Hamiltonian search failed (${result.reason}); falling back to BFS strips`);
    return {
      strips: this.planBfs(graph),
      planner: 'bfs',
      fallback: { reason: result.reason },
      search: result.stats,
    };
  }

  private planBfs(graph: AdjacencyGraph): Strip[] {
    return planBfsStrips(graph, { tapeWidth: this.config.tapeWidth, overlapChecker: this.checker });
  }
}

/**
 * Create an engine from a partial configuration merged over the defaults.
 *
 * @throws ConfigError if the configuration is invalid
 */
export function createEngine(config: unknown, hooks: EngineHooks = {}): Engine {
  return new Engine(validateConfig(config), hooks);
}
