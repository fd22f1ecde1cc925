/**
 * The unfold command, with its file and console access passed in so tests
 * can drive it without touching either.
 */

import { parseArgs, USAGE } from './parseArgs';
import { createEngine } from '../engine';
import type { MeshFace } from '../engine/types';
import type { MeshLoadOptions } from '../mesh/stlLoader';
import { generateLayoutSVG } from '../utils/svgExport';
import { setDebugSink, setDebugTags } from '../utils/debug';

export interface CliIO {
  /** Standard output */
  log: (line: string) => void;
  /** Standard error: debug lines, warnings and failures */
  error: (line: string) => void;
  readMesh: (path: string, options: MeshLoadOptions) => MeshFace[];
  writeFile: (path: string, contents: string) => void;
}

/**
 * Run the command and return its exit code.
 */
export function runUnfold(argv: string[], io: CliIO): number {
  try {
    const parsed = parseArgs(argv);
    if (parsed.help) {
      io.log(USAGE);
      return 0;
    }

    const { input, out, unit, foldLines, debugTags, config } = parsed.options;
    if (debugTags.length > 0) {
      setDebugTags(debugTags);
      setDebugSink((line) => io.error(line));
    }

    const faces = io.readMesh(input, { unit });
    const run = createEngine(config).run(faces);

    if (run.fallback) {
      io.error(`Hamiltonian search failed (${run.fallback.reason}); used ${run.strips.length} BFS strip(s)`);
    }

    io.writeFile(out, generateLayoutSVG(run.layout, { foldLines }));
    io.log(`OK; wrote SVG to: ${out}`);
    return 0;
  } catch (e) {
    io.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
    return 1;
  } finally {
    setDebugSink(null);
  }
}
