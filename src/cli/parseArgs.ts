/**
 * Command-line parsing for scripts/unfold.ts
 *
 * Kept separate from the script so it can be tested without touching the
 * file system or the process.
 */

import { ConfigError } from '../engine/errors';
import { validateConfig } from '../config/unfoldConfig';
import type { UnfoldConfig } from '../config/unfoldConfig';
import type { MeshUnit } from '../mesh/stlLoader';
import { DEBUG_TAGS, isDebugTag } from '../utils/debug';
import type { DebugTag } from '../utils/debug';

export const DEFAULT_OUT_PATH = 'ribbon_wrap.svg';

export const USAGE = `Usage: npx tsx scripts/unfold.ts <mesh.stl|mesh.obj> --tape-width <mm> [options]

Options:
  --out <file>            Output SVG path (default: ${DEFAULT_OUT_PATH})
  --stl-unit <mm|inch>    Unit of the input mesh (default: mm)
  --shrink <mm>           Inward offset per face before union (default: 0)
  --gap <mm>              Gap between strips (default: 2)
  --margin <mm>           Sheet margin on all sides (default: 1)
  --duplicates <n>        Repeat the strip set horizontally n times (default: 1)
  --mode <bfs|hamiltonian>
  --ham-beam <n>          Beam width for the Hamiltonian search (default: 24)
  --ham-timeout <s>       Time limit for the Hamiltonian search (default: 2)
  --no-ham-fallback       Fail instead of falling back to BFS strips
  --max-sheet-width <mm>  Fail if the sheet is wider than this
  --max-sheet-height <mm> Fail if the sheet is taller than this
  --fold-lines            Draw dashed face boundaries
  --debug <tag,tag>       Stream debug lines for the given tags to stderr
  --help                  Show this message`;

export interface CliOptions {
  input: string;
  out: string;
  unit: MeshUnit;
  foldLines: boolean;
  debugTags: DebugTag[];
  config: UnfoldConfig;
}

export type CliParseResult = { help: true } | { help: false; options: CliOptions };

// Flags taking a numeric value, mapped to their config field
const NUMERIC_FLAGS: Record<string, string> = {
  '--tape-width': 'tapeWidth',
  '--shrink': 'shrink',
  '--gap': 'gap',
  '--margin': 'margin',
  '--duplicates': 'duplicates',
  '--ham-beam': 'beamWidth',
  '--ham-timeout': 'searchTimeout',
  '--max-sheet-width': 'maxSheetWidth',
  '--max-sheet-height': 'maxSheetHeight',
};

function parseDebugTags(raw: string): DebugTag[] {
  const tags: DebugTag[] = [];
  for (const tag of raw.split(',').map((t) => t.trim())) {
    if (tag.length === 0) continue;
    if (!isDebugTag(tag)) {
      throw new ConfigError(`Unknown debug tag "${tag}"; expected one of ${DEBUG_TAGS.join(', ')}`, { tag });
    }
    tags.push(tag);
  }
  return tags;
}

function parseNumber(flag: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || !isFinite(value)) {
    throw new ConfigError(`${flag} expects a number, got "${raw}"`, { flag, value: raw });
  }
  return value;
}

/**
 * Parse argv (without the node and script entries).
 *
 * @throws ConfigError on unknown flags, missing values or an invalid config
 */
export function parseArgs(argv: string[]): CliParseResult {
  const raw: Record<string, unknown> = {};
  const positional: string[] = [];
  let out = DEFAULT_OUT_PATH;
  let unit: MeshUnit = 'mm';
  let foldLines = false;
  let debugTags: DebugTag[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (!arg.startsWith('--')) {
      positional.push(arg);
      continue;
    }

    // Boolean flags
    if (arg === '--help') return { help: true };
    if (arg === '--no-ham-fallback') {
      raw.allowFallback = false;
      continue;
    }
    if (arg === '--fold-lines') {
      foldLines = true;
      continue;
    }

    const value = argv[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new ConfigError(`${arg} requires a value`, { flag: arg });
    }
    i++;

    const field = NUMERIC_FLAGS[arg];
    if (field) {
      raw[field] = parseNumber(arg, value);
      continue;
    }

    switch (arg) {
      case '--out':
        out = value;
        break;
      case '--stl-unit':
        if (value !== 'mm' && value !== 'inch') {
          throw new ConfigError(`--stl-unit must be "mm" or "inch", got "${value}"`, { flag: arg, value });
        }
        unit = value;
        break;
      case '--mode':
        raw.mode = value;
        break;
      case '--debug':
        debugTags = parseDebugTags(value);
        break;
      default:
        throw new ConfigError(`Unknown option: ${arg}`, { flag: arg });
    }
  }

  if (positional.length !== 1) {
    throw new ConfigError(
      positional.length === 0 ? 'Missing input mesh path' : `Expected one input mesh, got ${positional.length}`,
      { positional }
    );
  }
  if (raw.tapeWidth === undefined) {
    throw new ConfigError('--tape-width is required', { flag: '--tape-width' });
  }

  return {
    help: false,
    options: { input: positional[0], out, unit, foldLines, debugTags, config: validateConfig(raw) },
  };
}
