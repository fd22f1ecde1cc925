/**
 * Tagged debug log for the unfolding pipeline
 *
 * Usage:
 *   debug('bfs', `Strip 0 accepted face ${faceId}`);
 *   debug('hamiltonian', `depth ${depth}: ${frontier.length} live states`);
 *
 * Control active tags:
 *   enableDebugTag('layout');
 *   setDebugTags(['bfs', 'hamiltonian']);
 *
 * Each pipeline stage logs under its own tag. Lines for inactive tags are
 * dropped before formatting. Recorded lines are buffered for tests and, when
 * a sink is attached (stderr in the CLI), forwarded as they arrive.
 */

export const DEBUG_TAGS = ['adjacency', 'unfold', 'bfs', 'hamiltonian', 'layout', 'mesh', 'engine'] as const;

export type DebugTag = (typeof DEBUG_TAGS)[number];

export type DebugSink = (line: string) => void;

const KNOWN_TAGS: ReadonlySet<string> = new Set(DEBUG_TAGS);

const lines: string[] = [];
const activeTags = new Set<DebugTag>();
let sink: DebugSink | null = null;

export const isDebugTag = (value: string): value is DebugTag => KNOWN_TAGS.has(value);

/**
 * Record a message under a stage tag. No-op unless the tag is active.
 */
export const debug = (tag: DebugTag, content: string): void => {
  if (!activeTags.has(tag)) return;

  const timestamp = new Date().toISOString().slice(11, 23); // HH:MM:SS.mmm
  const line = `[${timestamp}] [${tag}] ${content}`;
  lines.push(line);
  sink?.(line);
};

export const enableDebugTag = (tag: DebugTag): void => {
  activeTags.add(tag);
};

export const disableDebugTag = (tag: DebugTag): void => {
  activeTags.delete(tag);
};

/**
 * Replace the active tag set
 */
export const setDebugTags = (tags: readonly DebugTag[]): void => {
  activeTags.clear();
  tags.forEach((tag) => activeTags.add(tag));
};

export const getDebugTags = (): DebugTag[] => Array.from(activeTags);

export const isDebugTagActive = (tag: DebugTag): boolean => activeTags.has(tag);

/**
 * Forward recorded lines to `next` as well as the buffer. Pass null to detach.
 */
export const setDebugSink = (next: DebugSink | null): void => {
  sink = next;
};

export const getDebugLines = (): readonly string[] => lines;

export const getDebug = (): string => lines.join('\n');

export const hasDebug = (): boolean => lines.length > 0;

export const clearDebug = (): void => {
  lines.length = 0;
};
