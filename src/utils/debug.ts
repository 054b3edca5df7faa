/**
 * Tagged debug log
 *
 * Usage:
 *   debug('maze', `Built 10x20 maze from seed ${seed}`);
 *   debug('planner', `Planned ${paths.length} toolpaths`);
 *
 * Control active tags:
 *   enableDebugTag('planner');
 *   disableDebugTag('planner');
 *   setDebugTags(['maze', 'cnc']);
 *   getDebugTags(); // returns current active tags
 *
 * Only messages with active tags are kept. Read them back with getDebug().
 */

export type DebugTag = 'maze' | 'planner' | 'cnc';

let debugContent: string = '';
const activeTags = new Set<DebugTag>();

const appendLine = (line: string): void => {
  if (debugContent) {
    debugContent += '\n' + line;
  } else {
    debugContent = line;
  }
};

/**
 * Log a debug message with a tag. Only outputs if the tag is active.
 */
export const debug = (tag: DebugTag, content: string): void => {
  if (!activeTags.has(tag)) return;

  const timestamp = new Date().toISOString().slice(11, 23); // HH:MM:SS.mmm
  appendLine(`[${timestamp}] [${tag}] ${content}`);
};

export const enableDebugTag = (tag: DebugTag): void => {
  activeTags.add(tag);
};

export const disableDebugTag = (tag: DebugTag): void => {
  activeTags.delete(tag);
};

/**
 * Set all active debug tags (replaces existing)
 */
export const setDebugTags = (tags: DebugTag[]): void => {
  activeTags.clear();
  tags.forEach(tag => activeTags.add(tag));
};

export const getDebugTags = (): DebugTag[] => {
  return Array.from(activeTags);
};

export const isDebugTagActive = (tag: DebugTag): boolean => {
  return activeTags.has(tag);
};

export const getDebug = (): string => debugContent;

export const clearDebug = (): void => {
  debugContent = '';
};
