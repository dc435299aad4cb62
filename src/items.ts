/**
 * Item parsing: turns the editor buffer into the list of items to cycle through.
 *
 * The sequence is rebuilt from scratch on every navigation request. Nothing
 * caches it, so edits made between two key presses always take effect on the
 * very next press.
 */

import type { Item } from './types.js';

const LINE_BREAK = /\r\n|\r|\n/;

/**
 * Split `text` into lines and keep each non-blank one, trimmed, with its
 * 1-based line number.
 */
export function parseItems(text: string): Item[] {
  if (!text) return [];
  const items: Item[] = [];
  const lines = text.split(LINE_BREAK);
  lines.forEach((raw, idx) => {
    const trimmed = raw.trim();
    if (trimmed) items.push({ line: idx + 1, text: trimmed });
  });
  return items;
}
