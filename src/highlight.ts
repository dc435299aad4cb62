import type { Item } from './types.js';

/**
 * Something that can show one marked source line, e.g. the preview pane.
 */
export interface HighlightTarget {
  clearMarks(): void;
  markLine(line: number): void;
  scrollToLine(line: number): void;
}

/**
 * Source line to mark for `cursor`, or null when there is nothing to mark.
 */
export function highlightedLine(sequence: readonly Item[], cursor: number): number | null {
  if (sequence.length === 0) return null;
  const item = sequence[cursor];
  return item ? item.line : null;
}

/**
 * Clear every mark on `target`, then mark and reveal the line under `cursor`.
 * Re-applying with the same arguments leaves the same visible state.
 */
export function applyHighlight(target: HighlightTarget, sequence: readonly Item[], cursor: number): number | null {
  target.clearMarks();
  const line = highlightedLine(sequence, cursor);
  if (line === null) return null;
  target.markLine(line);
  target.scrollToLine(line);
  return line;
}
