/**
 * Cursor/navigation state machine for cycling items onto the clipboard.
 *
 * Every transition re-reads the editor text and re-parses it, then clamps the
 * cursor into the fresh sequence before doing anything else. The two
 * directions are deliberately asymmetric:
 *
 * - `advance()` shows and copies the item under the cursor, then moves forward.
 * - `retreat()` moves back first, then shows and copies the item under the cursor.
 *
 * Either way the label always names the item that was just copied.
 */

import type { ClipboardCapability } from './clipboard.js';
import { applyHighlight, type HighlightTarget } from './highlight.js';
import { parseItems } from './items.js';
import type { Logger } from './logger.js';
import type { Item } from './types.js';

export const EMPTY_LABEL = '0 / 0';

export type CycleDirection = 'advance' | 'retreat';

export interface CycleStep {
  direction: CycleDirection;
  /** Cursor after the transition. */
  cursor: number;
  total: number;
  label: string;
  /** Item highlighted and copied, absent when the buffer has no items. */
  item?: Item;
  copied: boolean;
  error?: string;
}

export interface CyclerOptions {
  /** Current contents of the editor buffer. Called on every transition. */
  readText: () => string;
  highlight: HighlightTarget;
  clipboard: ClipboardCapability;
  logger?: Logger;
  /** Called after each transition with the new label and outcome. */
  onStep?: (step: CycleStep) => void;
}

export function formatLabel(cursor: number, total: number): string {
  if (total <= 0) return EMPTY_LABEL;
  return `${(cursor % total) + 1} / ${total}`;
}

export class Cycler {
  private cursor = 0;
  private label = EMPTY_LABEL;

  constructor(private readonly options: CyclerOptions) {}

  getCursor(): number {
    return this.cursor;
  }

  getLabel(): string {
    return this.label;
  }

  /**
   * Re-derive the sequence from the current text and clamp the cursor into it.
   */
  refresh(): Item[] {
    const sequence = parseItems(this.options.readText());
    this.cursor = Math.min(this.cursor, Math.max(0, sequence.length - 1));
    return sequence;
  }

  advance(): CycleStep {
    const sequence = this.refresh();
    if (sequence.length === 0) return this.emptyStep('advance');

    const step = this.present('advance', sequence);
    this.cursor = (this.cursor + 1) % sequence.length;
    step.cursor = this.cursor;
    this.options.onStep?.(step);
    return step;
  }

  retreat(): CycleStep {
    const sequence = this.refresh();
    if (sequence.length === 0) return this.emptyStep('retreat');

    this.cursor = (this.cursor - 1 + sequence.length) % sequence.length;
    const step = this.present('retreat', sequence);
    this.options.onStep?.(step);
    return step;
  }

  // Highlight and copy the item under the cursor, and update the label.
  private present(direction: CycleDirection, sequence: Item[]): CycleStep {
    const item = sequence[this.cursor];
    applyHighlight(this.options.highlight, sequence, this.cursor);

    const result = this.options.clipboard.write(item.text);
    if (!result.success) {
      this.options.logger?.warn(`clipboard write failed: ${result.error ?? 'unknown error'}`);
    }

    this.label = formatLabel(this.cursor, sequence.length);
    this.options.logger?.debug(`${direction} line=${item.line} label=${this.label}`);
    return {
      direction,
      cursor: this.cursor,
      total: sequence.length,
      label: this.label,
      item,
      copied: result.success,
      error: result.success ? undefined : result.error,
    };
  }

  private emptyStep(direction: CycleDirection): CycleStep {
    applyHighlight(this.options.highlight, [], 0);
    this.cursor = 0;
    this.label = EMPTY_LABEL;
    const step: CycleStep = { direction, cursor: 0, total: 0, label: EMPTY_LABEL, copied: false };
    this.options.onStep?.(step);
    return step;
  }
}
