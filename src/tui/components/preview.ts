import blessed from 'blessed';
import type { HighlightTarget } from '../../highlight.js';
import type { BlessedBox, BlessedFactory, BlessedScreen, TuiComponentLifecycle } from '../types.js';

export interface PreviewComponentOptions {
  parent: BlessedScreen;
  blessed?: BlessedFactory;
}

/** Escape blessed tag braces so user text renders literally. */
export function escapeTags(text: string): string {
  return text.replace(/[{}]/g, ch => (ch === '{' ? '{open}' : '{close}'));
}

/**
 * Render `lines` with a line-number gutter, the `marked` line (1-based) on a
 * yellow background.
 */
export function formatPreview(lines: readonly string[], marked: number | null): string {
  const width = String(Math.max(lines.length, 1)).length;
  return lines
    .map((line, idx) => {
      const lineNo = idx + 1;
      const gutter = `{grey-fg}${String(lineNo).padStart(width)}{/grey-fg} `;
      const body = escapeTags(line);
      if (lineNo === marked) return `${gutter}{black-fg}{yellow-bg}${body}{/yellow-bg}{/black-fg}`;
      return `${gutter}${body}`;
    })
    .join('\n');
}

/**
 * Read-only mirror of the editor buffer that shows the current item.
 */
export class PreviewComponent implements HighlightTarget, TuiComponentLifecycle {
  private blessedImpl: BlessedFactory;
  private screen: BlessedScreen;
  private box: BlessedBox;
  private lines: string[] = [];
  private marked: number | null = null;

  constructor(options: PreviewComponentOptions) {
    this.screen = options.parent;
    this.blessedImpl = options.blessed || blessed;

    this.box = this.blessedImpl.box({
      parent: this.screen,
      label: ' Current ',
      top: 0,
      left: '50%',
      width: '50%',
      height: '100%-4',
      tags: true,
      scrollable: true,
      alwaysScroll: true,
      keys: true,
      mouse: true,
      border: { type: 'line' },
      style: { border: { fg: 'white' } },
      content: '',
    });
  }

  create(): this {
    return this;
  }

  setText(text: string): void {
    this.lines = text === '' ? [] : text.split(/\r\n|\r|\n/);
    if (this.marked !== null && this.marked > this.lines.length) this.marked = null;
    this.paint();
  }

  getMarkedLine(): number | null {
    return this.marked;
  }

  clearMarks(): void {
    this.marked = null;
    this.paint();
  }

  markLine(line: number): void {
    this.marked = line;
    this.paint();
  }

  scrollToLine(line: number): void {
    this.box.scrollTo(Math.max(0, line - 1));
  }

  show(): void {
    this.box.show();
  }

  hide(): void {
    this.box.hide();
  }

  focus(): void {
    this.box.focus();
  }

  destroy(): void {
    this.box.removeAllListeners();
    this.box.destroy();
  }

  private paint(): void {
    this.box.setContent(formatPreview(this.lines, this.marked));
  }
}
