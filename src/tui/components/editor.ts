import blessed from 'blessed';
import type { BlessedFactory, BlessedScreen, BlessedTextarea, TuiComponentLifecycle } from '../types.js';

export interface EditorComponentOptions {
  parent: BlessedScreen;
  blessed?: BlessedFactory;
}

/**
 * Multi-line text area holding the raw item list. The UI owns this buffer;
 * the cycler only ever reads it.
 */
export class EditorComponent implements TuiComponentLifecycle {
  private blessedImpl: BlessedFactory;
  private screen: BlessedScreen;
  private textarea: BlessedTextarea;
  private editing = false;

  constructor(options: EditorComponentOptions) {
    this.screen = options.parent;
    this.blessedImpl = options.blessed || blessed;

    this.textarea = this.blessedImpl.textarea({
      parent: this.screen,
      label: ' Items (e to edit, Esc to stop) ',
      top: 0,
      left: 0,
      width: '50%',
      height: '100%-4',
      inputOnFocus: true,
      keys: true,
      mouse: true,
      scrollable: true,
      alwaysScroll: true,
      border: { type: 'line' },
      style: {
        border: { fg: 'white' },
        focus: { border: { fg: 'green' } },
      },
    });

    this.textarea.on('focus', () => {
      this.editing = true;
    });
    for (const event of ['blur', 'cancel', 'submit']) {
      this.textarea.on(event, () => {
        this.editing = false;
      });
    }
  }

  create(): this {
    return this;
  }

  getText(): string {
    return this.textarea.getValue();
  }

  setText(text: string): void {
    this.textarea.setValue(text);
  }

  /**
   * Append `text` as a new last line, starting a new line if the buffer
   * does not already end with one.
   */
  appendLine(text: string): void {
    const current = this.getText();
    const separator = current === '' || current.endsWith('\n') ? '' : '\n';
    this.setText(`${current}${separator}${text}`);
  }

  isEditing(): boolean {
    return this.editing;
  }

  show(): void {
    this.textarea.show();
  }

  hide(): void {
    this.textarea.hide();
  }

  /**
   * Focus the text area and start editing. Escape ends input without moving
   * focus, so a second call has to restart reading explicitly.
   */
  focus(): void {
    this.textarea.focus();
    if (!this.editing) {
      this.editing = true;
      this.textarea.readInput();
    }
  }

  destroy(): void {
    this.textarea.removeAllListeners();
    this.textarea.destroy();
  }
}
