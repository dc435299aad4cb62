import blessed from 'blessed';
import type { HotkeyBindings } from '../../types.js';
import type { BlessedBox, BlessedFactory, BlessedScreen, BlessedTextbox, TuiComponentLifecycle } from '../types.js';

export interface SettingsDialogOptions {
  parent: BlessedScreen;
  blessed?: BlessedFactory;
}

/**
 * Merge edited field values over `current`: values are trimmed, and a field
 * left blank keeps its current combo.
 */
export function resolveEditedBindings(current: HotkeyBindings, edited: { next: string; prev: string }): HotkeyBindings {
  return {
    next: edited.next.trim() || current.next,
    prev: edited.prev.trim() || current.prev,
  };
}

/**
 * Modal with one field per global hot-key. Enter in the first field moves to
 * the second; Enter in the second or Ctrl-S saves; Escape cancels.
 */
export class SettingsDialogComponent implements TuiComponentLifecycle {
  private screen: BlessedScreen;
  private blessedImpl: BlessedFactory;
  // cancels the open dialog, resolving its promise with null
  private cancelActive: (() => void) | null = null;

  constructor(options: SettingsDialogOptions) {
    this.screen = options.parent;
    this.blessedImpl = options.blessed || blessed;
  }

  create(): this {
    return this;
  }

  isOpen(): boolean {
    return this.cancelActive !== null;
  }

  /**
   * Resolves with the edited bindings on save, or null on cancel.
   */
  open(current: HotkeyBindings): Promise<HotkeyBindings | null> {
    this.forceCleanup();

    return new Promise(resolve => {
      let resolved = false;
      const overlay = this.createOverlay();
      const dialog = this.blessedImpl.box({
        parent: this.screen,
        top: 'center',
        left: 'center',
        width: '60%',
        height: 11,
        label: ' Settings – Global hot-keys ',
        border: { type: 'line' },
        mouse: true,
        clickable: true,
      });

      this.blessedImpl.box({ parent: dialog, top: 0, left: 1, height: 1, width: '100%-2', content: 'Next item global hot-key:' });
      const nextInput = this.createInput(dialog, 1, current.next);
      this.blessedImpl.box({ parent: dialog, top: 3, left: 1, height: 1, width: '100%-2', content: 'Previous item global hot-key:' });
      const prevInput = this.createInput(dialog, 4, current.prev);

      const saveBtn = this.blessedImpl.box({
        parent: dialog,
        bottom: 0,
        right: 12,
        height: 1,
        width: 6,
        content: '[Save]',
        mouse: true,
        clickable: true,
        style: { fg: 'green' },
      });

      const cancelBtn = this.blessedImpl.box({
        parent: dialog,
        bottom: 0,
        right: 1,
        height: 1,
        width: 8,
        content: '[Cancel]',
        mouse: true,
        clickable: true,
        style: { fg: 'yellow' },
      });

      const widgets: BlessedBox[] = [saveBtn, cancelBtn, nextInput, prevInput, dialog, overlay];
      const cleanup = () => {
        // A textbox with inputOnFocus sets screen.grabKeys while reading;
        // destroying it mid-read would leave the keyboard captured.
        this.releaseKeyboard();
        for (const widget of widgets) {
          widget.removeAllListeners();
          widget.destroy();
        }
        this.cancelActive = null;
        this.screen.render();
      };

      const finish = (value: HotkeyBindings | null) => {
        if (resolved) return;
        resolved = true;
        cleanup();
        resolve(value);
      };
      const save = () =>
        finish(resolveEditedBindings(current, { next: nextInput.getValue(), prev: prevInput.getValue() }));
      const cancel = () => finish(null);
      this.cancelActive = cancel;

      nextInput.on('submit', () => prevInput.focus());
      prevInput.on('submit', save);
      for (const input of [nextInput, prevInput]) {
        input.on('cancel', cancel);
        input.key(['C-s'], save);
      }
      saveBtn.on('click', save);
      cancelBtn.on('click', cancel);
      overlay.on('click', cancel);
      dialog.key(['escape'], cancel);

      overlay.setFront();
      dialog.setFront();
      nextInput.focus();
      this.screen.render();
    });
  }

  /** Close any open dialog as cancelled and release the keyboard. */
  forceCleanup(): void {
    this.cancelActive?.();
    this.cancelActive = null;
    this.releaseKeyboard();
  }

  show(): void {
    // Dialogs are shown individually.
  }

  hide(): void {
    this.forceCleanup();
  }

  focus(): void {
    // No single focus target.
  }

  destroy(): void {
    this.forceCleanup();
  }

  private releaseKeyboard(): void {
    this.screen.grabKeys = false;
    this.screen.program.hideCursor();
  }

  private createInput(parent: BlessedBox, top: number, value: string): BlessedTextbox {
    const input = this.blessedImpl.textbox({
      parent,
      top,
      left: 1,
      width: '100%-4',
      height: 1,
      inputOnFocus: true,
      keys: true,
      mouse: true,
      style: { bg: 'grey', fg: 'white', focus: { bg: 'blue' } },
    });
    input.setValue(value);
    return input;
  }

  private createOverlay(): BlessedBox {
    return this.blessedImpl.box({
      parent: this.screen,
      top: 0,
      left: 0,
      width: '100%',
      height: '100% - 1',
      mouse: true,
      clickable: true,
      style: { bg: 'black' },
    });
  }
}
