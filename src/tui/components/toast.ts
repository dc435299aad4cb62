import blessed from 'blessed';
import type { BlessedBox, BlessedFactory, BlessedScreen } from '../types.js';

export type ToastTone = 'info' | 'warn';

export interface ToastOptions {
  parent: BlessedScreen;
  blessed?: BlessedFactory;
  position?: {
    bottom?: number | string;
    right?: number | string;
    top?: number | string;
    left?: number | string;
  };
  style?: {
    fg?: string;
    bg?: string;
  };
  duration?: number;
}

const WARN_STYLE = { fg: 'white', bg: 'red' };

export class ToastComponent {
  private blessedImpl: BlessedFactory;
  private box: BlessedBox;
  private screen: BlessedScreen;
  private timer: NodeJS.Timeout | null = null;
  private duration: number;
  private readonly infoStyle: { fg: string; bg: string };

  constructor(options: ToastOptions) {
    this.screen = options.parent;
    this.blessedImpl = options.blessed || blessed;
    this.duration = options.duration || 1200;
    this.infoStyle = { fg: options.style?.fg ?? 'black', bg: options.style?.bg ?? 'green' };

    // Create the toast box
    this.box = this.blessedImpl.box({
      parent: this.screen,
      bottom: options.position?.bottom ?? 1,
      right: options.position?.right ?? 1,
      top: options.position?.top,
      left: options.position?.left,
      height: 1,
      width: 12, // Will be adjusted based on content
      content: '',
      hidden: true,
      style: { ...this.infoStyle },
    });
  }

  /**
   * Lifecycle method for parity with other components.
   * Creation happens in the constructor; this enables fluent usage.
   */
  create(): this {
    return this;
  }

  /**
   * Show a toast message. Warnings stay up three times as long.
   */
  show(message: string, tone: ToastTone = 'info'): void {
    if (!message) return;

    const padded = ` ${message} `;
    const style = tone === 'warn' ? WARN_STYLE : this.infoStyle;
    this.box.style.fg = style.fg;
    this.box.style.bg = style.bg;
    this.box.setContent(padded);
    this.box.width = padded.length;
    this.box.show();
    this.box.setFront();
    this.screen.render();

    // Clear any existing timer
    if (this.timer) {
      clearTimeout(this.timer);
    }

    this.timer = setTimeout(() => {
      this.hide();
    }, tone === 'warn' ? this.duration * 3 : this.duration);
  }

  /**
   * Hide the toast
   */
  hide(): void {
    this.box.hide();
    this.screen.render();

    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  destroy(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.box.removeAllListeners();
    this.box.destroy();
  }
}
