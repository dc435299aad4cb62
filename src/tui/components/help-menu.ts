import blessed from 'blessed';
import type { BlessedBox, BlessedFactory, BlessedScreen, TuiComponentLifecycle } from '../types.js';
import { DEFAULT_SHORTCUTS, KEY_MENU_CLOSE, type ShortcutSection } from '../constants.js';
import type { HotkeyRegistration } from '../../hotkeys/dispatcher.js';

export interface HelpMenuOptions {
  parent: BlessedScreen;
  blessed?: BlessedFactory;
  position?: {
    top?: number | string;
    left?: number | string;
    width?: number | string;
    height?: number | string;
  };
  shortcuts?: ShortcutSection[];
}

/** Status of the global hot-keys, shown under the local shortcuts. */
export interface GlobalHotkeyStatus {
  available: boolean;
  registered: HotkeyRegistration[];
}

export function formatHelpContent(shortcuts: ShortcutSection[], globalStatus: GlobalHotkeyStatus | null): string {
  const lines: string[] = ['Keyboard shortcuts', ''];

  shortcuts.forEach(section => {
    lines.push(`${section.category}:`);
    section.items.forEach(item => {
      // Pad keys to align descriptions
      const keysPadded = item.keys.padEnd(25);
      lines.push(`  ${keysPadded}${item.description}`);
    });
    lines.push('');
  });

  if (globalStatus) {
    lines.push('Global hot-keys:');
    if (!globalStatus.available) {
      lines.push('  (not available on this host; in-window keys only)');
    } else if (globalStatus.registered.length === 0) {
      lines.push('  (none registered)');
    } else {
      for (const { action, combo } of globalStatus.registered) {
        lines.push(`  ${combo.padEnd(25)}${action}`);
      }
    }
  }

  return lines.join('\n');
}

export class HelpMenuComponent implements TuiComponentLifecycle {
  private blessedImpl: BlessedFactory;
  private screen: BlessedScreen;
  private overlay: BlessedBox;
  private menu: BlessedBox;
  private closeButton: BlessedBox;
  private shortcuts: ShortcutSection[];
  private globalStatus: GlobalHotkeyStatus | null = null;

  constructor(options: HelpMenuOptions) {
    this.screen = options.parent;
    this.blessedImpl = options.blessed || blessed;
    this.shortcuts = options.shortcuts || DEFAULT_SHORTCUTS;

    // Create overlay background
    this.overlay = this.blessedImpl.box({
      parent: this.screen,
      top: 0,
      left: 0,
      width: '100%',
      height: '100%',
      hidden: true,
      mouse: true,
      clickable: true,
      style: { bg: 'black' },
    });

    this.menu = this.blessedImpl.box({
      parent: this.screen,
      top: options.position?.top || 'center',
      left: options.position?.left || 'center',
      width: options.position?.width || '70%',
      height: options.position?.height || '70%',
      label: ' Help ',
      border: { type: 'line' },
      hidden: true,
      scrollable: true,
      alwaysScroll: true,
      keys: true,
      vi: true,
      mouse: true,
      style: { border: { fg: 'cyan' } },
    });

    this.closeButton = this.blessedImpl.box({
      parent: this.menu,
      top: 0,
      right: 1,
      height: 1,
      width: 3,
      content: '[x]',
      style: { fg: 'red' },
      mouse: true,
      clickable: true,
    });

    this.updateContent();
    this.setupEventHandlers();
  }

  create(): this {
    return this;
  }

  setGlobalStatus(status: GlobalHotkeyStatus): void {
    this.globalStatus = status;
    this.updateContent();
  }

  private updateContent(): void {
    this.menu.setContent(formatHelpContent(this.shortcuts, this.globalStatus));
  }

  private setupEventHandlers(): void {
    this.overlay.on('click', () => {
      this.close();
    });

    this.closeButton.on('click', () => {
      this.close();
    });

    this.menu.key(KEY_MENU_CLOSE, () => {
      this.close();
    });
  }

  show(): void {
    this.overlay.show();
    this.menu.show();
    this.overlay.setFront();
    this.menu.setFront();
    this.menu.focus();
    this.screen.render();
  }

  hide(): void {
    this.menu.hide();
    this.overlay.hide();
    this.screen.render();
  }

  toggle(): void {
    if (this.isVisible()) this.close();
    else this.show();
  }

  close(): void {
    this.hide();
  }

  isVisible(): boolean {
    return !this.menu.hidden;
  }

  focus(): void {
    this.menu.focus();
  }

  destroy(): void {
    this.overlay.removeAllListeners();
    this.closeButton.removeAllListeners();
    this.menu.removeAllListeners();
    this.closeButton.destroy();
    this.menu.destroy();
    this.overlay.destroy();
  }
}
