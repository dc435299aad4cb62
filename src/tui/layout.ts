/**
 * UI layout factory: creates the blessed screen and all TUI component
 * instances without wiring any interaction or event handlers.
 */

import blessed from 'blessed';
import type { Widgets } from 'blessed';
import type { BlessedFactory, BlessedScreen } from './types.js';
import {
  EditorComponent,
  HelpMenuComponent,
  NavBarComponent,
  PreviewComponent,
  SettingsDialogComponent,
  ToastComponent,
} from './components/index.js';
import { TOAST_DURATION_MS } from './constants.js';

// ── Public types ─────────────────────────────────────────────────────

/** The full set of UI elements returned by {@link createLayout}. */
export interface TuiLayout {
  screen: BlessedScreen;
  editor: EditorComponent;
  preview: PreviewComponent;
  navBar: NavBarComponent;
  toast: ToastComponent;
  helpMenu: HelpMenuComponent;
  settingsDialog: SettingsDialogComponent;
}

// ── Options ──────────────────────────────────────────────────────────

export interface CreateLayoutOptions {
  /**
   * A blessed-compatible factory. When omitted the real `blessed` module is used.
   * Tests should supply a mock here.
   */
  blessed?: BlessedFactory;

  /** Options forwarded to `blessed.screen()`. */
  screenOptions?: Widgets.IScreenOptions;
}

// ── Factory ──────────────────────────────────────────────────────────

export function createLayout(options: CreateLayoutOptions = {}): TuiLayout {
  const blessedImpl: BlessedFactory = options.blessed || blessed;

  const screen = blessedImpl.screen({
    smartCSR: true,
    fullUnicode: true,
    title: 'clipcycle',
    // Ctrl-C must quit even while a text field holds the keyboard
    ignoreLocked: ['C-c'],
    ...options.screenOptions,
  });

  const editor = new EditorComponent({ parent: screen, blessed: blessedImpl }).create();
  const preview = new PreviewComponent({ parent: screen, blessed: blessedImpl }).create();
  const navBar = new NavBarComponent({ parent: screen, blessed: blessedImpl }).create();

  const toast = new ToastComponent({
    parent: screen,
    blessed: blessedImpl,
    position: { bottom: 4, right: 1 },
    style: { fg: 'black', bg: 'green' },
    duration: TOAST_DURATION_MS,
  }).create();

  const helpMenu = new HelpMenuComponent({ parent: screen, blessed: blessedImpl }).create();
  const settingsDialog = new SettingsDialogComponent({ parent: screen, blessed: blessedImpl }).create();

  return { screen, editor, preview, navBar, toast, helpMenu, settingsDialog };
}
