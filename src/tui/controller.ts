/**
 * TUI controller: composes the layout, the cycler, the UI context and the
 * global hot-key dispatcher, and wires every local key and button.
 */

import { SystemClipboard, type ClipboardCapability } from '../clipboard.js';
import { loadSettings, saveSettings } from '../config.js';
import { Cycler } from '../cycler.js';
import { describeError } from '../errors.js';
import { loadGlobalHotkeyBackend, type GlobalHotkeyBackend } from '../hotkeys/backend.js';
import { HotkeyDispatcher, type HotkeyRegistrationReport } from '../hotkeys/dispatcher.js';
import type { Logger } from '../logger.js';
import type { ClipcycleSettings, HotkeyBindings } from '../types.js';
import {
  KEY_EDIT,
  KEY_ESCAPE,
  KEY_FORCE_QUIT,
  KEY_NEXT,
  KEY_PASTE_APPEND,
  KEY_PREV,
  KEY_QUIT,
  KEY_SETTINGS,
  KEY_TOGGLE_HELP,
} from './constants.js';
import { createLayout, type TuiLayout } from './layout.js';
import type { BlessedFactory } from './types.js';
import { UiContext } from './ui-context.js';

export interface TuiControllerDeps {
  blessed?: BlessedFactory;
  createLayout?: typeof createLayout;
  clipboard?: ClipboardCapability;
  loadBackend?: (logger: Logger) => Promise<GlobalHotkeyBackend | null>;
  loadSettings?: typeof loadSettings;
  saveSettings?: typeof saveSettings;
  /** Scheduler for marshaled hot-key tasks; defaults to `setImmediate`. */
  defer?: (fn: () => void) => void;
  /** Combo aliased to `next`; null disables it. Defaults per platform. */
  pasteCombo?: string | null;
}

export interface TuiStartOptions {
  configDir?: string;
  /** Set false to skip the global hot-key backend entirely. */
  globalHotkeys?: boolean;
  initialText?: string;
}

export interface TuiSession {
  layout: TuiLayout;
  cycler: Cycler;
  dispatcher: HotkeyDispatcher;
  ui: UiContext;
  settings: ClipcycleSettings;
  /** Outcome of the latest global registration. */
  report(): HotkeyRegistrationReport;
  next(): void;
  prev(): void;
  openSettings(): Promise<void>;
  shutdown(): void;
  /** Resolves once the screen has been torn down. */
  closed: Promise<void>;
}

export class TuiController {
  constructor(
    private readonly logger: Logger,
    private readonly deps: TuiControllerDeps = {}
  ) {}

  async start(options: TuiStartOptions = {}): Promise<TuiSession> {
    const createLayoutImpl = this.deps.createLayout ?? createLayout;
    const loadSettingsImpl = this.deps.loadSettings ?? loadSettings;
    const saveSettingsImpl = this.deps.saveSettings ?? saveSettings;
    const loadBackendImpl = this.deps.loadBackend ?? ((logger: Logger) => loadGlobalHotkeyBackend({ logger }));
    const clipboard = this.deps.clipboard ?? new SystemClipboard();
    const log = this.logger.child('tui');

    const { settings, warnings } = loadSettingsImpl({ configDir: options.configDir });
    const startupWarnings = warnings.map(w => w.message);
    for (const message of startupWarnings) log.warn(message);

    const layout = createLayoutImpl({ blessed: this.deps.blessed });
    const { screen, editor, preview, navBar, toast, helpMenu, settingsDialog } = layout;
    const ui = new UiContext({ defer: this.deps.defer, logger: log });

    const cycler = new Cycler({
      readText: () => {
        const text = editor.getText();
        preview.setText(text);
        return text;
      },
      highlight: preview,
      clipboard,
      logger: log,
      onStep: step => {
        navBar.setLabel(step.label);
        if (step.item && !step.copied) {
          toast.show(`Copy failed: ${step.error ?? 'clipboard unavailable'}`, 'warn');
        }
        screen.render();
      },
    });

    const next = () => {
      cycler.advance();
    };
    const prev = () => {
      cycler.retreat();
    };
    const handlers = { onNext: next, onPrev: prev };

    const backend = options.globalHotkeys === false ? null : await loadBackendImpl(log);
    const dispatcher = new HotkeyDispatcher(backend, ui, { logger: log, pasteCombo: this.deps.pasteCombo });

    const applyBindings = (bindings: HotkeyBindings): { report: HotkeyRegistrationReport; messages: string[] } => {
      const result = dispatcher.registerAll(bindings, handlers);
      helpMenu.setGlobalStatus({ available: result.available, registered: result.registered });
      if (!result.available) log.info('global hot-keys unavailable; using in-window keys only');
      return { report: result, messages: result.errors.map(e => e.message) };
    };

    const initial = applyBindings(settings.hotkeys);
    let report = initial.report;
    startupWarnings.push(...initial.messages);

    let resolveClosed: () => void = () => {};
    const closed = new Promise<void>(resolve => {
      resolveClosed = resolve;
    });
    let isShuttingDown = false;

    // ── Local actions ─────────────────────────────────────────────────
    const canNavigate = () => !editor.isEditing() && !settingsDialog.isOpen() && !helpMenu.isVisible();

    const appendFromClipboard = () => {
      const result = clipboard.read();
      if (!result.success) {
        log.warn(`clipboard read failed: ${result.error ?? 'unknown error'}`);
        toast.show('Paste failed', 'warn');
        return;
      }
      const text = (result.text ?? '').replace(/\s+$/, '');
      if (!text) {
        toast.show('Clipboard is empty');
        return;
      }
      editor.appendLine(text);
      preview.setText(editor.getText());
      toast.show('Appended');
      screen.render();
    };

    const commitSettings = (bindings: HotkeyBindings) => {
      settings.hotkeys = { ...bindings };
      const messages: string[] = [];
      try {
        const savedTo = saveSettingsImpl(settings, { configDir: options.configDir });
        log.info(`saved hot-keys to ${savedTo}`);
      } catch (err) {
        log.error(describeError(err));
        messages.push(describeError(err));
      }
      const applied = applyBindings(settings.hotkeys);
      report = applied.report;
      messages.push(...applied.messages);
      if (messages.length > 0) toast.show(messages.join('; '), 'warn');
      else toast.show('Hot-keys saved');
      screen.render();
    };

    const openSettings = async (): Promise<void> => {
      if (settingsDialog.isOpen()) return;
      const edited = await settingsDialog.open(dispatcher.getBindings() ?? settings.hotkeys);
      if (isShuttingDown) return;
      if (!edited) {
        screen.render();
        return;
      }
      ui.run(() => commitSettings(edited));
    };
    const requestSettings = () => {
      openSettings().catch(err => log.error(`settings dialog failed: ${describeError(err)}`));
    };

    const shutdown = () => {
      if (isShuttingDown) return;
      isShuttingDown = true;
      dispatcher.dispose();
      ui.dispose();
      settingsDialog.destroy();
      toast.destroy();
      screen.destroy();
      log.info('closed');
      resolveClosed();
    };

    // ── Bindings ──────────────────────────────────────────────────────
    // In-window keys are bound unconditionally; global hot-keys only add to them.
    screen.key(KEY_NEXT, () => {
      if (canNavigate()) ui.run(next);
    });
    screen.key(KEY_PREV, () => {
      if (canNavigate()) ui.run(prev);
    });
    navBar.onNext(() => ui.run(next));
    navBar.onPrev(() => ui.run(prev));
    navBar.onSettings(requestSettings);

    screen.key(KEY_EDIT, () => {
      if (!canNavigate()) return;
      editor.focus();
      screen.render();
    });
    screen.key(KEY_PASTE_APPEND, () => {
      if (canNavigate()) ui.run(appendFromClipboard);
    });
    screen.key(KEY_SETTINGS, () => {
      if (canNavigate()) requestSettings();
    });
    screen.key(KEY_TOGGLE_HELP, () => {
      if (editor.isEditing() || settingsDialog.isOpen()) return;
      helpMenu.toggle();
    });
    screen.key(KEY_ESCAPE, () => {
      if (helpMenu.isVisible()) helpMenu.close();
    });
    screen.key(KEY_QUIT, () => {
      // q also closes the help overlay; that binding lives on the overlay
      if (editor.isEditing() || settingsDialog.isOpen() || helpMenu.isVisible()) return;
      shutdown();
    });
    screen.key(KEY_FORCE_QUIT, () => shutdown());

    // ── Initial render ────────────────────────────────────────────────
    if (options.initialText) editor.setText(options.initialText);
    preview.setText(editor.getText());
    editor.focus();
    if (startupWarnings.length > 0) toast.show(startupWarnings.join('; '), 'warn');
    screen.render();

    return {
      layout,
      cycler,
      dispatcher,
      ui,
      settings,
      report: () => report,
      next: () => ui.run(next),
      prev: () => ui.run(prev),
      openSettings,
      shutdown,
      closed,
    };
  }
}
