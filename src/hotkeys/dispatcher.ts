/**
 * Hot-key dispatcher: owns the live global registrations for the `next` and
 * `prev` actions plus the paste alias, and marshals every callback onto the
 * UI context before it reaches the cycler.
 *
 * Registrations are always replaced as a whole. `registerAll` starts with
 * `clearAll`, so a settings change can never leave stale or duplicate
 * bindings behind.
 */

import { HotkeyBindingError, HotkeyComboError } from '../errors.js';
import type { Logger } from '../logger.js';
import { HOTKEY_ACTIONS, type HotkeyAction, type HotkeyBindings } from '../types.js';
import type { GlobalHotkeyBackend, RegistrationHandle } from './backend.js';
import { parseCombo } from './combo.js';

/** Pasting into the window is how items usually arrive, so it also advances. */
export function defaultPasteCombo(platform: NodeJS.Platform = process.platform): string {
  return platform === 'darwin' ? 'meta+v' : 'ctrl+v';
}

function normalizeOrNull(combo: string): string | null {
  try {
    return parseCombo(combo).normalized;
  } catch (err) {
    if (err instanceof HotkeyComboError) return null;
    throw err;
  }
}

export interface HotkeyHandlers {
  onNext: () => void;
  onPrev: () => void;
}

/** Anything that can queue a task onto the UI's update context. */
export interface TaskMarshaler {
  post(task: () => void): void;
}

export type RegisteredAction = HotkeyAction | 'paste';

export interface HotkeyRegistration {
  action: RegisteredAction;
  combo: string;
}

export interface HotkeyRegistrationReport {
  available: boolean;
  registered: HotkeyRegistration[];
  errors: HotkeyBindingError[];
}

export interface HotkeyDispatcherOptions {
  logger?: Logger;
  /** Combo aliased to `next`; null disables the alias. */
  pasteCombo?: string | null;
}

export class HotkeyDispatcher {
  private handles: Array<{ action: RegisteredAction; handle: RegistrationHandle }> = [];
  private bindings: HotkeyBindings | null = null;
  private readonly logger?: Logger;
  private readonly pasteCombo: string | null;

  constructor(
    private readonly backend: GlobalHotkeyBackend | null,
    private readonly ui: TaskMarshaler,
    options: HotkeyDispatcherOptions = {},
  ) {
    this.logger = options.logger;
    this.pasteCombo = options.pasteCombo === undefined ? defaultPasteCombo() : options.pasteCombo;
  }

  isAvailable(): boolean {
    return this.backend !== null;
  }

  getBindings(): HotkeyBindings | null {
    return this.bindings ? { ...this.bindings } : null;
  }

  registered(): HotkeyRegistration[] {
    return this.handles.map(({ action, handle }) => ({ action, combo: handle.combo }));
  }

  /**
   * Replace every live registration with `bindings` plus the paste alias.
   * A combo the backend rejects is reported for its action only.
   */
  registerAll(bindings: HotkeyBindings, handlers: HotkeyHandlers): HotkeyRegistrationReport {
    this.clearAll();
    this.bindings = { ...bindings };
    if (!this.backend) {
      this.logger?.debug('no global hot-key backend; skipping registration');
      return { available: false, registered: [], errors: [] };
    }

    const errors: HotkeyBindingError[] = [];
    const targets: Array<{ action: RegisteredAction; combo: string }> = HOTKEY_ACTIONS.map(action => ({
      action,
      combo: bindings[action],
    }));
    if (this.pasteCombo) targets.push({ action: 'paste', combo: this.pasteCombo });

    for (const { action, combo } of targets) {
      if (action === 'paste' && this.isRegistered(combo)) {
        this.logger?.debug(`paste alias ${combo} already bound; not registering it twice`);
        continue;
      }
      const task = action === 'prev' ? handlers.onPrev : handlers.onNext;
      try {
        const handle = this.backend.register(combo, () => this.ui.post(task));
        this.handles.push({ action, handle });
        this.logger?.debug(`registered ${action} -> ${handle.combo}`);
      } catch (err) {
        const bindingError = new HotkeyBindingError(action, combo, err);
        this.logger?.warn(bindingError.message);
        errors.push(bindingError);
      }
    }

    return { available: true, registered: this.registered(), errors };
  }

  private isRegistered(combo: string): boolean {
    const normalized = normalizeOrNull(combo);
    return normalized !== null && this.handles.some(({ handle }) => handle.combo === normalized);
  }

  clearAll(): void {
    for (const { handle } of this.handles) handle.unregister();
    this.handles = [];
    this.backend?.unregisterAll();
  }

  dispose(): void {
    this.clearAll();
    this.backend?.dispose();
  }
}
