import type { HotkeyAction } from './types.js';

/**
 * Raised when a combo string cannot be understood by the hot-key layer.
 */
export class HotkeyComboError extends Error {
  constructor(readonly combo: string, reason: string) {
    super(`Invalid hot-key "${combo}": ${reason}`);
    this.name = 'HotkeyComboError';
  }
}

/**
 * One action's global binding failed to register. The other bindings are unaffected.
 */
export class HotkeyBindingError extends Error {
  constructor(
    readonly action: HotkeyAction | 'paste',
    readonly combo: string,
    cause: unknown,
  ) {
    super(`Could not bind ${action} to "${combo}": ${describeError(cause)}`, { cause });
    this.name = 'HotkeyBindingError';
  }
}

export class SettingsError extends Error {
  constructor(readonly path: string, cause: unknown) {
    super(`Settings file ${path}: ${describeError(cause)}`, { cause });
    this.name = 'SettingsError';
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
