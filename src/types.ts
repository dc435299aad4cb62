/**
 * Type definitions shared across clipcycle
 */

/**
 * One non-blank line of the editor buffer, paired with its 1-based source line.
 */
export interface Item {
  readonly line: number;
  readonly text: string;
}

export type HotkeyAction = 'next' | 'prev';

export const HOTKEY_ACTIONS: readonly HotkeyAction[] = ['next', 'prev'];

/**
 * Global hot-key combos keyed by the action they trigger.
 */
export type HotkeyBindings = Record<HotkeyAction, string>;

/**
 * Persisted settings record
 */
export interface ClipcycleSettings {
  hotkeys: HotkeyBindings;
}

/**
 * Result of a side-effecting call that reports failure instead of throwing
 */
export interface OperationResult {
  success: boolean;
  error?: string;
}

export function isHotkeyAction(value: string): value is HotkeyAction {
  return value === 'next' || value === 'prev';
}
