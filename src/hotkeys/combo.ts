/**
 * Hot-key combo parsing.
 *
 * Combos are `+`-separated and case-insensitive, e.g. `ctrl+shift+alt+right`:
 * any number of modifiers followed by exactly one key. Key names resolve to
 * the names the global key listener reports (`RIGHT ARROW`, `A`, `F5`, ...).
 */

import { HotkeyComboError } from '../errors.js';

export type Modifier = 'ctrl' | 'shift' | 'alt' | 'meta';

export const MODIFIER_ORDER: readonly Modifier[] = ['ctrl', 'shift', 'alt', 'meta'];

const MODIFIER_ALIASES = new Map<string, Modifier>([
  ['ctrl', 'ctrl'],
  ['control', 'ctrl'],
  ['shift', 'shift'],
  ['alt', 'alt'],
  ['option', 'alt'],
  ['meta', 'meta'],
  ['cmd', 'meta'],
  ['command', 'meta'],
  ['super', 'meta'],
  ['win', 'meta'],
]);

/** Listener key names for each side of a modifier. */
export const MODIFIER_KEY_NAMES: Record<Modifier, readonly string[]> = {
  ctrl: ['LEFT CTRL', 'RIGHT CTRL'],
  shift: ['LEFT SHIFT', 'RIGHT SHIFT'],
  alt: ['LEFT ALT', 'RIGHT ALT'],
  meta: ['LEFT META', 'RIGHT META'],
};

// canonical name -> listener key name
const NAMED_KEYS = new Map<string, string>([
  ['left', 'LEFT ARROW'],
  ['right', 'RIGHT ARROW'],
  ['up', 'UP ARROW'],
  ['down', 'DOWN ARROW'],
  ['space', 'SPACE'],
  ['enter', 'RETURN'],
  ['tab', 'TAB'],
  ['escape', 'ESCAPE'],
  ['backspace', 'BACKSPACE'],
  ['delete', 'DELETE'],
  ['insert', 'INS'],
  ['home', 'HOME'],
  ['end', 'END'],
  ['pageup', 'PAGE UP'],
  ['pagedown', 'PAGE DOWN'],
]);

const KEY_ALIASES = new Map<string, string>([
  ['return', 'enter'],
  ['esc', 'escape'],
  ['del', 'delete'],
  ['ins', 'insert'],
  ['arrowleft', 'left'],
  ['arrowright', 'right'],
  ['arrowup', 'up'],
  ['arrowdown', 'down'],
]);

export interface ParsedCombo {
  /** Canonical text form, e.g. `ctrl+alt+right`. */
  normalized: string;
  modifiers: ReadonlySet<Modifier>;
  /** Canonical key name, e.g. `right`, `v`, `f5`. */
  key: string;
  /** Name the global key listener reports for `key`. */
  keyName: string;
}

function resolveKey(token: string): { key: string; keyName: string } | null {
  const canonical = KEY_ALIASES.get(token) ?? token;
  const named = NAMED_KEYS.get(canonical);
  if (named) return { key: canonical, keyName: named };
  if (/^[a-z0-9]$/.test(canonical)) return { key: canonical, keyName: canonical.toUpperCase() };
  const fn = /^f([1-9]|1[0-9]|2[0-4])$/.exec(canonical);
  if (fn) return { key: canonical, keyName: `F${fn[1]}` };
  return null;
}

/**
 * Parse `combo`, throwing {@link HotkeyComboError} when it names an unknown
 * key, repeats a modifier, or has no key or more than one.
 */
export function parseCombo(combo: string): ParsedCombo {
  const source = combo.trim();
  if (!source) throw new HotkeyComboError(combo, 'combo is empty');

  const tokens = source.toLowerCase().split('+').map(t => t.trim());
  if (tokens.some(t => t === '')) throw new HotkeyComboError(combo, 'empty segment between "+" separators');

  const modifiers = new Set<Modifier>();
  let resolved: { key: string; keyName: string } | null = null;

  for (const token of tokens) {
    const modifier = MODIFIER_ALIASES.get(token);
    if (modifier) {
      if (modifiers.has(modifier)) throw new HotkeyComboError(combo, `modifier "${modifier}" repeated`);
      modifiers.add(modifier);
      continue;
    }
    const key = resolveKey(token);
    if (!key) throw new HotkeyComboError(combo, `unknown key "${token}"`);
    if (resolved) throw new HotkeyComboError(combo, `more than one key ("${resolved.key}" and "${key.key}")`);
    resolved = key;
  }

  if (!resolved) throw new HotkeyComboError(combo, 'no key given, only modifiers');

  const ordered = MODIFIER_ORDER.filter(m => modifiers.has(m));
  return {
    normalized: [...ordered, resolved.key].join('+'),
    modifiers,
    key: resolved.key,
    keyName: resolved.keyName,
  };
}

export function isValidCombo(combo: string): boolean {
  try {
    parseCombo(combo);
    return true;
  } catch (err) {
    if (err instanceof HotkeyComboError) return false;
    throw err;
  }
}

/**
 * Whether a key-down of `keyName`, with `pressed` listing every key currently
 * held, fires `combo`. Modifiers must match exactly; either side counts.
 */
export function matchesCombo(combo: ParsedCombo, keyName: string | undefined, pressed: ReadonlySet<string>): boolean {
  if (keyName !== combo.keyName) return false;
  for (const modifier of MODIFIER_ORDER) {
    const held = MODIFIER_KEY_NAMES[modifier].some(name => pressed.has(name));
    if (held !== combo.modifiers.has(modifier)) return false;
  }
  return true;
}

/**
 * Human-readable form, e.g. `Ctrl+Shift+Alt+Right`.
 */
export function formatCombo(combo: ParsedCombo): string {
  return combo.normalized
    .split('+')
    .map(part => (part.length === 1 ? part.toUpperCase() : part.charAt(0).toUpperCase() + part.slice(1)))
    .join('+');
}
