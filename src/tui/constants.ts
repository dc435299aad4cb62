/**
 * Centralized TUI constants and shortcut definitions.
 *
 * Keep key lists here so the help overlay and the controller bindings cannot
 * drift apart.
 */

export interface ShortcutSection {
  category: string;
  items: Array<{ keys: string; description: string }>;
}

// Local (in-window) keys. These are always bound, whether or not a global
// hot-key backend is available.
export const KEY_NEXT = ['right'];
export const KEY_PREV = ['left'];
export const KEY_EDIT = ['e', 'enter'];
export const KEY_PASTE_APPEND = ['p'];
export const KEY_SETTINGS = ['s'];
export const KEY_TOGGLE_HELP = ['?'];
export const KEY_ESCAPE = ['escape'];
export const KEY_QUIT = ['q'];
// Arrives even while a text field holds the keyboard (see ignoreLocked)
export const KEY_FORCE_QUIT = ['C-c'];
export const KEY_MENU_CLOSE = ['escape', 'q'];

export const TOAST_DURATION_MS = 1200;

export const DEFAULT_SHORTCUTS: ShortcutSection[] = [
  {
    category: 'Cycling',
    items: [
      { keys: 'Right, ▶', description: 'Copy current line, then move to the next' },
      { keys: 'Left, ◀', description: 'Move to the previous line and copy it' },
    ],
  },
  {
    category: 'Editing',
    items: [
      { keys: 'e, Enter', description: 'Edit the item list' },
      { keys: 'Esc (while editing)', description: 'Stop editing' },
      { keys: 'p', description: 'Append clipboard contents as a new line' },
    ],
  },
  {
    category: 'Settings',
    items: [
      { keys: 's, ⚙', description: 'Edit global hot-keys' },
    ],
  },
  {
    category: 'Help',
    items: [
      { keys: '?', description: 'Toggle this help' },
    ],
  },
  {
    category: 'Exit',
    items: [
      { keys: 'q, Ctrl-C', description: 'Quit' },
    ],
  },
];
