// Common types for TUI components
import type { Widgets } from 'blessed';

export type BlessedScreen = Widgets.Screen;
export type BlessedBox = Widgets.BoxElement;
export type BlessedButton = Widgets.ButtonElement;
export type BlessedTextarea = Widgets.TextareaElement;
export type BlessedTextbox = Widgets.TextboxElement;

/**
 * The slice of the blessed module the TUI builds widgets with. Tests pass a
 * mock with the same shape.
 */
export interface BlessedFactory {
  screen: (options?: Widgets.IScreenOptions) => Widgets.Screen;
  box: (options?: Widgets.BoxOptions) => Widgets.BoxElement;
  button: (options?: Widgets.ButtonOptions) => Widgets.ButtonElement;
  textarea: (options?: Widgets.TextareaOptions) => Widgets.TextareaElement;
  textbox: (options?: Widgets.TextboxOptions) => Widgets.TextboxElement;
}

export interface TuiComponentLifecycle {
  create(): this;
  show(): void;
  hide(): void;
  focus(): void;
  destroy(): void;
}
