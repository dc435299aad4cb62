// Export all TUI components
export { ToastComponent, type ToastOptions, type ToastTone } from './toast.js';
export { HelpMenuComponent, type HelpMenuOptions, type GlobalHotkeyStatus } from './help-menu.js';
export { EditorComponent, type EditorComponentOptions } from './editor.js';
export { PreviewComponent, type PreviewComponentOptions } from './preview.js';
export { NavBarComponent, type NavBarComponentOptions } from './nav-bar.js';
export { SettingsDialogComponent, type SettingsDialogOptions } from './settings-dialog.js';
