import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { EditorComponent } from '../../src/tui/components/editor.js';
import { formatHelpContent, HelpMenuComponent } from '../../src/tui/components/help-menu.js';
import { NavBarComponent } from '../../src/tui/components/nav-bar.js';
import { escapeTags, formatPreview, PreviewComponent } from '../../src/tui/components/preview.js';
import { ToastComponent } from '../../src/tui/components/toast.js';
import type { BlessedScreen } from '../../src/tui/types.js';
import { createMockBlessed, type MockBlessed } from './mock-blessed.js';

let mock: MockBlessed;
let screen: BlessedScreen;

beforeEach(() => {
  mock = createMockBlessed();
  screen = mock.factory.screen();
});

describe('formatPreview', () => {
  it('numbers every line and marks one', () => {
    expect(formatPreview(['a', 'b'], 2)).toBe(
      '{grey-fg}1{/grey-fg} a\n{grey-fg}2{/grey-fg} {black-fg}{yellow-bg}b{/yellow-bg}{/black-fg}'
    );
  });

  it('pads the gutter to the widest line number', () => {
    const lines = Array.from({ length: 10 }, (_, i) => `l${i + 1}`);
    const rendered = formatPreview(lines, null).split('\n');
    expect(rendered[0]).toBe('{grey-fg} 1{/grey-fg} l1');
    expect(rendered[9]).toBe('{grey-fg}10{/grey-fg} l10');
  });

  it('renders braces in user text literally', () => {
    expect(escapeTags('{bold}x{/bold}')).toBe('{open}bold{close}x{open}/bold{close}');
    expect(formatPreview(['{red-fg}'], null)).toBe('{grey-fg}1{/grey-fg} {open}red-fg{close}');
  });
});

describe('PreviewComponent', () => {
  it('marks, scrolls to and clears a line', () => {
    const preview = new PreviewComponent({ parent: screen, blessed: mock.factory });
    const box = mock.get('box', { label: ' Current ' });

    preview.setText('a\n\nb');
    preview.markLine(3);
    preview.scrollToLine(3);

    expect(preview.getMarkedLine()).toBe(3);
    expect(box.content.split('\n')[2]).toBe('{grey-fg}3{/grey-fg} {black-fg}{yellow-bg}b{/yellow-bg}{/black-fg}');
    expect(box.scrollTarget).toBe(2);

    preview.clearMarks();
    expect(preview.getMarkedLine()).toBeNull();
    expect(box.content).not.toContain('yellow-bg');
  });

  it('drops a mark past the end when the text shrinks', () => {
    const preview = new PreviewComponent({ parent: screen, blessed: mock.factory });
    preview.setText('a\nb\nc');
    preview.markLine(3);

    preview.setText('a');
    expect(preview.getMarkedLine()).toBeNull();

    preview.setText('');
    expect(mock.get('box', { label: ' Current ' }).content).toBe('');
  });
});

describe('EditorComponent', () => {
  it('tracks editing from focus to cancel', () => {
    const editor = new EditorComponent({ parent: screen, blessed: mock.factory });
    const textarea = mock.get('textarea');

    expect(editor.isEditing()).toBe(false);
    editor.focus();
    expect(editor.isEditing()).toBe(true);

    textarea.cancelInput();
    expect(editor.isEditing()).toBe(false);
  });

  it('restarts input when focused again after Escape', () => {
    const editor = new EditorComponent({ parent: screen, blessed: mock.factory });
    const textarea = mock.get('textarea');

    editor.focus();
    textarea.cancelInput();
    expect(textarea.reading).toBe(false);

    editor.focus();
    expect(editor.isEditing()).toBe(true);
    expect(textarea.reading).toBe(true);
  });

  it('appends a line, adding a line break only when needed', () => {
    const editor = new EditorComponent({ parent: screen, blessed: mock.factory });

    editor.appendLine('first');
    expect(editor.getText()).toBe('first');
    editor.appendLine('second');
    expect(editor.getText()).toBe('first\nsecond');

    editor.setText('x\n');
    editor.appendLine('y');
    expect(editor.getText()).toBe('x\ny');
  });
});

describe('NavBarComponent', () => {
  it('starts at 0 / 0 and forwards button presses', () => {
    const navBar = new NavBarComponent({ parent: screen, blessed: mock.factory });
    const pressed: string[] = [];
    navBar.onPrev(() => pressed.push('prev'));
    navBar.onNext(() => pressed.push('next'));
    navBar.onSettings(() => pressed.push('settings'));

    expect(navBar.getLabel()).toBe('0 / 0');
    expect(mock.get('box', { align: 'center' }).content).toBe('0 / 0');

    mock.get('button', { content: ' ◀ ' }).emit('press');
    mock.get('button', { content: ' ▶ ' }).emit('press');
    mock.get('button', { content: ' ⚙ ' }).emit('press');
    expect(pressed).toEqual(['prev', 'next', 'settings']);

    navBar.setLabel('2 / 5');
    expect(mock.get('box', { align: 'center' }).content).toBe('2 / 5');
  });
});

describe('ToastComponent', () => {
  let toast: ToastComponent;

  afterEach(() => {
    toast.destroy();
  });

  it('shows info and warnings in different colours', () => {
    toast = new ToastComponent({ parent: screen, blessed: mock.factory, duration: 1000 });
    const box = mock.get('box');

    toast.show('Copied');
    expect(box.hidden).toBe(false);
    expect(box.content).toBe(' Copied ');
    expect(box.width).toBe(8);
    expect(box.style).toMatchObject({ fg: 'black', bg: 'green' });

    toast.show('Paste failed', 'warn');
    expect(box.style).toMatchObject({ fg: 'white', bg: 'red' });

    toast.hide();
    expect(box.hidden).toBe(true);
  });
});

describe('help content', () => {
  const shortcuts = [{ category: 'Cycling', items: [{ keys: 'Right', description: 'Next' }] }];

  it('lists the local shortcuts', () => {
    expect(formatHelpContent(shortcuts, null)).toBe(
      ['Keyboard shortcuts', '', 'Cycling:', `  ${'Right'.padEnd(25)}Next`, ''].join('\n')
    );
  });

  it('describes the global hot-key state', () => {
    expect(formatHelpContent(shortcuts, { available: false, registered: [] }).split('\n').slice(-2)).toEqual([
      'Global hot-keys:',
      '  (not available on this host; in-window keys only)',
    ]);
    expect(formatHelpContent(shortcuts, { available: true, registered: [] }).split('\n').slice(-1)).toEqual([
      '  (none registered)',
    ]);
    expect(
      formatHelpContent(shortcuts, {
        available: true,
        registered: [
          { action: 'prev', combo: 'ctrl+left' },
          { action: 'paste', combo: 'ctrl+v' },
        ],
      })
        .split('\n')
        .slice(-2)
    ).toEqual([`  ${'ctrl+left'.padEnd(25)}prev`, `  ${'ctrl+v'.padEnd(25)}paste`]);
  });

  it('toggles the overlay and closes on Escape', () => {
    const help = new HelpMenuComponent({ parent: screen, blessed: mock.factory });
    const menu = mock.get('box', { label: ' Help ' });

    help.toggle();
    expect(help.isVisible()).toBe(true);

    menu.press('escape');
    expect(help.isVisible()).toBe(false);
    expect(menu.hidden).toBe(true);

    help.setGlobalStatus({ available: true, registered: [{ action: 'next', combo: 'f7' }] });
    expect(menu.content.split('\n').slice(-1)).toEqual([`  ${'f7'.padEnd(25)}next`]);
  });
});
