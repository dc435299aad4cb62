import { describe, it, expect, afterEach } from 'vitest';
import { TuiController, type TuiControllerDeps, type TuiSession } from '../../src/tui/controller.js';
import { SettingsError } from '../../src/errors.js';
import { Logger } from '../../src/logger.js';
import type { ClipcycleSettings, HotkeyBindings } from '../../src/types.js';
import { FakeHotkeyBackend } from '../hotkeys/fake-backend.js';
import { MemoryClipboard } from '../test-utils.js';
import { createMockBlessed, type MockBlessed } from './mock-blessed.js';

const flush = () => new Promise<void>(resolve => setImmediate(resolve));

interface Harness {
  session: TuiSession;
  mock: MockBlessed;
  clipboard: MemoryClipboard;
  backend: FakeHotkeyBackend;
  saved: ClipcycleSettings[];
  logLines: string[];
  /** Run the hot-key tasks the UI context has deferred. */
  tick: () => void;
  press: (key: string) => void;
  stopEditing: () => void;
  toastText: () => string;
}

let active: TuiSession | null = null;

afterEach(() => {
  active?.shutdown();
  active = null;
});

async function startHarness(
  options: {
    text?: string;
    hotkeys?: HotkeyBindings;
    warnings?: SettingsError[];
    globalHotkeys?: boolean;
    deps?: Partial<TuiControllerDeps>;
  } = {}
): Promise<Harness> {
  const mock = createMockBlessed();
  const clipboard = new MemoryClipboard();
  const backend = new FakeHotkeyBackend();
  const saved: ClipcycleSettings[] = [];
  const logLines: string[] = [];
  const deferred: Array<() => void> = [];
  const logger = new Logger({ console: false, sink: line => logLines.push(line) });

  const controller = new TuiController(logger, {
    blessed: mock.factory,
    clipboard,
    loadBackend: async () => backend,
    loadSettings: () => ({
      settings: { hotkeys: { ...(options.hotkeys ?? { next: 'f7', prev: 'f8' }) } },
      warnings: options.warnings ?? [],
    }),
    saveSettings: settings => {
      saved.push({ hotkeys: { ...settings.hotkeys } });
      return '/cfg/config.yaml';
    },
    defer: fn => deferred.push(fn),
    pasteCombo: 'ctrl+v',
    ...options.deps,
  });

  const session = await controller.start({
    configDir: '/cfg',
    globalHotkeys: options.globalHotkeys,
    initialText: options.text ?? 'a\n\nb\nc',
  });
  active = session;

  return {
    session,
    mock,
    clipboard,
    backend,
    saved,
    logLines,
    tick: () => {
      for (const fn of deferred.splice(0)) fn();
    },
    press: key => {
      mock.screen().press(key);
    },
    stopEditing: () => {
      mock.get('textarea').cancelInput();
    },
    toastText: () => mock.get('box', { bottom: 4, right: 1 }).content,
  };
}

describe('TuiController', () => {
  it('starts in the editor with nothing selected', async () => {
    const h = await startHarness();

    expect(h.session.layout.editor.isEditing()).toBe(true);
    expect(h.session.layout.navBar.getLabel()).toBe('0 / 0');
    expect(h.mock.get('box', { label: ' Current ' }).content).toBe(
      '{grey-fg}1{/grey-fg} a\n{grey-fg}2{/grey-fg} \n{grey-fg}3{/grey-fg} b\n{grey-fg}4{/grey-fg} c'
    );
    expect(h.session.report().registered).toEqual([
      { action: 'next', combo: 'f7' },
      { action: 'prev', combo: 'f8' },
      { action: 'paste', combo: 'ctrl+v' },
    ]);
  });

  it('ignores the arrow keys while the editor has the keyboard', async () => {
    const h = await startHarness();

    h.press('right');
    expect(h.clipboard.writes).toEqual([]);

    h.stopEditing();
    h.press('right');
    expect(h.clipboard.writes).toEqual(['a']);
  });

  it('cycles with the arrow keys', async () => {
    const h = await startHarness();
    h.stopEditing();

    h.press('right');
    h.press('right');
    expect(h.clipboard.text).toBe('b');
    expect(h.session.layout.navBar.getLabel()).toBe('2 / 3');
    expect(h.session.layout.preview.getMarkedLine()).toBe(3);

    h.press('left');
    expect(h.clipboard.text).toBe('b');
    expect(h.session.cycler.getCursor()).toBe(1);
  });

  it('cycles with the on-screen buttons', async () => {
    const h = await startHarness();

    h.mock.get('button', { content: ' ▶ ' }).emit('press');
    expect(h.clipboard.text).toBe('a');
    h.mock.get('button', { content: ' ◀ ' }).emit('press');
    expect(h.clipboard.text).toBe('a');
    h.mock.get('button', { content: ' ◀ ' }).emit('press');
    expect(h.clipboard.text).toBe('c');
    expect(h.session.layout.navBar.getLabel()).toBe('3 / 3');
  });

  it('marshals global hot-keys onto the UI context', async () => {
    const h = await startHarness();

    h.backend.fire('f7');
    expect(h.clipboard.writes).toEqual([]);
    h.tick();
    expect(h.clipboard.writes).toEqual(['a']);

    h.backend.fire('ctrl+v');
    h.backend.fire('f8');
    h.tick();
    expect(h.clipboard.writes).toEqual(['a', 'b', 'b']);
  });

  it('picks up edits made between presses', async () => {
    const h = await startHarness();
    h.session.next();

    h.session.layout.editor.setText('x\ny\nz');
    h.session.next();

    expect(h.clipboard.text).toBe('y');
    expect(h.mock.get('box', { label: ' Current ' }).content.split('\n')[0]).toBe('{grey-fg}1{/grey-fg} x');
  });

  it('shows 0 / 0 and copies nothing for an empty list', async () => {
    const h = await startHarness({ text: '\n   \n' });

    h.session.next();
    h.session.prev();

    expect(h.session.layout.navBar.getLabel()).toBe('0 / 0');
    expect(h.clipboard.writes).toEqual([]);
  });

  it('warns when the clipboard write fails but still moves', async () => {
    const h = await startHarness();
    h.clipboard.failWrites = true;

    h.session.next();

    expect(h.toastText()).toBe(' Copy failed: clipboard locked ');
    expect(h.session.layout.navBar.getLabel()).toBe('1 / 3');
    expect(h.session.cycler.getCursor()).toBe(1);
  });

  it('appends the clipboard contents as a new line on p', async () => {
    const h = await startHarness({ text: 'a' });
    h.stopEditing();
    h.clipboard.text = 'pasted\n';

    h.press('p');

    expect(h.session.layout.editor.getText()).toBe('a\npasted');
    expect(h.toastText()).toBe(' Appended ');
    h.session.prev();
    expect(h.clipboard.text).toBe('pasted');
    expect(h.session.layout.navBar.getLabel()).toBe('2 / 2');
  });

  it('saves edited hot-keys and re-registers them', async () => {
    const h = await startHarness();
    h.stopEditing();

    h.press('s');
    expect(h.session.layout.settingsDialog.isOpen()).toBe(true);
    const [nextField, prevField] = h.mock.find('textbox');
    nextField.value = 'ctrl+alt+n';
    prevField.submitInput();
    await flush();

    expect(h.saved).toEqual([{ hotkeys: { next: 'ctrl+alt+n', prev: 'f8' } }]);
    expect(h.session.settings.hotkeys).toEqual({ next: 'ctrl+alt+n', prev: 'f8' });
    expect([...h.backend.registrations.keys()]).toEqual(['ctrl+alt+n', 'f8', 'ctrl+v']);
    expect(h.toastText()).toBe(' Hot-keys saved ');
  });

  it('reports a rejected combo from the settings dialog and keeps the rest', async () => {
    const h = await startHarness();

    h.mock.get('button', { content: ' ⚙ ' }).emit('press');
    const [nextField] = h.mock.find('textbox');
    nextField.value = 'bad!!combo';
    h.mock.get('box', { content: '[Save]' }).emit('click');
    await flush();

    expect([...h.backend.registrations.keys()]).toEqual(['f8', 'ctrl+v']);
    expect(h.toastText()).toBe(' Could not bind next to "bad!!combo": Invalid hot-key "bad!!combo": unknown key "bad!!combo" ');
    expect(h.session.report().errors).toHaveLength(1);
  });

  it('applies the bindings even when saving them fails', async () => {
    const h = await startHarness({
      deps: {
        saveSettings: () => {
          throw new SettingsError('/cfg/config.yaml', 'read-only file system');
        },
      },
    });

    h.mock.get('button', { content: ' ⚙ ' }).emit('press');
    h.mock.find('textbox')[1].value = 'f9';
    h.mock.get('box', { content: '[Save]' }).emit('click');
    await flush();

    expect([...h.backend.registrations.keys()]).toEqual(['f7', 'f9', 'ctrl+v']);
    expect(h.toastText()).toBe(' Settings file /cfg/config.yaml: read-only file system ');
  });

  it('leaves everything as it was when the dialog is cancelled', async () => {
    const h = await startHarness();

    h.mock.get('button', { content: ' ⚙ ' }).emit('press');
    h.mock.find('textbox')[0].value = 'f11';
    h.mock.find('textbox')[0].cancelInput();
    await flush();

    expect(h.saved).toEqual([]);
    expect([...h.backend.registrations.keys()]).toEqual(['f7', 'f8', 'ctrl+v']);
  });

  it('reports settings warnings and bad combos at startup without failing', async () => {
    const h = await startHarness({
      hotkeys: { next: 'bad!!combo', prev: 'ctrl+left' },
      warnings: [new SettingsError('/cfg/config.yaml', 'unknown hot-key action "paste" ignored')],
    });

    expect(h.toastText()).toBe(
      ' Settings file /cfg/config.yaml: unknown hot-key action "paste" ignored; ' +
        'Could not bind next to "bad!!combo": Invalid hot-key "bad!!combo": unknown key "bad!!combo" '
    );
    expect(h.session.report().registered.map(r => r.action)).toEqual(['prev', 'paste']);

    h.stopEditing();
    h.press('right');
    expect(h.clipboard.text).toBe('a');
  });

  it('falls back to in-window keys when global hot-keys are off', async () => {
    let loaded = false;
    const h = await startHarness({
      globalHotkeys: false,
      deps: {
        loadBackend: async () => {
          loaded = true;
          return null;
        },
      },
    });

    expect(loaded).toBe(false);
    expect(h.session.dispatcher.isAvailable()).toBe(false);
    expect(h.mock.get('box', { label: ' Help ' }).content).toContain('(not available on this host; in-window keys only)');

    h.stopEditing();
    h.press('right');
    expect(h.clipboard.text).toBe('a');
  });

  it('toggles help and blocks navigation and quit while it is open', async () => {
    const h = await startHarness();
    h.stopEditing();

    h.press('?');
    expect(h.session.layout.helpMenu.isVisible()).toBe(true);
    h.press('right');
    h.press('q');
    expect(h.clipboard.writes).toEqual([]);
    expect(h.mock.screen().destroyed).toBe(false);

    h.press('escape');
    expect(h.session.layout.helpMenu.isVisible()).toBe(false);
  });

  it('shuts down on q and tears down the hot-keys', async () => {
    const h = await startHarness();
    h.stopEditing();

    h.press('q');
    await h.session.closed;

    expect(h.mock.screen().destroyed).toBe(true);
    expect(h.backend.disposed).toBe(true);
    expect(h.backend.registrations.size).toBe(0);
    expect(h.logLines[h.logLines.length - 1]).toMatch(/ INFO \[tui\] closed$/);
  });

  it('quits on Ctrl-C even while editing', async () => {
    const h = await startHarness();

    h.press('q');
    expect(h.mock.screen().destroyed).toBe(false);

    h.press('C-c');
    await h.session.closed;
    expect(h.mock.screen().destroyed).toBe(true);
  });

  it('drops hot-key tasks that arrive after shutdown', async () => {
    const h = await startHarness();
    h.backend.fire('f7');

    h.session.shutdown();
    h.tick();

    expect(h.clipboard.writes).toEqual([]);
  });
});
