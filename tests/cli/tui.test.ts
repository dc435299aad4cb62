import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { createTuiCommand } from '../../src/commands/tui.js';
import { FakeHotkeyBackend } from '../hotkeys/fake-backend.js';
import { createMockBlessed, type MockBlessed } from '../tui/mock-blessed.js';
import { cleanupTempDir, createTempDir, MemoryClipboard } from '../test-utils.js';
import { runInProcess } from './cli-inproc.js';

describe('tui command', () => {
  let dir: string;
  let mock: MockBlessed;
  let backend: FakeHotkeyBackend;
  let backendLoads: number;

  beforeEach(() => {
    dir = createTempDir();
    mock = createMockBlessed();
    backend = new FakeHotkeyBackend();
    backendLoads = 0;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    cleanupTempDir(dir);
  });

  const tuiCommand = () =>
    createTuiCommand({
      blessed: mock.factory,
      clipboard: new MemoryClipboard(),
      loadBackend: async () => {
        backendLoads += 1;
        return backend;
      },
      pasteCombo: null,
    });

  it('runs by default and exits cleanly when the UI closes', async () => {
    const run = runInProcess(['--config-dir', dir], { commands: [tuiCommand()] });
    await vi.waitFor(() => {
      expect([...backend.registrations.keys()]).toEqual(['ctrl+shift+alt+right', 'ctrl+shift+alt+left']);
    });
    expect(backendLoads).toBe(1);

    mock.screen().press('C-c');
    const result = await run;

    expect(result.exitCode).toBe(0);
    expect(backend.disposed).toBe(true);
    const log = fs.readFileSync(path.join(dir, 'logs', 'clipcycle.log'), 'utf8').trim().split('\n');
    expect(log[0]).toContain(` INFO clipcycle 0.1.0 starting (config dir ${dir})`);
    expect(log[log.length - 1]).toMatch(/ INFO \[tui\] closed$/);
  });

  it('skips the global hot-key backend and logs where asked', async () => {
    const logFile = path.join(dir, 'custom.log');
    const run = runInProcess(['--config-dir', dir, '--no-global-hotkeys', '--log-file', logFile], {
      commands: [tuiCommand()],
    });
    await vi.waitFor(() => mock.screen());

    mock.screen().press('C-c');
    const result = await run;

    expect(result.exitCode).toBe(0);
    expect(backendLoads).toBe(0);
    expect(fs.readFileSync(logFile, 'utf8')).toContain('global hot-keys unavailable; using in-window keys only');
    expect(fs.existsSync(path.join(dir, 'logs'))).toBe(false);
  });

  it('exits with 1 when the UI cannot start', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const failing = createTuiCommand({
      createLayout: () => {
        throw new Error('no terminal');
      },
      loadBackend: async () => null,
    });

    const result = await runInProcess(['--config-dir', dir], { commands: [failing] });

    expect(result.exitCode).toBe(1);
    expect(console.error).toHaveBeenCalledWith('could not start the terminal UI: no terminal');
  });
});
