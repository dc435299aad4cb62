/**
 * Clipboard bridge backed by the platform's command-line clipboard tools.
 *
 * Failures are returned, never thrown: a clipboard locked by another process
 * must not stop the cycler from moving and highlighting.
 */

import { spawnSync, type SpawnSyncOptionsWithStringEncoding, type SpawnSyncReturns } from 'child_process';
import type { OperationResult } from './types.js';

export interface ClipboardReadResult extends OperationResult {
  text?: string;
}

export interface ClipboardCapability {
  read(): ClipboardReadResult;
  write(text: string): OperationResult;
}

export type SpawnRunner = (
  command: string,
  args: string[],
  options: SpawnSyncOptionsWithStringEncoding,
) => SpawnSyncReturns<string>;

interface ClipboardCommand {
  command: string;
  args: string[];
}

export interface SystemClipboardOptions {
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
  run?: SpawnRunner;
  timeoutMs?: number;
}

const defaultRunner: SpawnRunner = (command, args, options) => spawnSync(command, args, options);

export function writeCommandsFor(platform: NodeJS.Platform, env: NodeJS.ProcessEnv): ClipboardCommand[] {
  if (platform === 'darwin') return [{ command: 'pbcopy', args: [] }];
  if (platform === 'win32') return [{ command: 'cmd', args: ['/c', 'clip'] }];
  const commands: ClipboardCommand[] = [];
  if (env.WAYLAND_DISPLAY) commands.push({ command: 'wl-copy', args: [] });
  commands.push({ command: 'xclip', args: ['-selection', 'clipboard'] });
  commands.push({ command: 'xsel', args: ['--clipboard', '--input'] });
  return commands;
}

export function readCommandsFor(platform: NodeJS.Platform, env: NodeJS.ProcessEnv): ClipboardCommand[] {
  if (platform === 'darwin') return [{ command: 'pbpaste', args: [] }];
  if (platform === 'win32') return [{ command: 'powershell', args: ['-NoProfile', '-Command', 'Get-Clipboard'] }];
  const commands: ClipboardCommand[] = [];
  if (env.WAYLAND_DISPLAY) commands.push({ command: 'wl-paste', args: ['--no-newline'] });
  commands.push({ command: 'xclip', args: ['-selection', 'clipboard', '-o'] });
  commands.push({ command: 'xsel', args: ['--clipboard', '--output'] });
  return commands;
}

function failureReason(cmd: ClipboardCommand, result: SpawnSyncReturns<string>): string {
  if (result.error) return `${cmd.command}: ${result.error.message}`;
  if (result.signal) return `${cmd.command}: killed by ${result.signal}`;
  return `${cmd.command}: exit status ${String(result.status)}`;
}

export class SystemClipboard implements ClipboardCapability {
  private readonly platform: NodeJS.Platform;
  private readonly env: NodeJS.ProcessEnv;
  private readonly run: SpawnRunner;
  private readonly timeoutMs: number;

  constructor(opts: SystemClipboardOptions = {}) {
    this.platform = opts.platform ?? process.platform;
    this.env = opts.env ?? process.env;
    this.run = opts.run ?? defaultRunner;
    this.timeoutMs = opts.timeoutMs ?? 2000;
  }

  write(text: string): OperationResult {
    const failures: string[] = [];
    for (const cmd of writeCommandsFor(this.platform, this.env)) {
      // xclip keeps its stdout open while it owns the selection, so output is ignored
      const result = this.run(cmd.command, cmd.args, {
        input: text,
        encoding: 'utf8',
        stdio: ['pipe', 'ignore', 'ignore'],
        timeout: this.timeoutMs,
      });
      if (result.status === 0 && !result.error) return { success: true };
      failures.push(failureReason(cmd, result));
    }
    return { success: false, error: failures.join('; ') || 'no clipboard command available' };
  }

  read(): ClipboardReadResult {
    const failures: string[] = [];
    for (const cmd of readCommandsFor(this.platform, this.env)) {
      const result = this.run(cmd.command, cmd.args, {
        encoding: 'utf8',
        stdio: ['ignore', 'pipe', 'ignore'],
        timeout: this.timeoutMs,
      });
      if (result.status === 0 && !result.error) {
        const text = result.stdout ?? '';
        // Get-Clipboard terminates its output with CRLF
        return { success: true, text: this.platform === 'win32' ? text.replace(/\r?\n$/, '') : text };
      }
      failures.push(failureReason(cmd, result));
    }
    return { success: false, error: failures.join('; ') || 'no clipboard command available' };
  }
}
