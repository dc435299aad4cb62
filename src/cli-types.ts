// Per-command CLI option interfaces and the shared command context
import type { Command } from 'commander';
import type { Logger } from './logger.js';

/** Options declared on the root program; available to every command. */
export interface GlobalOptions {
  configDir?: string;
  globalHotkeys: boolean;
  logFile?: string;
  verbose?: boolean;
  json?: boolean;
}

/**
 * Shared context passed to every command's register function
 */
export interface CommandContext {
  program: Command;
  version: string;
  logger: Logger;

  output: {
    json: (data: unknown) => void;
    /** Plain message, or `jsonData` (default `{ success: true, message }`) in JSON mode. */
    success: (message: string, jsonData?: unknown) => void;
    error: (message: string, jsonData?: unknown) => void;
    warn: (message: string) => void;
  };

  utils: {
    globalOptions: () => GlobalOptions;
    isJsonMode: () => boolean;
    /** Resolved settings directory: `--config-dir` or the per-user default. */
    configDir: () => string;
    exit: (code: number) => void;
  };
}

export type RegisterCommandFn = (ctx: CommandContext) => void;
