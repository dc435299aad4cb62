/**
 * Shared CLI utilities and context factory
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as path from 'path';
import { resolveConfigDir } from './config-paths.js';
import { Logger } from './logger.js';
import type { CommandContext, GlobalOptions } from './cli-types.js';

export const CLIPCYCLE_VERSION = '0.1.0';

export interface CommandContextDeps {
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
  exit?: (code: number) => void;
}

export function readGlobalOptions(program: Command): GlobalOptions {
  const opts = program.opts();
  return {
    configDir: typeof opts.configDir === 'string' ? opts.configDir : undefined,
    globalHotkeys: opts.globalHotkeys !== false,
    logFile: typeof opts.logFile === 'string' ? opts.logFile : undefined,
    verbose: opts.verbose === true,
    json: opts.json === true,
  };
}

/**
 * Output formatting helpers
 */
export function createOutputHelpers(
  program: Command,
  stdout: (text: string) => void = text => console.log(text),
  stderr: (text: string) => void = text => console.error(text)
): CommandContext['output'] {
  const isJsonMode = () => readGlobalOptions(program).json === true;
  return {
    json: data => {
      stdout(JSON.stringify(data, null, 2));
    },

    success: (message, jsonData) => {
      if (isJsonMode()) {
        stdout(JSON.stringify(jsonData ?? { success: true, message }, null, 2));
      } else {
        stdout(message);
      }
    },

    error: (message, jsonData) => {
      if (isJsonMode()) {
        stderr(JSON.stringify(jsonData ?? { success: false, error: message }, null, 2));
      } else {
        stderr(chalk.red(message));
      }
    },

    // warnings stay human-readable in JSON mode; they go to stderr
    warn: message => {
      stderr(chalk.yellow(`warning: ${message}`));
    },
  };
}

/**
 * Create the context handed to each command's register function
 */
export function createCommandContext(program: Command, deps: CommandContextDeps = {}): CommandContext {
  const env = deps.env ?? process.env;
  return {
    program,
    version: CLIPCYCLE_VERSION,
    logger: deps.logger ?? new Logger(),
    output: createOutputHelpers(program, deps.stdout, deps.stderr),
    utils: {
      globalOptions: () => readGlobalOptions(program),
      isJsonMode: () => readGlobalOptions(program).json === true,
      configDir: () => {
        const { configDir } = readGlobalOptions(program);
        return configDir ? path.resolve(configDir) : resolveConfigDir({ env });
      },
      exit: deps.exit ?? (code => process.exit(code)),
    },
  };
}

/**
 * Root program with the options every command shares
 */
export function createProgram(): Command {
  return new Command()
    .name('clipcycle')
    .description('Cycle the lines of a text list onto the clipboard, one per hot-key press')
    .version(CLIPCYCLE_VERSION)
    .option('--config-dir <dir>', 'Directory holding config.yaml (default: per-user config dir)')
    .option('--no-global-hotkeys', 'Do not register system-wide hot-keys; in-window keys only')
    .option('--log-file <path>', 'Write the TUI log here (default: <config dir>/logs/clipcycle.log)')
    .option('--verbose', 'Include debug messages in the log')
    .option('--json', 'Output in JSON format (machine-readable)');
}
