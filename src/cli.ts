#!/usr/bin/env node
/**
 * Command-line interface for clipcycle
 */

import { createCommandContext, createProgram, readGlobalOptions } from './cli-utils.js';
import { describeError } from './errors.js';
import { Logger } from './logger.js';
import type { RegisterCommandFn } from './cli-types.js';

import tuiCommand from './commands/tui.js';
import hotkeysCommand from './commands/hotkeys.js';

const builtInCommands: RegisterCommandFn[] = [tuiCommand, hotkeysCommand];

const program = createProgram();
const logger = new Logger();
const ctx = createCommandContext(program, { logger });

program.hook('preAction', () => {
  logger.setVerbose(readGlobalOptions(program).verbose === true);
});

for (const register of builtInCommands) {
  register(ctx);
}

program.parseAsync(process.argv).catch(err => {
  ctx.output.error(describeError(err));
  process.exit(1);
});
