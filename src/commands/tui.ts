/**
 * TUI command - the interactive cycler. Runs when no other command is given.
 */

import * as path from 'path';
import type { CommandContext } from '../cli-types.js';
import { describeError } from '../errors.js';
import { createLogFileWriter, getDefaultLogPath } from '../logging.js';
import { TuiController, type TuiControllerDeps, type TuiSession } from '../tui/controller.js';

export function createTuiCommand(deps: TuiControllerDeps = {}) {
  return function register(ctx: CommandContext): void {
    const { program, output, utils, logger } = ctx;

    program
      .command('tui', { isDefault: true })
      .description('Open the terminal UI (default)')
      .action(async () => {
        const opts = utils.globalOptions();
        const configDir = utils.configDir();
        const logPath = opts.logFile ? path.resolve(opts.logFile) : getDefaultLogPath(configDir);
        const writer = createLogFileWriter(logPath);
        const writerError = writer.lastError();
        if (writerError) output.warn(writerError);

        // blessed owns the terminal from here on
        logger.setConsole(false);
        logger.setSink(writer.write);
        logger.info(`clipcycle ${ctx.version} starting (config dir ${configDir})`);

        const controller = new TuiController(logger, deps);
        let session: TuiSession;
        try {
          session = await controller.start({ configDir, globalHotkeys: opts.globalHotkeys });
        } catch (err) {
          logger.setConsole(true);
          logger.error(`could not start the terminal UI: ${describeError(err)}`);
          utils.exit(1);
          return;
        }

        const onSignal = () => session.shutdown();
        process.once('SIGINT', onSignal);
        process.once('SIGTERM', onSignal);
        await session.closed;
        process.off('SIGINT', onSignal);
        process.off('SIGTERM', onSignal);

        logger.setSink(null);
        logger.setConsole(true);
        utils.exit(0);
      });
  };
}

export default createTuiCommand();
