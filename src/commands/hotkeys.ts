/**
 * Hotkeys command - inspect and change the global hot-key bindings without the TUI
 */

import chalk from 'chalk';
import type { CommandContext } from '../cli-types.js';
import { DEFAULT_HOTKEYS, getConfigPath, loadSettings, saveSettings } from '../config.js';
import { describeError } from '../errors.js';
import { formatCombo, parseCombo } from '../hotkeys/combo.js';
import { HOTKEY_ACTIONS, isHotkeyAction, type HotkeyAction, type HotkeyBindings } from '../types.js';

const ACTION_LABELS: Record<HotkeyAction, string> = {
  next: 'Next item',
  prev: 'Previous item',
};

function describeBinding(action: HotkeyAction, combo: string): string {
  const label = `${ACTION_LABELS[action]} (${action})`.padEnd(22);
  try {
    return `  ${label}${chalk.cyan(formatCombo(parseCombo(combo)))}`;
  } catch (err) {
    return `  ${label}${chalk.red(combo)}  ${chalk.red(describeError(err))}`;
  }
}

function printBindings(ctx: CommandContext, bindings: HotkeyBindings, configPath: string): void {
  ctx.output.success(
    ['Global hot-keys', ...HOTKEY_ACTIONS.map(action => describeBinding(action, bindings[action])), '', chalk.gray(configPath)].join('\n')
  );
}

export default function register(ctx: CommandContext): void {
  const { program, output, utils } = ctx;

  const hotkeys = program
    .command('hotkeys')
    .description('Inspect or change the global hot-key bindings');

  hotkeys
    .command('show')
    .description('Show the effective bindings')
    .action(() => {
      const configDir = utils.configDir();
      const configPath = getConfigPath({ configDir });
      const { settings, warnings } = loadSettings({ configDir });
      for (const warning of warnings) output.warn(warning.message);

      if (utils.isJsonMode()) {
        output.json({
          success: true,
          configPath,
          hotkeys: settings.hotkeys,
          warnings: warnings.map(w => w.message),
        });
        return;
      }
      printBindings(ctx, settings.hotkeys, configPath);
    });

  hotkeys
    .command('set <action> <combo>')
    .description(`Bind an action (${HOTKEY_ACTIONS.join(' | ')}) to a combo such as ctrl+alt+right`)
    .action((action: string, combo: string) => {
      if (!isHotkeyAction(action)) {
        output.error(`Unknown action "${action}"; expected one of: ${HOTKEY_ACTIONS.join(', ')}`);
        utils.exit(1);
        return;
      }

      let normalized: string;
      let display: string;
      try {
        const parsed = parseCombo(combo);
        normalized = parsed.normalized;
        display = formatCombo(parsed);
      } catch (err) {
        output.error(describeError(err));
        utils.exit(1);
        return;
      }

      const configDir = utils.configDir();
      const { settings, warnings } = loadSettings({ configDir });
      for (const warning of warnings) output.warn(warning.message);
      settings.hotkeys[action] = normalized;

      let configPath: string;
      try {
        configPath = saveSettings(settings, { configDir });
      } catch (err) {
        output.error(describeError(err));
        utils.exit(1);
        return;
      }

      ctx.logger.debug(`hotkeys.${action} = ${normalized} (${configPath})`);
      output.success(`${ACTION_LABELS[action]} bound to ${display}`, {
        success: true,
        action,
        combo: normalized,
        configPath,
      });
    });

  hotkeys
    .command('reset')
    .description('Restore the default bindings')
    .action(() => {
      const configDir = utils.configDir();
      const defaults: HotkeyBindings = { ...DEFAULT_HOTKEYS };

      let configPath: string;
      try {
        configPath = saveSettings({ hotkeys: defaults }, { configDir });
      } catch (err) {
        output.error(describeError(err));
        utils.exit(1);
        return;
      }

      if (utils.isJsonMode()) {
        output.json({ success: true, configPath, hotkeys: defaults });
        return;
      }
      printBindings(ctx, defaults, configPath);
    });
}
