/**
 * Settings bridge: loads and saves the global hot-key bindings.
 *
 * Built-in defaults are overlaid with `config.defaults.yaml` and then the
 * user's `config.yaml`. A missing file is silent; a malformed one produces a
 * warning and leaves the previous layer in effect, so startup never fails
 * because of settings.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { resolveConfigDir } from './config-paths.js';
import { SettingsError } from './errors.js';
import { HOTKEY_ACTIONS, isHotkeyAction, type ClipcycleSettings, type HotkeyBindings } from './types.js';

export const CONFIG_FILE = 'config.yaml';
export const CONFIG_DEFAULTS_FILE = 'config.defaults.yaml';

export const DEFAULT_HOTKEYS: Readonly<HotkeyBindings> = {
  next: 'ctrl+shift+alt+right',
  prev: 'ctrl+shift+alt+left',
};

export interface SettingsLocation {
  /** Directory holding the settings files. Defaults to the per-user config dir. */
  configDir?: string;
}

export interface SettingsLoadResult {
  settings: ClipcycleSettings;
  warnings: SettingsError[];
}

/**
 * Get the path to the config file
 */
export function getConfigPath(opts: SettingsLocation = {}): string {
  return path.join(opts.configDir ?? resolveConfigDir(), CONFIG_FILE);
}

/**
 * Get the path to the config defaults file
 */
export function getConfigDefaultsPath(opts: SettingsLocation = {}): string {
  return path.join(opts.configDir ?? resolveConfigDir(), CONFIG_DEFAULTS_FILE);
}

export function defaultSettings(): ClipcycleSettings {
  return { hotkeys: { ...DEFAULT_HOTKEYS } };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readHotkeyLayer(filePath: string, warnings: SettingsError[]): Partial<HotkeyBindings> {
  if (!fs.existsSync(filePath)) return {};

  let doc: unknown;
  try {
    doc = yaml.load(fs.readFileSync(filePath, 'utf-8'), { schema: yaml.CORE_SCHEMA });
  } catch (err) {
    warnings.push(new SettingsError(filePath, err));
    return {};
  }

  // empty file
  if (doc === undefined || doc === null) return {};
  if (!isRecord(doc)) {
    warnings.push(new SettingsError(filePath, 'expected a mapping at the top level'));
    return {};
  }

  const hotkeys = doc.hotkeys;
  if (hotkeys === undefined || hotkeys === null) return {};
  if (!isRecord(hotkeys)) {
    warnings.push(new SettingsError(filePath, 'hotkeys must be a mapping of action to combo'));
    return {};
  }

  const layer: Partial<HotkeyBindings> = {};
  for (const key of Object.keys(hotkeys)) {
    if (!isHotkeyAction(key)) {
      warnings.push(new SettingsError(filePath, `unknown hot-key action "${key}" ignored`));
      continue;
    }
    const combo = hotkeys[key];
    if (typeof combo !== 'string' || !combo.trim()) {
      warnings.push(new SettingsError(filePath, `hotkeys.${key} must be a non-empty string`));
      continue;
    }
    layer[key] = combo.trim();
  }
  return layer;
}

/**
 * Load settings. Never throws; problems come back as `warnings`.
 */
export function loadSettings(opts: SettingsLocation = {}): SettingsLoadResult {
  const warnings: SettingsError[] = [];
  const settings = defaultSettings();

  for (const filePath of [getConfigDefaultsPath(opts), getConfigPath(opts)]) {
    Object.assign(settings.hotkeys, readHotkeyLayer(filePath, warnings));
  }

  return { settings, warnings };
}

/**
 * Save settings to the user config file, creating the directory when needed.
 * Keys other than `hotkeys` already present in the file are kept.
 */
export function saveSettings(settings: ClipcycleSettings, opts: SettingsLocation = {}): string {
  const configPath = getConfigPath(opts);
  try {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });

    let existing: Record<string, unknown> = {};
    if (fs.existsSync(configPath)) {
      try {
        const doc = yaml.load(fs.readFileSync(configPath, 'utf-8'), { schema: yaml.CORE_SCHEMA });
        if (isRecord(doc)) existing = doc;
      } catch {
        // a corrupt file is replaced wholesale
        existing = {};
      }
    }

    const hotkeys: Record<string, string> = {};
    for (const action of HOTKEY_ACTIONS) hotkeys[action] = settings.hotkeys[action];
    const content = yaml.dump({ ...existing, hotkeys });
    fs.writeFileSync(configPath, content, 'utf-8');
  } catch (err) {
    throw new SettingsError(configPath, err);
  }
  return configPath;
}
