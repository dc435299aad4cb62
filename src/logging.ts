/**
 * Simple log file helpers with rotation.
 */

import * as fs from 'fs';
import * as path from 'path';
import { resolveConfigDir } from './config-paths.js';

export const LOG_ROTATE_BYTES = 5 * 1024 * 1024;
export const DEFAULT_LOG_FILE = 'clipcycle.log';

export function getDefaultLogPath(configDir: string = resolveConfigDir()): string {
  return path.join(configDir, 'logs', DEFAULT_LOG_FILE);
}

/**
 * Shift `file` to `file.1` and `file.1` to `file.2` once it reaches `limitBytes`.
 * Returns an error message instead of throwing; logging must never break the UI.
 */
export function rotateLogFile(logPath: string, limitBytes: number = LOG_ROTATE_BYTES): string | null {
  try {
    if (!fs.existsSync(logPath)) return null;
    const stats = fs.statSync(logPath);
    if (stats.size < limitBytes) return null;

    const first = `${logPath}.1`;
    const second = `${logPath}.2`;

    if (fs.existsSync(second)) {
      fs.rmSync(second, { force: true });
    }
    if (fs.existsSync(first)) {
      fs.renameSync(first, second);
    }
    fs.renameSync(logPath, first);
    return null;
  } catch (err) {
    return `log rotation failed for ${logPath}: ${String(err)}`;
  }
}

export interface LogFileWriter {
  write: (line: string) => void;
  /** Last write or rotation failure, if any. */
  lastError: () => string | null;
}

export function createLogFileWriter(logPath: string, limitBytes: number = LOG_ROTATE_BYTES): LogFileWriter {
  let lastError: string | null = null;
  try {
    fs.mkdirSync(path.dirname(logPath), { recursive: true });
  } catch (err) {
    lastError = `cannot create log directory: ${String(err)}`;
  }
  lastError = rotateLogFile(logPath, limitBytes) ?? lastError;
  return {
    write: (line: string) => {
      try {
        fs.appendFileSync(logPath, `${line}\n`, 'utf8');
      } catch (err) {
        lastError = String(err);
      }
    },
    lastError: () => lastError,
  };
}
