/**
 * Small centralized logger helper to standardize debug/info/warn/error output.
 * Respects verbose semantics. While the terminal UI owns the screen, console
 * output is switched off and lines are routed to a file sink instead.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LoggerOptions = {
  verbose?: boolean; // emit debug messages
  console?: boolean; // write to stdout/stderr (default true)
  sink?: (line: string) => void; // receives every emitted line, timestamped
};

export class Logger {
  private verbose: boolean;
  private consoleEnabled: boolean;
  private sink: ((line: string) => void) | null;

  constructor(opts: LoggerOptions = {}, private readonly parent: Logger | null = null, private readonly scope: string | null = null) {
    this.verbose = !!opts.verbose;
    this.consoleEnabled = opts.console !== false;
    this.sink = opts.sink ?? null;
  }

  /**
   * Logger whose messages are prefixed with `[scope]` and routed through this one.
   */
  child(scope: string): Logger {
    return new Logger({ verbose: this.verbose }, this, scope);
  }

  setVerbose(enabled: boolean): void {
    this.verbose = enabled;
  }

  setConsole(enabled: boolean): void {
    this.consoleEnabled = enabled;
  }

  setSink(sink: ((line: string) => void) | null): void {
    this.sink = sink;
  }

  isVerbose(): boolean {
    return this.parent ? this.parent.isVerbose() : this.verbose;
  }

  debug(message: string): void {
    if (!this.isVerbose()) return;
    this.emit('debug', message);
  }

  info(message: string): void {
    this.emit('info', message);
  }

  warn(message: string): void {
    this.emit('warn', message);
  }

  error(message: string): void {
    this.emit('error', message);
  }

  private emit(level: LogLevel, message: string): void {
    const text = this.scope ? `[${this.scope}] ${message}` : message;
    if (this.parent) {
      this.parent.emit(level, text);
      return;
    }
    if (this.consoleEnabled) {
      // info goes to stdout; diagnostics, warnings and errors go to stderr
      if (level === 'info') console.log(text);
      else console.error(text);
    }
    this.sink?.(`${new Date().toISOString()} ${level.toUpperCase()} ${text}`);
  }
}

export default Logger;
