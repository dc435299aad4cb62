/**
 * Global hot-key capability.
 *
 * A backend turns raw key events from an OS-level listener into combo
 * callbacks. Callbacks fire on the listener's schedule, not the UI's; the
 * dispatcher is responsible for marshaling them.
 */

import type { Logger } from '../logger.js';
import { matchesCombo, parseCombo, type ParsedCombo } from './combo.js';

export interface RegistrationHandle {
  /** Canonical form of the registered combo. */
  readonly combo: string;
  unregister(): void;
}

export interface GlobalHotkeyBackend {
  readonly name: string;
  /** Throws `HotkeyComboError` when `combo` is not understood. */
  register(combo: string, callback: () => void): RegistrationHandle;
  unregisterAll(): void;
  dispose(): void;
}

export interface KeyEvent {
  name?: string;
  down: boolean;
}

/**
 * Stream of global key events. `pressed` holds every key name currently held,
 * including the event's own key on key-down.
 */
export interface KeyEventSource {
  start(handler: (event: KeyEvent, pressed: ReadonlySet<string>) => void): Promise<void>;
  stop(): void;
}

type Registration = { combo: ParsedCombo; callback: () => void };

export class ListenerHotkeyBackend implements GlobalHotkeyBackend {
  private readonly registrations = new Map<number, Registration>();
  private nextId = 1;
  private started: Promise<void> | null = null;
  private disposed = false;

  constructor(
    private readonly source: KeyEventSource,
    private readonly logger?: Logger,
    readonly name: string = 'global-key-listener',
  ) {}

  register(combo: string, callback: () => void): RegistrationHandle {
    const parsed = parseCombo(combo);
    const id = this.nextId++;
    this.registrations.set(id, { combo: parsed, callback });
    this.ensureStarted();
    return {
      combo: parsed.normalized,
      unregister: () => {
        this.registrations.delete(id);
      },
    };
  }

  unregisterAll(): void {
    this.registrations.clear();
  }

  size(): number {
    return this.registrations.size;
  }

  dispose(): void {
    this.registrations.clear();
    if (this.disposed) return;
    this.disposed = true;
    if (this.started) this.source.stop();
  }

  /**
   * Start the key source. Repeated calls share the first attempt, so a
   * rejection here means the listener is not running.
   */
  start(): Promise<void> {
    if (!this.started) {
      this.started = this.source.start((event, pressed) => this.handleKey(event, pressed));
    }
    return this.started;
  }

  private ensureStarted(): void {
    if (this.started || this.disposed) return;
    void this.start().catch(err => {
      this.logger?.warn(`global key listener failed to start: ${String(err)}`);
    });
  }

  private handleKey(event: KeyEvent, pressed: ReadonlySet<string>): void {
    if (!event.down) return;
    // snapshot: a callback may re-register and mutate the map
    for (const registration of Array.from(this.registrations.values())) {
      if (matchesCombo(registration.combo, event.name, pressed)) registration.callback();
    }
  }
}

export interface LoadBackendOptions {
  logger?: Logger;
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
  /** Source factory; defaults to the native listener, imported lazily. */
  createSource?: () => Promise<KeyEventSource>;
}

async function createNativeSource(): Promise<KeyEventSource> {
  const { createNativeKeySource } = await import('./native-listener.js');
  return createNativeKeySource();
}

/**
 * Load and start the global hot-key backend for this host, or null when the
 * host has none (no graphical session, or the listener cannot be loaded or
 * started). Absence is reduced functionality, not an error.
 */
export async function loadGlobalHotkeyBackend(opts: LoadBackendOptions = {}): Promise<GlobalHotkeyBackend | null> {
  const platform = opts.platform ?? process.platform;
  const env = opts.env ?? process.env;
  const logger = opts.logger;

  if (platform !== 'win32' && platform !== 'darwin' && !env.DISPLAY) {
    logger?.info('no X display; global hot-keys disabled, in-window keys still work');
    return null;
  }

  let backend: ListenerHotkeyBackend;
  try {
    const source = await (opts.createSource ?? createNativeSource)();
    backend = new ListenerHotkeyBackend(source, logger);
  } catch (err) {
    logger?.info(`global key listener unavailable (${String(err)}); in-window keys still work`);
    return null;
  }

  // e.g. no accessibility permission on macOS, or the X11 key server cannot run
  try {
    await backend.start();
  } catch (err) {
    logger?.info(`global key listener failed to start (${String(err)}); in-window keys still work`);
    return null;
  }
  return backend;
}
