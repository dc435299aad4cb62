import keyListener from 'node-global-key-listener';
import type { KeyEventSource } from './backend.js';

/**
 * Key event source backed by node-global-key-listener, which runs a small
 * platform key server in a child process.
 */
export function createNativeKeySource(): KeyEventSource {
  const listener = new keyListener.GlobalKeyboardListener();
  return {
    start: async handler => {
      await listener.addListener((event, down) => {
        const pressed = new Set<string>();
        for (const [name, held] of Object.entries(down)) {
          if (held) pressed.add(name);
        }
        handler({ name: event.name, down: event.state === 'DOWN' }, pressed);
        // never swallow the key for other applications
        return false;
      });
    },
    stop: () => listener.kill(),
  };
}
