/**
 * Keyboard Manager - resolves key presses to commands
 *
 * Holds a table of key combinations and the command each one triggers.
 * Keys are matched case-sensitively (`g` and `G` are different bindings).
 */

import type { Command } from './input/InputEvents';
import { DEFAULT_KEY_BINDINGS, type KeyBindingConfig } from './KeyBindings';

export interface KeyCombination {
  key: string;
}

export class KeyboardManager {
  private bindings: Map<string, Command> = new Map();

  /** Create a manager with every binding from a config (defaults to DEFAULT_KEY_BINDINGS). */
  static fromConfig(config: KeyBindingConfig = DEFAULT_KEY_BINDINGS): KeyboardManager {
    const manager = new KeyboardManager();
    for (const binding of Object.values(config)) {
      manager.register(binding, binding.command);
    }
    return manager;
  }

  /**
   * Register a key combination. A later registration for the same
   * combination replaces the earlier one.
   */
  register(key: string | KeyCombination, command: Command): void {
    this.bindings.set(typeof key === 'string' ? key : key.key, command);
  }

  /** Command bound to a key, or null when the key is unbound. */
  resolve(key: string): Command | null {
    return this.bindings.get(key) ?? null;
  }
}
