import type { LedgerStore } from './SessionPorts';
import { Logger } from '../../utils/Logger';

const log = new Logger('CompletionLedger');

/**
 * Append-only set of image identities whose masks have been saved at least
 * once. Read once at startup; each new identity is appended to the store as
 * soon as it is recorded.
 */
export class CompletionLedger {
  private constructor(
    private readonly store: LedgerStore,
    private readonly identities: Set<string>
  ) {}

  static async load(store: LedgerStore): Promise<CompletionLedger> {
    const lines = await store.readAll();
    const identities = new Set<string>();
    for (const line of lines) {
      const identity = line.trim();
      if (identity.length > 0) identities.add(identity);
    }
    log.debug(`Loaded ${identities.size} completed identities`);
    return new CompletionLedger(store, identities);
  }

  get size(): number {
    return this.identities.size;
  }

  has(identity: string): boolean {
    return this.identities.has(identity);
  }

  /**
   * Record an identity as completed. Returns true when it was new (and was
   * appended to the store), false when it was already present.
   */
  async record(identity: string): Promise<boolean> {
    if (this.identities.has(identity)) return false;
    // reserved before the append so overlapping records write one line
    this.identities.add(identity);
    try {
      await this.store.append(identity);
    } catch (err) {
      this.identities.delete(identity);
      throw err;
    }
    return true;
  }
}
