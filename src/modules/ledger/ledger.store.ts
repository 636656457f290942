import { DuplicateEventError } from "./ledger.errors.js";
import type { Award, HunterState } from "./ledger.types.js";

export interface LedgerCommit {
  /** New awards in arrival order. */
  awards: Award[];
  /** Hunter snapshots to upsert. */
  hunters: HunterState[];
}

/**
 * Persistence port for the ledger. Award history is append-only: there is
 * no way to update or delete an award through this interface.
 */
export interface LedgerStore {
  findExistingKeys(keys: string[]): Promise<Set<string>>;
  /** Awards in arrival order, optionally for one hunter. */
  listAwards(hunterId?: string): Promise<Award[]>;
  getHunter(hunterId: string): Promise<HunterState | undefined>;
  listHunters(): Promise<HunterState[]>;
  /**
   * All-or-nothing. Throws DuplicateEventError without writing anything if
   * any award key is already present.
   */
  commit(change: LedgerCommit): Promise<void>;
}

export class MemoryLedgerStore implements LedgerStore {
  private readonly awards: Award[] = [];
  private readonly keys = new Set<string>();
  private readonly hunters = new Map<string, HunterState>();

  async findExistingKeys(keys: string[]): Promise<Set<string>> {
    return new Set(keys.filter((key) => this.keys.has(key)));
  }

  async listAwards(hunterId?: string): Promise<Award[]> {
    const rows = hunterId ? this.awards.filter((a) => a.hunterId === hunterId) : this.awards;
    return structuredClone(rows);
  }

  async getHunter(hunterId: string): Promise<HunterState | undefined> {
    const hunter = this.hunters.get(hunterId);
    return hunter ? structuredClone(hunter) : undefined;
  }

  async listHunters(): Promise<HunterState[]> {
    return structuredClone([...this.hunters.values()]);
  }

  async commit(change: LedgerCommit): Promise<void> {
    const seen = new Set<string>();
    for (const award of change.awards) {
      if (this.keys.has(award.idempotencyKey) || seen.has(award.idempotencyKey)) {
        throw new DuplicateEventError(award.idempotencyKey, award.sourceRef);
      }
      seen.add(award.idempotencyKey);
    }

    for (const award of change.awards) {
      this.awards.push(structuredClone(award));
      this.keys.add(award.idempotencyKey);
    }
    for (const hunter of change.hunters) {
      this.hunters.set(hunter.hunterId, structuredClone(hunter));
    }
  }
}
