import type { FactStorage } from '../types/collaborator.type';
import { CollaboratorError, describe_error } from './errors';

/** Ephemeral facts live for one run; persistent ones go through FactStorage. */
export type Persistence = 'ephemeral' | 'persistent';

export interface FactsSnapshot {
  ephemeral: string[];
  persistent: string[];
}

/**
 * Two independent namespaces of named boolean facts.
 * Persistent mutations are written to storage before the in-memory set changes,
 * so a failed write leaves the store as it was.
 */
export class FactStore {
  private readonly ephemeral = new Set<string>();
  private readonly persistent = new Set<string>();

  constructor(private readonly storage?: FactStorage) {}

  /** Store pre-filled with whatever the storage already holds. */
  static open(storage?: FactStorage): FactStore {
    const store = new FactStore(storage);
    if (!storage) return store;
    try {
      for (const name of storage.load_all()) store.persistent.add(name);
    } catch (e) {
      throw new CollaboratorError('FACT_STORAGE_FAILED', `failed to load persistent facts: ${describe_error(e)}`, {}, e);
    }
    return store;
  }

  contains(name: string, persistence: Persistence): boolean {
    return this.set_of(persistence).has(name);
  }

  /** Idempotent. */
  insert(name: string, persistence: Persistence): void {
    this.flush(name, true, persistence);
    this.set_of(persistence).add(name);
  }

  /** Removing an absent fact is a no-op. */
  remove(name: string, persistence: Persistence): void {
    this.flush(name, false, persistence);
    this.set_of(persistence).delete(name);
  }

  /** Flips presence; returns the new presence. */
  toggle(name: string, persistence: Persistence): boolean {
    const present = !this.contains(name, persistence);
    if (present) this.insert(name, persistence);
    else this.remove(name, persistence);
    return present;
  }

  snapshot(): FactsSnapshot {
    return {
      ephemeral: [...this.ephemeral].sort(),
      persistent: [...this.persistent].sort(),
    };
  }

  private set_of(persistence: Persistence): Set<string> {
    return persistence === 'persistent' ? this.persistent : this.ephemeral;
  }

  private flush(name: string, present: boolean, persistence: Persistence): void {
    if (persistence !== 'persistent' || !this.storage) return;
    try {
      this.storage.persist(name, present);
    } catch (e) {
      throw new CollaboratorError(
        'FACT_STORAGE_FAILED',
        `failed to persist fact '${name}': ${describe_error(e)}`,
        { resource: name },
        e
      );
    }
  }
}
