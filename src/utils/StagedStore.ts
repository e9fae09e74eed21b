/**
 * Staged key-value storage
 * Writes made while a transaction is open land in an overlay and only reach
 * the committed map on commit; rollback discards the overlay.
 */

export interface Transactional {
  begin(): void;
  commit(): void;
  rollback(): void;
  isStaging(): boolean;
}

export class StagedStore<K, V> implements Transactional {
  private committed: Map<K, V> = new Map();
  private staged: Map<K, V> | null = null;

  get(key: K): V | undefined {
    if (this.staged && this.staged.has(key)) {
      return this.staged.get(key);
    }
    return this.committed.get(key);
  }

  has(key: K): boolean {
    return (this.staged?.has(key) ?? false) || this.committed.has(key);
  }

  /**
   * Stored values must be treated as immutable: replace, never mutate in place
   */
  set(key: K, value: V): void {
    if (this.staged) {
      this.staged.set(key, value);
    } else {
      this.committed.set(key, value);
    }
  }

  *entries(): IterableIterator<[K, V]> {
    for (const [key, value] of this.committed) {
      if (this.staged && this.staged.has(key)) {
        continue;
      }
      yield [key, value];
    }
    if (this.staged) {
      yield* this.staged.entries();
    }
  }

  *values(): IterableIterator<V> {
    for (const [, value] of this.entries()) {
      yield value;
    }
  }

  get size(): number {
    let size = this.committed.size;
    if (this.staged) {
      for (const key of this.staged.keys()) {
        if (!this.committed.has(key)) size++;
      }
    }
    return size;
  }

  begin(): void {
    if (this.staged) {
      throw new Error('Store already has an open transaction');
    }
    this.staged = new Map();
  }

  commit(): void {
    if (!this.staged) {
      throw new Error('No open transaction to commit');
    }
    for (const [key, value] of this.staged) {
      this.committed.set(key, value);
    }
    this.staged = null;
  }

  rollback(): void {
    this.staged = null;
  }

  isStaging(): boolean {
    return this.staged !== null;
  }
}

/**
 * Monotonic id sequence whose increments roll back with the transaction
 */
export class StagedSequence implements Transactional {
  private readonly store = new StagedStore<'next', number>();

  constructor(private readonly prefix: string) {}

  next(): string {
    const value = (this.store.get('next') ?? 0) + 1;
    this.store.set('next', value);
    return `${this.prefix}_${value}`;
  }

  begin(): void {
    this.store.begin();
  }

  commit(): void {
    this.store.commit();
  }

  rollback(): void {
    this.store.rollback();
  }

  isStaging(): boolean {
    return this.store.isStaging();
  }
}
