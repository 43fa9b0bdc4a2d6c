/**
 * @termvault/multivault — Undo journal.
 *
 * Every mutable structure of the engine writes through a journal.
 * Inside `transact`, each write records how to undo itself; if the
 * callback throws, the writes are undone newest-first and the error
 * is rethrown, so a failed call leaves no trace.
 *
 * Writes made outside any transaction are not recorded.
 */

export class Journal {
  private readonly undoLog: Array<() => void> = [];
  private depth = 0;

  /** True while a transaction is open. */
  get active(): boolean {
    return this.depth > 0;
  }

  record(undo: () => void): void {
    if (this.depth > 0) {
      this.undoLog.push(undo);
    }
  }

  /**
   * Run `fn` atomically. Nested calls roll back only their own writes.
   */
  transact<T>(fn: () => T): T {
    const checkpoint = this.undoLog.length;
    this.depth += 1;
    try {
      return fn();
    } catch (err) {
      this.rollbackTo(checkpoint);
      throw err;
    } finally {
      this.depth -= 1;
      if (this.depth === 0) {
        this.undoLog.length = 0;
      }
    }
  }

  private rollbackTo(checkpoint: number): void {
    while (this.undoLog.length > checkpoint) {
      const undo = this.undoLog.pop();
      undo?.();
    }
  }
}

// ─── Journaled Structures ────────────────────────────────────────────────

/**
 * A Map whose writes are recorded in a journal.
 * Values may not be undefined.
 */
export class JournaledMap<K, V extends NonNullable<unknown>> {
  private readonly map = new Map<K, V>();

  constructor(private readonly journal: Journal) {}

  get(key: K): V | undefined {
    return this.map.get(key);
  }

  has(key: K): boolean {
    return this.map.has(key);
  }

  set(key: K, value: V): void {
    this.recordPrevious(key);
    this.map.set(key, value);
  }

  delete(key: K): void {
    if (!this.map.has(key)) {
      return;
    }
    this.recordPrevious(key);
    this.map.delete(key);
  }

  get size(): number {
    return this.map.size;
  }

  keys(): IterableIterator<K> {
    return this.map.keys();
  }

  entries(): IterableIterator<[K, V]> {
    return this.map.entries();
  }

  private recordPrevious(key: K): void {
    const previous = this.map.get(key);
    if (previous === undefined) {
      this.journal.record(() => {
        this.map.delete(key);
      });
    } else {
      this.journal.record(() => {
        this.map.set(key, previous);
      });
    }
  }
}

/**
 * A single journaled value.
 */
export class JournaledCell<T> {
  constructor(
    private readonly journal: Journal,
    private value: T,
  ) {}

  get(): T {
    return this.value;
  }

  set(value: T): void {
    const previous = this.value;
    this.journal.record(() => {
      this.value = previous;
    });
    this.value = value;
  }
}
