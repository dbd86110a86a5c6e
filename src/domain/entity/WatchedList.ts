/**
 * @fileoverview WatchedList - Collection that remembers what changed
 *
 * @module @tessera/core/domain/entity
 *
 * An aggregate holding a collection exposes a `WatchedList`, so the
 * repository persists only the added and removed items.
 *
 * @example
 * ```typescript
 * class Tags extends WatchedList<string> {
 *   compare(a: string, b: string): boolean {
 *     return a === b;
 *   }
 * }
 *
 * const tags = new Tags(['draft']);
 * tags.add('urgent');
 * tags.remove('draft');
 * tags.getAddedItems();   // ['urgent']
 * tags.getRemovedItems(); // ['draft']
 * ```
 */

export abstract class WatchedList<T> {
  private items: T[];
  private readonly initial: readonly T[];
  private added: T[] = [];
  private removed: T[] = [];

  constructor(initialItems: readonly T[] = []) {
    this.items = [...initialItems];
    this.initial = [...initialItems];
  }

  abstract compare(a: T, b: T): boolean;

  getItems(): readonly T[] {
    return this.items;
  }

  getInitialItems(): readonly T[] {
    return this.initial;
  }

  getAddedItems(): readonly T[] {
    return this.added;
  }

  getRemovedItems(): readonly T[] {
    return this.removed;
  }

  exists(item: T): boolean {
    return this.contains(this.items, item);
  }

  add(item: T): void {
    if (this.contains(this.removed, item)) {
      this.removed = this.without(this.removed, item);
    }
    if (!this.contains(this.added, item) && !this.contains(this.initial, item)) {
      this.added.push(item);
    }
    if (!this.exists(item)) {
      this.items.push(item);
    }
  }

  remove(item: T): void {
    this.items = this.without(this.items, item);

    if (this.contains(this.added, item)) {
      this.added = this.without(this.added, item);
      return;
    }
    if (this.contains(this.initial, item) && !this.contains(this.removed, item)) {
      this.removed.push(item);
    }
  }

  /**
   * Replace the whole collection, recording the difference.
   */
  update(items: readonly T[]): void {
    for (const current of [...this.items]) {
      if (!this.contains(items, current)) {
        this.remove(current);
      }
    }
    for (const item of items) {
      this.add(item);
    }
  }

  private contains(list: readonly T[], item: T): boolean {
    return list.some((candidate) => this.compare(candidate, item));
  }

  private without(list: readonly T[], item: T): T[] {
    return list.filter((candidate) => !this.compare(candidate, item));
  }
}
