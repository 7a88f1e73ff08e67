/**
 * Position of a value inside a {@link RecencyLedger}.
 *
 * A handle stays valid until its value is removed from the ledger. Only the
 * ledger that issued it can move or remove it.
 */
export interface LedgerHandle<T> {
  readonly value: T;
  readonly linked: boolean;
}

class LedgerNode<T> implements LedgerHandle<T> {
  prev: LedgerNode<T> | null = null;
  next: LedgerNode<T> | null = null;
  linked = false;

  constructor(readonly value: T) {}
}

/**
 * Recency-ordered sequence backed by an intrusive doubly linked list.
 *
 * The head holds the least recently used value and the tail the most
 * recently used one. Every operation is O(1); lookup by key lives with the
 * caller, which keeps the handles returned by {@link append}.
 */
export class RecencyLedger<T> implements Iterable<T> {
  private head: LedgerNode<T> | null = null;
  private tail: LedgerNode<T> | null = null;
  private count = 0;
  /** Nodes issued by this ledger and still linked into it */
  private readonly nodes = new WeakMap<LedgerHandle<T>, LedgerNode<T>>();

  get length(): number {
    return this.count;
  }

  /**
   * Insert at the most recent end.
   */
  append(value: T): LedgerHandle<T> {
    const node = new LedgerNode(value);
    this.link(node);
    return node;
  }

  /**
   * Relocate a handle to the most recent end.
   * Returns false when the handle does not belong to this ledger.
   */
  moveToMostRecent(handle: LedgerHandle<T>): boolean {
    const node = this.nodes.get(handle);
    if (node === undefined) {
      return false;
    }
    if (node !== this.tail) {
      this.unlink(node);
      this.link(node);
    }
    return true;
  }

  /**
   * Detach and return the least recent value, or undefined when empty.
   */
  removeLeastRecent(): T | undefined {
    const node = this.head;
    if (node === null) {
      return undefined;
    }
    this.unlink(node);
    return node.value;
  }

  remove(handle: LedgerHandle<T>): boolean {
    const node = this.nodes.get(handle);
    if (node === undefined) {
      return false;
    }
    this.unlink(node);
    return true;
  }

  peekLeastRecent(): T | undefined {
    return this.head?.value;
  }

  clear(): void {
    let cursor = this.head;
    while (cursor !== null) {
      const next = cursor.next;
      cursor.prev = null;
      cursor.next = null;
      cursor.linked = false;
      this.nodes.delete(cursor);
      cursor = next;
    }
    this.head = null;
    this.tail = null;
    this.count = 0;
  }

  /**
   * Iterate from least to most recent.
   */
  *[Symbol.iterator](): Iterator<T> {
    let cursor = this.head;
    while (cursor !== null) {
      // read ahead so the consumer may remove the current handle
      const next = cursor.next;
      yield cursor.value;
      cursor = next;
    }
  }

  private link(node: LedgerNode<T>): void {
    node.prev = this.tail;
    node.next = null;
    node.linked = true;
    this.nodes.set(node, node);
    if (this.tail !== null) {
      this.tail.next = node;
    } else {
      this.head = node;
    }
    this.tail = node;
    this.count++;
  }

  private unlink(node: LedgerNode<T>): void {
    const { prev, next } = node;
    if (prev !== null) {
      prev.next = next;
    } else {
      this.head = next;
    }
    if (next !== null) {
      next.prev = prev;
    } else {
      this.tail = prev;
    }
    node.prev = null;
    node.next = null;
    node.linked = false;
    this.nodes.delete(node);
    this.count--;
  }
}
