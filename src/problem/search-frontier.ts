/**
 * Search frontier shared by depth-first and breadth-first enumeration.
 *
 * Items are always added at the tail. Depth-first takes from the tail
 * (a stack), breadth-first from the head (a queue), so both orders run
 * the same search code.
 */

export type ExplorationOrder = "depth-first" | "breadth-first";

export const EXPLORATION_ORDERS: readonly ExplorationOrder[] = ["depth-first", "breadth-first"];

export function isExplorationOrder(value: string): value is ExplorationOrder {
  return (EXPLORATION_ORDERS as readonly string[]).includes(value);
}

/** Compact the backing array once this many taken slots sit before the head */
const COMPACT_THRESHOLD = 1024;

export class SearchFrontier<T> {
  readonly order: ExplorationOrder;
  private items: (T | undefined)[] = [];
  private head = 0;

  constructor(order: ExplorationOrder) {
    this.order = order;
  }

  get size(): number {
    return this.items.length - this.head;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  push(item: T): void {
    this.items.push(item);
  }

  /**
   * Remove the next item to expand, or undefined when empty.
   */
  take(): T | undefined {
    if (this.isEmpty()) return undefined;

    if (this.order === "depth-first") {
      return this.items.pop();
    }

    const item = this.items[this.head];
    // Release the reference so expanded states can be collected
    this.items[this.head] = undefined;
    this.head++;

    if (this.head === this.items.length) {
      this.items = [];
      this.head = 0;
    } else if (this.head >= COMPACT_THRESHOLD && this.head * 2 >= this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
    return item;
  }
}
