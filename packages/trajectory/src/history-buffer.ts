/**
 * Bounded ring buffer of snapshots, oldest first.
 *
 * Fixed capacity, oldest snapshot evicted on overflow (FIFO).
 * Every snapshot is re-validated on entry; toArray() returns a frozen copy.
 */

import { parseSnapshot, type Snapshot } from "@trajecta/core";
import { OutOfOrderInputError, TrajectoryConfigurationError } from "@trajecta/errors";
import { DEFAULT_WINDOW_SIZE } from "./constants.js";
import type { OrderingPolicy } from "./types.js";

export class HistoryBuffer {
  private readonly _items: (Snapshot | undefined)[];
  private readonly _capacity: number;
  private readonly _ordering: OrderingPolicy;
  private _head = 0;
  private _size = 0;

  constructor(capacity: number = DEFAULT_WINDOW_SIZE, ordering: OrderingPolicy = "reject") {
    if (capacity < 1 || !Number.isInteger(capacity)) {
      throw new TrajectoryConfigurationError(
        `history capacity must be a positive integer, got ${capacity}`,
      );
    }
    this._capacity = capacity;
    this._ordering = ordering;
    this._items = new Array<Snapshot | undefined>(capacity);
  }

  get size(): number {
    return this._size;
  }

  get capacity(): number {
    return this._capacity;
  }

  get ordering(): OrderingPolicy {
    return this._ordering;
  }

  /** Newest snapshot, or undefined when empty */
  latest(): Snapshot | undefined {
    if (this._size === 0) return undefined;
    return this._items[(this._head - 1 + this._capacity) % this._capacity];
  }

  /**
   * Append a snapshot at the newest end, evicting the oldest when full.
   * Returns the validated snapshot as stored.
   *
   * @throws {InvalidInputError} on a non-finite timestamp or a value outside [0, 1]
   * @throws {OutOfOrderInputError} when the ordering policy is `reject` and
   *   the timestamp is strictly earlier than the newest snapshot
   */
  add(input: Snapshot): Snapshot {
    const snapshot = parseSnapshot(input);
    const newest = this.latest();
    if (
      this._ordering === "reject" &&
      newest !== undefined &&
      snapshot.timestamp < newest.timestamp
    ) {
      throw new OutOfOrderInputError(newest.timestamp, snapshot.timestamp);
    }

    this._items[this._head] = snapshot;
    this._head = (this._head + 1) % this._capacity;
    if (this._size < this._capacity) {
      this._size++;
    }
    return snapshot;
  }

  toArray(): readonly Snapshot[] {
    if (this._size === 0) return Object.freeze([]);

    const result: Snapshot[] = [];
    // Not full: items start at 0. Full: items start at _head (oldest).
    const start = this._size < this._capacity ? 0 : this._head;
    for (let i = 0; i < this._size; i++) {
      const item = this._items[(start + i) % this._capacity];
      if (item !== undefined) result.push(item);
    }
    return Object.freeze(result);
  }

  clear(): void {
    this._items.fill(undefined);
    this._head = 0;
    this._size = 0;
  }
}
