/**
 * Two-slot history resource for the temporal pass.
 *
 * Each view keeps its own parity: the temporal pass for view `v` reads
 * `read(v)` and writes `write(v)`, and the orchestrator calls `swap(v)` once
 * that pass has been submitted. The read and write slots of a view are
 * always different resources, so history is never sampled and rendered in
 * the same pass.
 */

import { VIEW_COUNT, type ViewIndex } from './camera-array';

export type HistorySlot = 0 | 1;

export class HistoryBuffer<T> {
  private readonly slots: readonly [T, T];
  private readonly readSlots: HistorySlot[] = new Array<HistorySlot>(VIEW_COUNT).fill(0);

  constructor(first: T, second: T) {
    this.slots = [first, second];
  }

  /** Slot index holding the previous frame's history for `view`. */
  readIndex(view: ViewIndex): HistorySlot {
    return this.readSlots[view];
  }

  /** Slot index the current frame writes for `view`. */
  writeIndex(view: ViewIndex): HistorySlot {
    return this.readSlots[view] === 0 ? 1 : 0;
  }

  read(view: ViewIndex): T {
    return this.slots[this.readIndex(view)];
  }

  write(view: ViewIndex): T {
    return this.slots[this.writeIndex(view)];
  }

  slot(index: HistorySlot): T {
    return this.slots[index];
  }

  /** The just-written slot becomes next frame's read slot. */
  swap(view: ViewIndex): void {
    this.readSlots[view] = this.writeIndex(view);
  }
}
