/**
 * Result Cell
 *
 * Single-slot hand-off between a background job (the only writer) and the
 * frame loop (the only reader). The reader never waits: `tryTake()` reports
 * whether the value is ready, still missing, or being written right now.
 */

import { ResultCellError } from "../utils/errors.js";

/**
 * Outcome of a non-blocking read
 */
export type CellRead<T> =
  | { status: "locked" }
  | { status: "empty" }
  | { status: "ready"; value: T };

export type CellStatus = "empty" | "locked" | "ready" | "consumed";

/**
 * Write access to a locked cell. The staged value becomes visible only on
 * `release()`; releasing without `set()` leaves the cell empty.
 */
export interface CellGuard<T> {
  set(value: T): void;
  release(): void;
}

type CellState<T> =
  | { status: "empty" }
  | { status: "locked" }
  | { status: "ready"; value: T }
  | { status: "consumed" };

export class ResultCell<T> {
  private state: CellState<T> = { status: "empty" };

  /**
   * @param label - Name used in error messages and logs
   */
  constructor(readonly label: string = "result") {}

  get status(): CellStatus {
    return this.state.status;
  }

  /**
   * Take the write lock. Only an empty cell can be locked, so a value is
   * written at most once.
   */
  lock(): CellGuard<T> {
    if (this.state.status !== "empty") {
      throw new ResultCellError(
        `Result cell "${this.label}" cannot be written: it is ${this.state.status}`,
        { cell: this.label },
      );
    }

    this.state = { status: "locked" };

    let staged: { value: T } | undefined;
    let released = false;

    return {
      set: (value: T) => {
        if (released) {
          throw new ResultCellError(`Result cell "${this.label}" guard was already released`, {
            cell: this.label,
          });
        }
        staged = { value };
      },
      release: () => {
        if (released) return;
        released = true;
        this.state = staged ? { status: "ready", value: staged.value } : { status: "empty" };
      },
    };
  }

  /**
   * Lock, set and release in one step
   */
  write(value: T): void {
    const guard = this.lock();
    guard.set(value);
    guard.release();
  }

  /**
   * Non-blocking read. A ready value is handed out exactly once; taking from
   * a consumed cell is a programming error.
   */
  tryTake(): CellRead<T> {
    switch (this.state.status) {
      case "empty":
        return { status: "empty" };
      case "locked":
        return { status: "locked" };
      case "ready": {
        const { value } = this.state;
        this.state = { status: "consumed" };
        return { status: "ready", value };
      }
      case "consumed":
        throw new ResultCellError(`Result cell "${this.label}" was already consumed`, {
          cell: this.label,
        });
    }
  }
}
