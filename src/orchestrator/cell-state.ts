/**
 * Per-cell lifecycle
 *
 * PENDING -> RUNNING -> {SUCCEEDED | FAILED | TIMED_OUT} -> RECORDED
 */

import type { CellOutcome, CellStatus } from '../types/index.js';
import { CellStateError } from '../errors/index.js';

const TRANSITIONS: Readonly<Record<CellStatus, readonly CellStatus[]>> = {
  PENDING: ['RUNNING'],
  RUNNING: ['SUCCEEDED', 'FAILED', 'TIMED_OUT'],
  SUCCEEDED: ['RECORDED'],
  FAILED: ['RECORDED'],
  TIMED_OUT: ['RECORDED'],
  RECORDED: [],
};

export function isOutcome(status: CellStatus): status is CellOutcome {
  return status === 'SUCCEEDED' || status === 'FAILED' || status === 'TIMED_OUT';
}

export class CellState {
  private current: CellStatus = 'PENDING';
  private outcomeValue?: CellOutcome;

  constructor(readonly cellId: string) {}

  get status(): CellStatus {
    return this.current;
  }

  /** Terminal outcome, once the cell has one */
  get outcome(): CellOutcome | undefined {
    return this.outcomeValue;
  }

  /**
   * @throws CellStateError when `next` is not reachable from the current status
   */
  transition(next: CellStatus): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new CellStateError(
        `Cell "${this.cellId}" cannot move from ${this.current} to ${next}`
      );
    }
    this.current = next;
    if (isOutcome(next)) {
      this.outcomeValue = next;
    }
  }
}
