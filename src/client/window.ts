/**
 * Pipeline window accounting.
 * Invariants: running <= window length, added <= total; a run is finished
 * exactly when everything was added and nothing is running.
 */

export interface WindowState {
  /** Requests handed to the engine */
  added: number;
  /** Added minus completed */
  running: number;
  readonly total: number;
}

export function createWindowState(total: number): WindowState {
  return { added: 0, running: 0, total };
}

/** Whether another request may be submitted under window length `window` */
export function hasCapacity(state: WindowState, window: number): boolean {
  return state.running < window && state.added < state.total;
}

export function isFinished(state: WindowState): boolean {
  return state.running === 0 && state.added === state.total;
}

export function snapshotWindow(state: WindowState): Readonly<WindowState> {
  return { added: state.added, running: state.running, total: state.total };
}
