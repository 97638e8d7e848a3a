/**
 * Pipeline window controller.
 *
 * Drives N prepared requests through a transfer engine, keeping at most W
 * of them in flight. One request goes first on its own so the engine can
 * learn that the server keeps connections alive; only then does the window
 * fan out, which keeps every later request on that one pipelined connection.
 */
import { ConnectionRefusedError, WaitError } from "../errors.js";
import type { Completion, TransferEngine } from "../engine/types.js";
import { TransferSlotTable, type RequestDescriptor } from "./descriptors.js";
import { drainCompletions, type CompletedTransfer } from "./drain.js";
import { createWindowState, hasCapacity, isFinished, snapshotWindow, type WindowState } from "./window.js";

/** Ceiling on a single readiness wait, in ms */
export const MAX_WAIT_MS = 1000;

export interface PipelineObserver {
  onAdded?(descriptor: RequestDescriptor, state: Readonly<WindowState>): void;
  onCompleted?(transfer: CompletedTransfer, state: Readonly<WindowState>): void;
  onUnmatched?(completion: Completion): void;
  /** Called after every drain with the window as it stands */
  onDrain?(state: Readonly<WindowState>): void;
  onWaitFailed?(error: WaitError): void;
}

export interface PipelineOptions {
  /** Window length W */
  window: number;
  observer?: PipelineObserver;
  /** Default: MAX_WAIT_MS */
  maxWaitMs?: number;
}

export interface PipelineRunResult {
  /** False only when a readiness wait failed */
  ok: boolean;
  completions: CompletedTransfer[];
  unmatched: number;
  /** Highest in-flight count observed */
  maxRunning: number;
  state: Readonly<WindowState>;
  error?: WaitError;
}

/** Clamp the engine's hint to the wait ceiling; a negative hint means "no deadline" */
export function waitTimeout(hintMs: number, ceilingMs: number = MAX_WAIT_MS): number {
  return hintMs < 0 ? ceilingMs : Math.min(hintMs, ceilingMs);
}

interface RunContext {
  readonly engine: TransferEngine;
  readonly slots: TransferSlotTable;
  readonly state: WindowState;
  readonly observer: PipelineObserver;
  readonly completions: CompletedTransfer[];
  unmatched: number;
  maxRunning: number;
}

export async function runPipeline(
  engine: TransferEngine,
  descriptors: readonly RequestDescriptor[],
  options: PipelineOptions,
): Promise<PipelineRunResult> {
  const { window } = options;
  if (!Number.isInteger(window) || window < 1) {
    throw new Error(`Invalid window length: ${window}`);
  }
  const maxWaitMs = options.maxWaitMs ?? MAX_WAIT_MS;

  const run: RunContext = {
    engine,
    slots: new TransferSlotTable(descriptors),
    state: createWindowState(descriptors.length),
    observer: options.observer ?? {},
    completions: [],
    unmatched: 0,
    maxRunning: 0,
  };

  const failed = (error: WaitError): PipelineRunResult => {
    run.observer.onWaitFailed?.(error);
    return result(run, error);
  };

  if (run.state.total === 0) return result(run);

  // Warm-up: a single transfer, pumped until the engine is idle
  submitNext(run);
  while (engine.perform() > 0) {
    const error = await waitForActivity(engine, waitTimeout(engine.timeoutHint(), maxWaitMs));
    if (error) return failed(error);
  }
  drain(run);

  for (;;) {
    while (hasCapacity(run.state, window)) {
      submitNext(run);
    }

    engine.perform();
    drain(run);

    if (isFinished(run.state)) return result(run);

    // Completions opened the window and there is more to send: refill now
    if (run.state.running < window && run.state.added < run.state.total) continue;

    const error = await waitForActivity(engine, waitTimeout(engine.timeoutHint(), maxWaitMs));
    if (error) return failed(error);
  }
}

function submitNext(run: RunContext): void {
  const descriptor = run.slots.take(run.state.added);
  const handle = run.engine.add({
    url: descriptor.url,
    headers: descriptor.headers,
    timeoutMs: descriptor.timeoutMs,
  });
  run.slots.bind(descriptor.id, handle);
  run.state.added++;
  run.state.running++;
  run.maxRunning = Math.max(run.maxRunning, run.state.running);
  run.observer.onAdded?.(descriptor, snapshotWindow(run.state));
}

function drain(run: RunContext): void {
  const report = drainCompletions(run.engine, run.slots, run.state, {
    onCompleted: (transfer, state) => run.observer.onCompleted?.(transfer, snapshotWindow(state)),
    onUnmatched: completion => run.observer.onUnmatched?.(completion),
  });
  run.completions.push(...report.completed);
  run.unmatched += report.unmatched.length;

  if (report.refused) {
    // Nothing left to learn from a target that is not there
    run.engine.close();
    throw new ConnectionRefusedError(report.refused.id, {
      cause: report.refused.completion.error,
    });
  }

  run.observer.onDrain?.(snapshotWindow(run.state));
}

/** Wait for engine activity, retrying spurious wake-ups. Returns the error on a hard failure. */
async function waitForActivity(engine: TransferEngine, timeoutMs: number): Promise<WaitError | null> {
  for (;;) {
    try {
      const outcome = await engine.wait(timeoutMs);
      if (outcome !== "interrupted") return null;
    } catch (err) {
      if (err instanceof WaitError) return err;
      throw err;
    }
  }
}

function result(run: RunContext, error?: WaitError): PipelineRunResult {
  return {
    ok: error === undefined,
    completions: run.completions,
    unmatched: run.unmatched,
    maxRunning: run.maxRunning,
    state: snapshotWindow(run.state),
    ...(error ? { error } : {}),
  };
}
