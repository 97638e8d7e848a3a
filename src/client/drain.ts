/**
 * Completion drain: read every finished transfer the engine has available,
 * match it to its request, and update the window.
 */
import type { Completion, TransferCode, TransferEngine } from "../engine/types.js";
import type { TransferSlotTable } from "./descriptors.js";
import type { WindowState } from "./window.js";

export type TransferOutcome = "success" | "timeout" | "connection-refused" | "other";

export interface CompletedTransfer {
  id: number;
  outcome: TransferOutcome;
  code: TransferCode;
  completion: Completion;
}

export interface DrainHooks {
  onCompleted?(transfer: CompletedTransfer, state: Readonly<WindowState>): void;
  onUnmatched?(completion: Completion): void;
}

export interface DrainReport {
  completed: CompletedTransfer[];
  unmatched: Completion[];
  /** Set when a transfer could not connect; draining stops right there */
  refused: CompletedTransfer | null;
}

export function classifyResult(code: TransferCode): TransferOutcome {
  switch (code) {
    case "ok":
      return "success";
    case "operation-timedout":
      return "timeout";
    case "couldnt-connect":
      return "connection-refused";
    default:
      return "other";
  }
}

export function drainCompletions(
  engine: TransferEngine,
  slots: TransferSlotTable,
  state: WindowState,
  hooks: DrainHooks = {},
): DrainReport {
  const report: DrainReport = { completed: [], unmatched: [], refused: null };

  for (let completion = engine.readCompletion(); completion; completion = engine.readCompletion()) {
    const descriptor = slots.resolve(completion.handle);
    if (!descriptor) {
      report.unmatched.push(completion);
      hooks.onUnmatched?.(completion);
      continue;
    }

    const transfer: CompletedTransfer = {
      id: descriptor.id,
      outcome: classifyResult(completion.code),
      code: completion.code,
      completion,
    };
    slots.release(descriptor.id);
    state.running--;
    report.completed.push(transfer);
    hooks.onCompleted?.(transfer, state);

    if (transfer.outcome === "connection-refused") {
      report.refused = transfer;
      break;
    }
  }

  return report;
}
