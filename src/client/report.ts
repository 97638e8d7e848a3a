/**
 * Scenario output for the client: one timestamped line per request added
 * and per request completed, with the in-flight count after each.
 */
import type { ScenarioLog } from "../utils/log.js";
import type { PipelineObserver } from "./controller.js";
import type { CompletedTransfer } from "./drain.js";

export function describeCompletion(transfer: CompletedTransfer): string {
  switch (transfer.outcome) {
    case "success":
      return `Request    #${transfer.id} finished`;
    case "timeout":
      return `Request    #${transfer.id} TIMED OUT!`;
    default:
      return `Request    #${transfer.id} completed with status ${transfer.code}`;
  }
}

export function createScenarioObserver(log: ScenarioLog): PipelineObserver {
  return {
    onAdded: (descriptor, state) => {
      log.line(`Request #${descriptor.id}    added [now running: ${state.running}]`);
    },
    onCompleted: (transfer, state) => {
      log.line(`${describeCompletion(transfer)} [now running: ${state.running}]`);
    },
    onUnmatched: completion => {
      log.line(`Got a completion that matches none of our requests! (${completion.handle})`);
    },
    onWaitFailed: error => {
      log.line(`wait failed: ${error.message}`);
    },
  };
}
