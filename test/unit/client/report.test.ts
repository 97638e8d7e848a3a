import { describe, it, expect } from "vitest";
import { createScenarioObserver, describeCompletion } from "../../../src/client/report.js";
import type { CompletedTransfer } from "../../../src/client/drain.js";
import { TransferHandle } from "../../../src/engine/types.js";
import { WaitError } from "../../../src/errors.js";
import { recordingLog } from "../../helpers/log.js";

function transfer(overrides: Partial<CompletedTransfer>): CompletedTransfer {
  const handle = new TransferHandle(1);
  return {
    id: 4,
    outcome: "success",
    code: "ok",
    completion: { handle, code: "ok", status: 200 },
    ...overrides,
  };
}

describe("describeCompletion", () => {
  it("should describe each outcome", () => {
    expect(describeCompletion(transfer({}))).toBe("Request    #4 finished");
    expect(describeCompletion(transfer({ outcome: "timeout", code: "operation-timedout" }))).toBe(
      "Request    #4 TIMED OUT!",
    );
    expect(describeCompletion(transfer({ outcome: "other", code: "recv-error" }))).toBe(
      "Request    #4 completed with status recv-error",
    );
  });
});

describe("createScenarioObserver", () => {
  it("should log unmatched completions and wait failures", () => {
    const { log, lines } = recordingLog();
    const observer = createScenarioObserver(log);

    observer.onUnmatched?.({ handle: new TransferHandle(9), code: "ok" });
    observer.onWaitFailed?.(new WaitError("Engine is closed"));

    expect(lines).toEqual([
      "Got a completion that matches none of our requests! (transfer#9)",
      "wait failed: Engine is closed",
    ]);
  });
});
