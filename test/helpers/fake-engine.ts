import { WaitError } from "../../src/errors.js";
import {
  TransferHandle,
  type Completion,
  type TransferCode,
  type TransferEngine,
  type TransferRequest,
  type WaitOutcome,
} from "../../src/engine/types.js";

export interface FakeTransferPlan {
  /** Completion code. Default: "ok" */
  code?: TransferCode;
  /** Number of perform() calls before the transfer completes. Default: 1 */
  performs?: number;
}

interface ActiveTransfer {
  handle: TransferHandle;
  remaining: number;
  code: TransferCode;
}

/**
 * Scripted in-process engine. Transfers complete after a planned number of
 * perform() calls; wait() plays back queued outcomes, then reports "ready".
 */
export class FakeEngine implements TransferEngine {
  readonly added: TransferRequest[] = [];
  readonly waits: number[] = [];
  readonly waitOutcomes: Array<WaitOutcome | Error> = [];
  hint = -1;
  closed = false;
  private serial = 0;
  private active: ActiveTransfer[] = [];
  private readonly completions: Completion[] = [];
  private readonly plan: (index: number) => FakeTransferPlan;

  constructor(plan: (index: number) => FakeTransferPlan = () => ({})) {
    this.plan = plan;
  }

  add(request: TransferRequest): TransferHandle {
    const plan = this.plan(this.added.length);
    this.added.push(request);
    const handle = new TransferHandle(++this.serial);
    this.active.push({ handle, remaining: plan.performs ?? 1, code: plan.code ?? "ok" });
    return handle;
  }

  perform(): number {
    const still: ActiveTransfer[] = [];
    for (const transfer of this.active) {
      transfer.remaining--;
      if (transfer.remaining > 0) {
        still.push(transfer);
        continue;
      }
      this.completions.push(
        transfer.code === "ok"
          ? { handle: transfer.handle, code: "ok", status: 200 }
          : { handle: transfer.handle, code: transfer.code, error: new Error(transfer.code) },
      );
    }
    this.active = still;
    return this.active.length;
  }

  readCompletion(): Completion | null {
    return this.completions.shift() ?? null;
  }

  timeoutHint(): number {
    return this.hint;
  }

  async wait(timeoutMs: number): Promise<WaitOutcome> {
    if (this.closed) throw new WaitError("Engine is closed");
    this.waits.push(timeoutMs);
    const next = this.waitOutcomes.shift();
    if (next instanceof Error) throw next;
    return next ?? "ready";
  }

  close(): void {
    this.closed = true;
  }

  /** Queue a completion for a handle this engine never issued */
  injectForeign(code: TransferCode = "ok"): TransferHandle {
    const handle = new TransferHandle(-1);
    this.completions.push({ handle, code });
    return handle;
  }
}
