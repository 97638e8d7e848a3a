/**
 * Transfer slot table.
 *
 * Every request of a run is described up front. A descriptor is handed to
 * the engine exactly once, bound to the handle the engine returns, and
 * released when its completion has been observed.
 */
import { REQUEST_ID_HEADER, SLEEP_HEADER } from "../http1/control.js";
import type { TransferHandle } from "../engine/types.js";
import { formatUrl } from "../utils/url.js";
import { sleepFor, timeoutFor, type ClientConfig, type HeaderList } from "./config.js";

export interface RequestDescriptor {
  /** 0..N-1, also sent as X-Request */
  readonly id: number;
  readonly url: string;
  readonly timeoutMs: number;
  readonly headers: HeaderList;
}

export type SlotState = "prepared" | "in-flight" | "done";

interface Slot {
  descriptor: RequestDescriptor | null;
  state: SlotState;
  handle: TransferHandle | null;
}

export function buildRequestDescriptors(config: ClientConfig): RequestDescriptor[] {
  const url = formatUrl(config.host, config.port);
  const descriptors: RequestDescriptor[] = [];

  for (let id = 0; id < config.total; id++) {
    const headers: Array<readonly [string, string]> = [];
    const sleep = sleepFor(config, id);
    if (sleep !== null) headers.push([SLEEP_HEADER, String(sleep)]);
    headers.push([REQUEST_ID_HEADER, String(id)]);
    headers.push(...(config.extraHeaders.get(id) ?? []));

    descriptors.push({ id, url, timeoutMs: timeoutFor(config, id), headers });
  }

  return descriptors;
}

export class TransferSlotTable {
  private readonly slots: Slot[];
  private readonly byHandle = new Map<TransferHandle, number>();

  constructor(descriptors: readonly RequestDescriptor[]) {
    this.slots = descriptors.map((descriptor, index): Slot => {
      if (descriptor.id !== index) {
        throw new Error(`Descriptor at position ${index} has id ${descriptor.id}`);
      }
      return { descriptor, state: "prepared", handle: null };
    });
  }

  get size(): number {
    return this.slots.length;
  }

  state(id: number): SlotState {
    return this.slot(id).state;
  }

  /** Take a prepared descriptor for submission; each can be taken once */
  take(id: number): RequestDescriptor {
    const slot = this.slot(id);
    if (slot.state !== "prepared" || !slot.descriptor) {
      throw new Error(`Request #${id} was already submitted`);
    }
    slot.state = "in-flight";
    return slot.descriptor;
  }

  bind(id: number, handle: TransferHandle): void {
    const slot = this.slot(id);
    if (slot.state !== "in-flight") {
      throw new Error(`Request #${id} is not in flight`);
    }
    slot.handle = handle;
    this.byHandle.set(handle, id);
  }

  /** Which in-flight request a handle belongs to, or null for an unknown handle */
  resolve(handle: TransferHandle): RequestDescriptor | null {
    const id = this.byHandle.get(handle);
    if (id === undefined) return null;
    return this.slots[id].descriptor;
  }

  /** Drop the descriptor and its handle binding after completion */
  release(id: number): void {
    const slot = this.slot(id);
    if (slot.handle) this.byHandle.delete(slot.handle);
    slot.handle = null;
    slot.descriptor = null;
    slot.state = "done";
  }

  private slot(id: number): Slot {
    const slot = this.slots[id];
    if (!slot) throw new Error(`No request #${id} (table holds ${this.slots.length})`);
    return slot;
  }
}
