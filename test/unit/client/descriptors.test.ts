import { describe, it, expect } from "vitest";
import { resolveClientConfig } from "../../../src/client/config.js";
import { TransferSlotTable, buildRequestDescriptors } from "../../../src/client/descriptors.js";
import { TransferHandle } from "../../../src/engine/types.js";
import { makeDescriptors } from "../../helpers/descriptors.js";

describe("buildRequestDescriptors", () => {
  const descriptors = buildRequestDescriptors(resolveClientConfig());

  it("should describe every request of the run", () => {
    expect(descriptors.map(d => d.id)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(descriptors[0].url).toBe("http://localhost:9001/");
  });

  it("should send the warm-up request without a delay", () => {
    expect(descriptors[0].headers).toEqual([["X-Request", "0"]]);
  });

  it("should put X-Sleep before X-Request", () => {
    expect(descriptors[1].headers).toEqual([
      ["X-Sleep", "1100"],
      ["X-Request", "1"],
    ]);
    expect(descriptors[2].headers).toEqual([
      ["X-Sleep", "100"],
      ["X-Request", "2"],
    ]);
  });

  it("should carry per-request timeouts", () => {
    expect(descriptors.map(d => d.timeoutMs)).toEqual([
      1000, 1000, 1000, 10_000, 1000, 1000, 1000, 1000, 1000, 1000,
    ]);
  });

  it("should append extra headers after the control headers", () => {
    const config = resolveClientConfig({
      total: 4,
      extraHeaders: new Map([[2, [["X-Disconnect", "1"]] as const]]),
    });
    expect(buildRequestDescriptors(config)[2].headers).toEqual([
      ["X-Sleep", "100"],
      ["X-Request", "2"],
      ["X-Disconnect", "1"],
    ]);
  });

  it("should bracket an IPv6 host", () => {
    const config = resolveClientConfig({ host: "::1", total: 4 });
    expect(buildRequestDescriptors(config)[0].url).toBe("http://[::1]:9001/");
  });
});

describe("TransferSlotTable", () => {
  it("should hand out each descriptor once", () => {
    const table = new TransferSlotTable(makeDescriptors(2));
    expect(table.take(0).id).toBe(0);
    expect(table.state(0)).toBe("in-flight");
    expect(() => table.take(0)).toThrow("Request #0 was already submitted");
  });

  it("should resolve a bound handle back to its request", () => {
    const table = new TransferSlotTable(makeDescriptors(2));
    const handle = new TransferHandle(7);
    table.take(1);
    table.bind(1, handle);

    expect(table.resolve(handle)?.id).toBe(1);
    expect(table.resolve(new TransferHandle(7))).toBeNull();
  });

  it("should forget a request once released", () => {
    const table = new TransferSlotTable(makeDescriptors(1));
    const handle = new TransferHandle(1);
    table.take(0);
    table.bind(0, handle);
    table.release(0);

    expect(table.state(0)).toBe("done");
    expect(table.resolve(handle)).toBeNull();
    expect(() => table.take(0)).toThrow("Request #0 was already submitted");
  });

  it("should refuse to bind a request that was not taken", () => {
    const table = new TransferSlotTable(makeDescriptors(2));
    expect(() => table.bind(1, new TransferHandle(1))).toThrow("Request #1 is not in flight");
  });

  it("should reject ids outside the table", () => {
    const table = new TransferSlotTable(makeDescriptors(2));
    expect(table.size).toBe(2);
    expect(() => table.take(5)).toThrow("No request #5 (table holds 2)");
  });

  it("should require descriptors in id order", () => {
    const [first, second] = makeDescriptors(2);
    expect(() => new TransferSlotTable([second, first])).toThrow("Descriptor at position 0 has id 1");
  });
});
