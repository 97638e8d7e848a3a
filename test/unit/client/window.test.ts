import { describe, it, expect } from "vitest";
import { createWindowState, hasCapacity, isFinished, snapshotWindow } from "../../../src/client/window.js";

describe("pipeline window", () => {
  it("should start empty", () => {
    expect(createWindowState(10)).toEqual({ added: 0, running: 0, total: 10 });
  });

  it("should have capacity while below the window and requests remain", () => {
    expect(hasCapacity({ added: 3, running: 3, total: 10 }, 4)).toBe(true);
    expect(hasCapacity({ added: 4, running: 4, total: 10 }, 4)).toBe(false);
    expect(hasCapacity({ added: 10, running: 1, total: 10 }, 4)).toBe(false);
  });

  it("should finish only when everything was added and nothing runs", () => {
    expect(isFinished({ added: 10, running: 0, total: 10 })).toBe(true);
    expect(isFinished({ added: 10, running: 1, total: 10 })).toBe(false);
    expect(isFinished({ added: 6, running: 0, total: 10 })).toBe(false);
  });

  it("should snapshot without aliasing the live state", () => {
    const state = createWindowState(2);
    const snapshot = snapshotWindow(state);
    state.added = 1;
    state.running = 1;
    expect(snapshot).toEqual({ added: 0, running: 0, total: 2 });
  });
});
