import { describe, it, expect } from "vitest";
import { Buffer } from "node:buffer";
import {
  HEADER_PARSER_START,
  HeaderLineParser,
  stepHeader,
  type HeaderField,
  type HeaderParserState,
} from "../../../src/server/header-parser.js";

function fields(parser: HeaderLineParser, text: string): HeaderField[] {
  const found: HeaderField[] = [];
  for (const byte of Buffer.from(text, "latin1")) {
    parser.feed(byte);
    const field = parser.field;
    if (field) found.push(field);
  }
  return found;
}

function run(state: HeaderParserState, text: string): HeaderParserState {
  let current = state;
  for (const byte of Buffer.from(text, "latin1")) current = stepHeader(current, byte);
  return current;
}

describe("stepHeader", () => {
  it("should walk through every phase of a well-formed line", () => {
    const phases: string[] = [];
    let state = HEADER_PARSER_START;
    for (const byte of Buffer.from("K: v\r\n")) {
      state = stepHeader(state, byte);
      phases.push(state.phase);
    }
    expect(phases).toEqual(["key", "colon", "value", "value", "carriage-return", "matched"]);
    expect(state).toEqual({ phase: "matched", key: "K", value: "v", malformed: false });
  });

  it("should not mutate the state it is given", () => {
    const before = run(HEADER_PARSER_START, "X-Sle");
    const after = stepHeader(before, 0x65);
    expect(before.key).toBe("X-Sle");
    expect(after.key).toBe("X-Slee");
  });

  it("should start a new line on the byte after a match", () => {
    const matched = run(HEADER_PARSER_START, "A: 1\r\n");
    expect(stepHeader(matched, 0x42)).toEqual({
      phase: "key",
      key: "B",
      value: "",
      malformed: false,
    });
  });

  it("should flag a missing space after the colon", () => {
    const state = run(HEADER_PARSER_START, "X-Sleep:1");
    expect(state.phase).toBe("colon");
    expect(state.malformed).toBe(true);
  });

  it("should flag CR followed by something other than LF", () => {
    const state = run(HEADER_PARSER_START, "A: 1\rx");
    expect(state.phase).toBe("carriage-return");
    expect(state.malformed).toBe(true);
  });

  it("should reset on LF in any unmatched state", () => {
    expect(run(HEADER_PARSER_START, "GET / HTTP/1.1\r\n")).toEqual(HEADER_PARSER_START);
    expect(run(HEADER_PARSER_START, "X-Sleep:1\r\n")).toEqual(HEADER_PARSER_START);
    expect(run(HEADER_PARSER_START, "A: 1\rx\n")).toEqual(HEADER_PARSER_START);
  });
});

describe("HeaderLineParser", () => {
  it("should report each header line of a request", () => {
    const parser = new HeaderLineParser();
    const found = fields(
      parser,
      "GET / HTTP/1.1\r\nHost: localhost:9001\r\nX-Sleep: 100\r\nX-Request: 3\r\n\r\n",
    );
    expect(found).toEqual([
      { key: "Host", value: "localhost:9001" },
      { key: "X-Sleep", value: "100" },
      { key: "X-Request", value: "3" },
    ]);
  });

  it("should keep colons inside the value", () => {
    const parser = new HeaderLineParser();
    expect(fields(parser, "Host: [::1]:9001\r\n")).toEqual([{ key: "Host", value: "[::1]:9001" }]);
  });

  it("should discard a malformed line and still parse the next one", () => {
    const parser = new HeaderLineParser();
    const found = fields(parser, "X-Sleep:500\r\nX-Request: 7\r\n");
    expect(found).toEqual([{ key: "X-Request", value: "7" }]);
  });

  it("should keep a second space after the colon in the value", () => {
    const parser = new HeaderLineParser();
    expect(fields(parser, "X-Request:  7\r\n")).toEqual([{ key: "X-Request", value: " 7" }]);
  });

  it("should behave like a fresh parser after reset", () => {
    const used = new HeaderLineParser();
    fields(used, "X-Slee");
    used.reset();

    const fresh = new HeaderLineParser();
    const stream = "X-Sleep: 5\r\nBad:x\r\nX-Request: 2\r\n";
    expect(fields(used, stream)).toEqual(fields(fresh, stream));
    expect(used.snapshot).toEqual(fresh.snapshot);
  });
});
