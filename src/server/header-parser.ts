/**
 * Header/control line parser.
 *
 * Recognizes one `key: value\r\n` line at a time:
 *
 *   begin --c--> key --':'--> colon --' '--> value --'\r'--> carriage-return --'\n'--> matched
 *
 * Anything other than a single space after the colon, or anything other than
 * LF after CR, flags the line as malformed; a malformed line is dropped at its
 * LF. LF in any state other than the final transition resets the parser, so
 * request lines and stray bytes never leak into the next field.
 */

export type HeaderParserPhase = "begin" | "key" | "colon" | "value" | "carriage-return" | "matched";

export interface HeaderParserState {
  readonly phase: HeaderParserPhase;
  readonly key: string;
  readonly value: string;
  readonly malformed: boolean;
}

export const HEADER_PARSER_START: HeaderParserState = {
  phase: "begin",
  key: "",
  value: "",
  malformed: false,
};

const COLON = 0x3a;
const SPACE = 0x20;
const CR = 0x0d;
const LF = 0x0a;

/** A complete field, as produced by the parser on reaching `matched` */
export interface HeaderField {
  key: string;
  value: string;
}

/**
 * Advance the parser by one byte. Pure: returns the next state.
 */
export function stepHeader(current: HeaderParserState, byte: number): HeaderParserState {
  // A matched field is reported once; the next byte starts a new line
  const state = current.phase === "matched" ? HEADER_PARSER_START : current;
  const next = transition(state, byte);
  if (byte === LF && next.phase !== "matched") {
    return HEADER_PARSER_START;
  }
  return next;
}

function transition(state: HeaderParserState, byte: number): HeaderParserState {
  const char = String.fromCharCode(byte);
  switch (state.phase) {
    case "begin":
      return { ...state, phase: "key", key: state.key + char };
    case "key":
      if (byte === COLON) return { ...state, phase: "colon" };
      return { ...state, key: state.key + char };
    case "colon":
      if (byte === SPACE) return { ...state, phase: "value" };
      return { ...state, malformed: true };
    case "value":
      if (byte === CR) return { ...state, phase: "carriage-return" };
      return { ...state, value: state.value + char };
    case "carriage-return":
      if (byte === LF) {
        return state.malformed ? HEADER_PARSER_START : { ...state, phase: "matched" };
      }
      return { ...state, malformed: true };
    case "matched":
      return state;
  }
}

export class HeaderLineParser {
  private state: HeaderParserState = HEADER_PARSER_START;

  get phase(): HeaderParserPhase {
    return this.state.phase;
  }

  get matched(): boolean {
    return this.state.phase === "matched";
  }

  /** The field completed by the last fed byte, or null */
  get field(): HeaderField | null {
    return this.matched ? { key: this.state.key, value: this.state.value } : null;
  }

  get snapshot(): HeaderParserState {
    return this.state;
  }

  feed(byte: number): boolean {
    this.state = stepHeader(this.state, byte);
    return this.matched;
  }

  reset(): void {
    this.state = HEADER_PARSER_START;
  }
}
