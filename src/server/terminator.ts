/**
 * End-of-request matcher.
 * Literal matcher for the blank line that closes one pipelined request head.
 */
import { Buffer } from "node:buffer";
import { DOUBLE_CRLF } from "../http1/parser.js";

/** Number of leading bytes of the sequence matched so far */
export type TerminatorState = number;

export const TERMINATOR_START: TerminatorState = 0;

/**
 * Advance the matcher by one byte.
 *
 * A mismatched byte sends the matcher back to the start without being
 * re-examined as a possible first byte. A completed match starts over on the
 * next byte.
 */
export function stepTerminator(
  state: TerminatorState,
  byte: number,
  sequence: Uint8Array = DOUBLE_CRLF,
): TerminatorState {
  const position = state >= sequence.length ? 0 : state;
  return byte === sequence[position] ? position + 1 : TERMINATOR_START;
}

export class TerminatorMatcher {
  private state: TerminatorState = TERMINATOR_START;
  private readonly sequence: Buffer;

  constructor(sequence: Uint8Array = DOUBLE_CRLF) {
    if (sequence.length === 0) {
      throw new Error("Terminator sequence must not be empty");
    }
    this.sequence = Buffer.from(sequence);
  }

  /** Whether the last fed byte completed the sequence */
  get matched(): boolean {
    return this.state === this.sequence.length;
  }

  get position(): TerminatorState {
    return this.state;
  }

  feed(byte: number): boolean {
    this.state = stepTerminator(this.state, byte, this.sequence);
    return this.matched;
  }

  reset(): void {
    this.state = TERMINATOR_START;
  }
}
