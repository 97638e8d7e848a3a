/**
 * Render raw HTTP bytes for logs: one output line per wire line, with CR and
 * LF made visible.
 */
import { Buffer } from "node:buffer";

export const READING_PREFIX = "    < ";
export const WRITING_PREFIX = "    > ";

export function formatWireLines(data: Buffer, prefix: string): string[] {
  const lines: string[] = [];
  let current = "";
  for (const byte of data) {
    if (byte === 0x0d) {
      current += "\\r";
    } else if (byte === 0x0a) {
      lines.push(`${prefix}${current}\\n`);
      current = "";
    } else {
      current += String.fromCharCode(byte);
    }
  }
  if (current.length > 0) lines.push(`${prefix}${current}`);
  return lines;
}
