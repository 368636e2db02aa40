import { InvalidCharacterError } from "./errors.ts";
import type { EscapeMode } from "./types.ts";

/**
 * simple-escape-sequence, as listed for character literals in the C and C++
 * standards:
 *
 *   \' \" \? \\ \a \b \f \n \r \t \v
 */
export const SIMPLE_ESCAPE_SEQUENCES: ReadonlyMap<string, string> = new Map([
  ["\x07", "\\a"], // alert
  ["\b", "\\b"], // backspace
  ["\t", "\\t"], // horizontal tab
  ["\n", "\\n"], // new line
  ["\v", "\\v"], // vertical tab
  ["\f", "\\f"], // form feed
  ["\r", "\\r"], // carriage return
  ['"', '\\"'],
  ["'", "\\'"],
  ["?", "\\?"],
  ["\\", "\\\\"],
]);

// Control, format, surrogate, private-use, unassigned and separator code points.
const NON_PRINTABLE = /^[\p{C}\p{Z}]$/u;

/** Highest code point rendered as one numeric escape; above it, one per UTF-8 byte. */
const MAX_SINGLE_ESCAPE = 0xff;

const utf8 = new TextEncoder();

function codePointOf(c: string): number {
  const codePoint = c.codePointAt(0);
  if (codePoint === undefined || String.fromCodePoint(codePoint) !== c) {
    throw new InvalidCharacterError(c);
  }
  return codePoint;
}

function escapeNumeric(c: string, render: (value: number) => string): string {
  const codePoint = codePointOf(c);
  if (codePoint <= MAX_SINGLE_ESCAPE) return render(codePoint);
  return Array.from(utf8.encode(c), render).join("");
}

const toOctal = (value: number) => "\\" + value.toString(8).padStart(3, "0");

const toHexadecimal = (value: number) =>
  "\\x" + value.toString(16).toUpperCase().padStart(2, "0");

export function isPrintable(c: string): boolean {
  codePointOf(c);
  return c === " " || !NON_PRINTABLE.test(c);
}

/** Escape to a simple-escape-sequence or an octal-escape-sequence. */
export function escapeCharToOctal(c: string): string {
  return SIMPLE_ESCAPE_SEQUENCES.get(c) ?? escapeNumeric(c, toOctal);
}

/** Escape to a simple-escape-sequence or a hexadecimal-escape-sequence. */
export function escapeCharToHexadecimal(c: string): string {
  return SIMPLE_ESCAPE_SEQUENCES.get(c) ?? escapeNumeric(c, toHexadecimal);
}

export function escapeNonPrintableChar(c: string, mode: EscapeMode): string {
  if (isPrintable(c)) return c;
  return mode === "octal" ? escapeCharToOctal(c) : escapeCharToHexadecimal(c);
}

export function escapeNonPrintableCharToOctal(c: string): string {
  return escapeNonPrintableChar(c, "octal");
}

export function escapeNonPrintableCharToHexadecimal(c: string): string {
  return escapeNonPrintableChar(c, "hexadecimal");
}
