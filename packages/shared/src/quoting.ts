import {
  DEFAULT_CSV_FIELD_SEPARATOR,
  DEFAULT_CSV_RECORD_SEPARATOR,
} from "./constants.ts";
import { escapeCharToOctal } from "./escaper.ts";
import type { CsvOptions } from "./types.ts";

/**
 * Characters that must be quoted to stand for themselves in a POSIX shell.
 * https://pubs.opengroup.org/onlinepubs/9699919799/utilities/V3_chap02.html#tag_18_02
 */
const SHELL_SPECIAL = /[\t\n "#$%&'()*;<=>?[\\`|~]/;

// Anything outside printable ASCII (0x20-0x7E), one code point at a time.
const NON_PRINTABLE_ASCII = /[^\x20-\x7E]/gu;
const HAS_NON_PRINTABLE_ASCII = /[^\x20-\x7E]/u;

// `??` followed by a trigraph's third character.
const TRIGRAPHS = /\?\?([!'()\-\/<=>])/g;
const HAS_TRIGRAPH = /\?\?[!'()\-\/<=>]/;

const CSV_EDGE_WHITESPACE = /^[ \t\n\r\v\f]|[ \t\n\r\v\f]$/;

const escapeNonPrintableAscii = (s: string) =>
  s.replace(NON_PRINTABLE_ASCII, (ch) => escapeCharToOctal(ch));

/** Do not quote the line. */
export function literal(s: string): string {
  return s;
}

/**
 * Quote for a shell in all cases. Single quotes close the quoted run, add an
 * escaped quote and reopen it: it's → 'it'\''s'
 */
export function shellAlways(s: string): string {
  return "'" + s.replaceAll("'", "'\\''") + "'";
}

/** Quote for a shell only when the line holds a character the shell would interpret. */
export function shell(s: string): string {
  return SHELL_SPECIAL.test(s) ? shellAlways(s) : s;
}

export function escape(s: string): string {
  return escapeNonPrintableAscii(s.replace(/[ \\]/g, "\\$&"));
}

/**
 * Quote as a C string literal. The second `?` of what would read as a
 * trigraph is escaped: ??! → ?\?!
 */
export function c(s: string): string {
  const escaped = escapeNonPrintableAscii(s.replace(/["\\]/g, "\\$&")).replace(
    TRIGRAPHS,
    "?\\?$1",
  );
  return `"${escaped}"`;
}

/** Like {@link c}, but lines with nothing to escape come back untouched. */
export function cMaybe(s: string): string {
  const needsQuoting =
    /["\\]/.test(s) || HAS_NON_PRINTABLE_ASCII.test(s) || HAS_TRIGRAPH.test(s);
  return needsQuoting ? c(s) : s;
}

/** Escape for a Perl Compatible Regular Expression. */
export function pcre(s: string): string {
  return s.replace(/[^A-Za-z0-9_]/gu, "\\$&");
}

/**
 * Quote as a CSV field.
 *
 * A double quote anywhere wins: quotes are doubled and the field wrapped.
 * Otherwise the field is wrapped, unchanged, when it holds either separator or
 * starts or ends with whitespace.
 */
export function csv(s: string, options: CsvOptions = {}): string {
  const {
    fieldSeparator = DEFAULT_CSV_FIELD_SEPARATOR,
    recordSeparator = DEFAULT_CSV_RECORD_SEPARATOR,
  } = options;

  if (s.includes('"')) {
    return '"' + s.replaceAll('"', '""') + '"';
  }

  if (
    s.includes(fieldSeparator) ||
    s.includes(recordSeparator) ||
    CSV_EDGE_WHITESPACE.test(s)
  ) {
    return '"' + s + '"';
  }

  return s;
}
