import type { QuotingStyle } from "./types.ts";

export const QUOTING_STYLES: readonly QuotingStyle[] = [
  "literal",
  "shell-always",
  "shell",
  "escape",
  "c",
  "c-maybe",
  "pcre",
  "csv",
];

export const DEFAULT_QUOTING_STYLE: QuotingStyle = "literal";

export const DEFAULT_CSV_FIELD_SEPARATOR = ",";
export const DEFAULT_CSV_RECORD_SEPARATOR = "\n";

/** Shown next to each style name in `--help`. */
export const STYLE_DESCRIPTIONS: Readonly<Record<QuotingStyle, string>> = {
  literal: "Do not quote the line.",
  "shell-always":
    "Escape single quotes and surround the line with single quotes.",
  shell:
    "Quote like shell-always, but only when the line contains a POSIX shell special character.",
  escape: "Escape spaces, backslashes and non-printable characters.",
  c: "Quote as a C string literal: escape double quotes, backslashes, non-printable characters and trigraphs.",
  "c-maybe": "Quote like c, but only when something needs escaping.",
  pcre: "Escape every character that is not a letter, digit or underscore for a PCRE.",
  csv: "Quote as a CSV field when the line holds a double quote, a separator, or leading/trailing whitespace.",
};
