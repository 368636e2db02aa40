export type QuotingStyle =
  | "literal"
  | "shell-always"
  | "shell"
  | "escape"
  | "c"
  | "c-maybe"
  | "pcre"
  | "csv";

/** How a character without a mnemonic is rendered numerically. */
export type EscapeMode = "octal" | "hexadecimal";

export interface CsvOptions {
  /** Defaults to `,` */
  fieldSeparator?: string;
  /** Defaults to `\n` */
  recordSeparator?: string;
}

/**
 * Options threaded through every quoting function. Only the csv style reads
 * them today; the rest ignore the argument.
 */
export type QuoteOptions = CsvOptions;

export type QuotingFunction = (s: string, options?: QuoteOptions) => string;
