import { QUOTING_STYLES } from "./constants.ts";
import {
  c,
  cMaybe,
  csv,
  escape,
  literal,
  pcre,
  shell,
  shellAlways,
} from "./quoting.ts";
import type { QuoteOptions, QuotingFunction, QuotingStyle } from "./types.ts";

const SORTED_STYLE_NAMES: readonly QuotingStyle[] = Object.freeze(
  [...QUOTING_STYLES].sort(),
);

export function isQuotingStyle(name: string): name is QuotingStyle {
  return QUOTING_STYLES.some((style) => style === name);
}

/** Style names in alphabetical order, as shown in help and error messages. */
export function listStyleNames(): readonly QuotingStyle[] {
  return SORTED_STYLE_NAMES;
}

export function quoteWithStyle(
  style: QuotingStyle,
  s: string,
  options: QuoteOptions = {},
): string {
  switch (style) {
    case "literal":
      return literal(s);
    case "shell-always":
      return shellAlways(s);
    case "shell":
      return shell(s);
    case "escape":
      return escape(s);
    case "c":
      return c(s);
    case "c-maybe":
      return cMaybe(s);
    case "pcre":
      return pcre(s);
    case "csv":
      return csv(s, options);
  }
}

export function lookupQuotingStyle(name: string): QuotingFunction | undefined {
  if (!isQuotingStyle(name)) return undefined;
  return (s, options) => quoteWithStyle(name, s, options);
}
