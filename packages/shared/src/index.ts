export {
  QUOTING_STYLES,
  DEFAULT_QUOTING_STYLE,
  DEFAULT_CSV_FIELD_SEPARATOR,
  DEFAULT_CSV_RECORD_SEPARATOR,
  STYLE_DESCRIPTIONS,
} from "./constants.ts";
export { QuotingError, InvalidCharacterError } from "./errors.ts";
export {
  SIMPLE_ESCAPE_SEQUENCES,
  isPrintable,
  escapeCharToOctal,
  escapeCharToHexadecimal,
  escapeNonPrintableChar,
  escapeNonPrintableCharToOctal,
  escapeNonPrintableCharToHexadecimal,
} from "./escaper.ts";
export {
  literal,
  shellAlways,
  shell,
  escape,
  c,
  cMaybe,
  pcre,
  csv,
} from "./quoting.ts";
export {
  isQuotingStyle,
  listStyleNames,
  lookupQuotingStyle,
  quoteWithStyle,
} from "./registry.ts";
export { quote, quoteLines, quoteLinesAsync } from "./line-quoter.ts";
export type {
  QuotingStyle,
  EscapeMode,
  CsvOptions,
  QuoteOptions,
  QuotingFunction,
} from "./types.ts";
