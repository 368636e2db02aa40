import { lookupQuotingStyle } from "./registry.ts";
import type { QuoteOptions, QuotingFunction } from "./types.ts";

const passthrough: QuotingFunction = (s) => s;

/**
 * Quote one line. An unknown style leaves the line as it is; callers that
 * take style names from users validate them with `isQuotingStyle` first.
 */
export function quote(
  line: string,
  styleName: string,
  options?: QuoteOptions,
): string {
  return (lookupQuotingStyle(styleName) ?? passthrough)(line, options);
}

/** Lazily quote each line in order. Nothing is buffered. */
export function* quoteLines(
  lines: Iterable<string>,
  styleName: string,
  options?: QuoteOptions,
): Generator<string, void, undefined> {
  const quoteLine = lookupQuotingStyle(styleName) ?? passthrough;
  for (const line of lines) {
    yield quoteLine(line, options);
  }
}

export async function* quoteLinesAsync(
  lines: AsyncIterable<string>,
  styleName: string,
  options?: QuoteOptions,
): AsyncGenerator<string, void, undefined> {
  const quoteLine = lookupQuotingStyle(styleName) ?? passthrough;
  for await (const line of lines) {
    yield quoteLine(line, options);
  }
}
