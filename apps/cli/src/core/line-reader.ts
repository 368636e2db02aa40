import { TextDecoder } from "util";
import { InputDecodeError } from "@/lib/errors.ts";

export interface ReadLinesOptions {
  delimiter: string;
  /** Names the input in decode errors. */
  name: string;
}

// Text-mode newline translation: \r\n and a lone \r both read as \n
const NEWLINE_SEQUENCE = /\r\n?/g;

function decodeChunk(
  decoder: TextDecoder,
  chunk: Uint8Array | undefined,
  name: string,
): string {
  try {
    return chunk ? decoder.decode(chunk, { stream: true }) : decoder.decode();
  } catch {
    throw new InputDecodeError(name);
  }
}

/**
 * Split a byte stream into lines as chunks arrive.
 *
 * Newlines are translated to `\n` before splitting, so with the default
 * delimiter `\r\n` and `\r` end lines too, and with a custom delimiter they
 * come through as `\n` inside records. A delimiter at the very end does not
 * produce a trailing empty line; empty lines between delimiters are kept.
 */
export async function* readLines(
  chunks: AsyncIterable<Uint8Array | string>,
  { delimiter, name }: ReadLinesOptions,
): AsyncGenerator<string, void, undefined> {
  const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });
  // Text of the current line seen so far, none of it holding a delimiter
  let pending: string[] = [];
  // A trailing \r may be the first half of \r\n
  let heldCR = "";

  function* split(text: string): Generator<string, void, undefined> {
    const parts = text.replace(NEWLINE_SEQUENCE, "\n").split(delimiter);
    const last = parts.pop() ?? "";
    for (const part of parts) {
      pending.push(part);
      yield pending.join("");
      pending = [];
    }
    if (last !== "") pending.push(last);
  }

  for await (const chunk of chunks) {
    let text =
      heldCR +
      (typeof chunk === "string" ? chunk : decodeChunk(decoder, chunk, name));
    heldCR = "";
    if (text.endsWith("\r")) {
      heldCR = "\r";
      text = text.slice(0, -1);
    }
    yield* split(text);
  }

  yield* split(heldCR + decodeChunk(decoder, undefined, name));

  const rest = pending.join("");
  if (rest !== "") yield rest;
}
