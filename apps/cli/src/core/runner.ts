import { createReadStream } from "fs";
import { once } from "events";
import type { Readable, Writable } from "stream";
import {
  DEFAULT_CSV_FIELD_SEPARATOR,
  DEFAULT_CSV_RECORD_SEPARATOR,
  DEFAULT_QUOTING_STYLE,
  isQuotingStyle,
  quoteLinesAsync,
  type QuoteOptions,
  type QuotingStyle,
} from "@linequote/shared";
import type { LinequoteConfig } from "@/core/config.ts";
import { readLines } from "@/core/line-reader.ts";
import {
  NEWLINE_DELIMITER,
  NULL_DELIMITER,
  STDIN_FILE,
  STDIN_NAME,
} from "@/lib/constants.ts";
import {
  InputError,
  LinequoteError,
  UnknownStyleError,
  errorMessage,
} from "@/lib/errors.ts";
import { printError } from "@/lib/theme.ts";

/** Flags as commander hands them to the action. */
export interface QuoteCommandOptions {
  quotingStyle?: string;
  null?: boolean;
  fieldSeparator?: string;
  recordSeparator?: string;
}

export interface RunOptions {
  style: QuotingStyle;
  delimiter: string;
  quoteOptions: QuoteOptions;
}

export interface QuoteIO {
  stdin: Readable;
  stdout: Writable;
}

/**
 * Merge flags over the config file over built-in defaults. The style is
 * validated here, before any input is read.
 */
export function resolveRunOptions(
  options: QuoteCommandOptions,
  config: LinequoteConfig | null,
): RunOptions {
  const style =
    options.quotingStyle ??
    config?.defaults.quoting_style ??
    DEFAULT_QUOTING_STYLE;
  if (!isQuotingStyle(style)) {
    throw new UnknownStyleError(style);
  }

  const useNull = options.null ?? config?.defaults.null ?? false;

  return {
    style,
    delimiter: useNull ? NULL_DELIMITER : NEWLINE_DELIMITER,
    quoteOptions: {
      fieldSeparator:
        options.fieldSeparator ??
        config?.csv.field_separator ??
        DEFAULT_CSV_FIELD_SEPARATOR,
      recordSeparator:
        options.recordSeparator ??
        config?.csv.record_separator ??
        DEFAULT_CSV_RECORD_SEPARATOR,
    },
  };
}

/**
 * A reader that goes away (`linequote big.txt | head -1`) ends the run
 * quietly; any other write failure is reported.
 */
export function handleOutputErrors(
  output: Writable,
  exit: (code: number) => void = process.exit,
): void {
  output.on("error", (error: Error) => {
    if ("code" in error && error.code === "EPIPE") {
      exit(0);
      return;
    }
    printError(errorMessage(error));
    exit(1);
  });
}

async function write(output: Writable, chunk: string): Promise<void> {
  if (!output.write(chunk)) {
    await once(output, "drain");
  }
}

/** Quote every line of one input, writing each followed by the delimiter. */
export async function quoteInput(
  input: AsyncIterable<Uint8Array | string>,
  output: Writable,
  options: RunOptions,
  name: string = STDIN_NAME,
): Promise<void> {
  const lines = readLines(input, { delimiter: options.delimiter, name });
  for await (const quoted of quoteLinesAsync(
    lines,
    options.style,
    options.quoteOptions,
  )) {
    await write(output, quoted + options.delimiter);
  }
}

async function quoteFile(
  file: string,
  output: Writable,
  options: RunOptions,
): Promise<void> {
  const stream = createReadStream(file);
  try {
    await quoteInput(stream, output, options, file);
  } catch (error) {
    if (error instanceof LinequoteError) throw error;
    throw new InputError(file, errorMessage(error));
  } finally {
    stream.destroy();
  }
}

/**
 * Quote each file in order, `-` meaning standard input. The first input that
 * fails stops the run; later files are not opened.
 */
export async function runQuote(
  files: readonly string[],
  options: RunOptions,
  io: QuoteIO,
): Promise<void> {
  const inputs = files.length > 0 ? files : [STDIN_FILE];

  for (const file of inputs) {
    if (file === STDIN_FILE) {
      await quoteInput(io.stdin, io.stdout, options);
    } else {
      await quoteFile(file, io.stdout, options);
    }
  }
}
