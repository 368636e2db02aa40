import type { Command } from "commander";
import {
  DEFAULT_QUOTING_STYLE,
  STYLE_DESCRIPTIONS,
  listStyleNames,
} from "@linequote/shared";
import { loadConfig } from "@/core/config.ts";
import {
  resolveRunOptions,
  runQuote,
  type QuoteCommandOptions,
} from "@/core/runner.ts";
import { errorMessage } from "@/lib/errors.ts";
import { formatDetail, formatSectionHeader, printError } from "@/lib/theme.ts";

function formatStyleHelp(): string {
  const names = listStyleNames();
  const width = Math.max(...names.map((name) => name.length)) + 2;
  const lines = names.map((name) =>
    formatDetail(name.padEnd(width), STYLE_DESCRIPTIONS[name]),
  );
  return [formatSectionHeader("Quoting styles"), ...lines].join("\n");
}

export function registerQuoteCommand(program: Command) {
  program
    .argument("[file...]", "files to quote; '-' or none reads standard input")
    .option(
      "-q, --quoting-style <style>",
      `quoting style (default: ${DEFAULT_QUOTING_STYLE}; valid: ${listStyleNames().join(", ")})`,
    )
    .option("-0, --null", "use NUL as the line delimiter instead of newline")
    .option("--field-separator <sep>", 'csv field separator (default: ",")')
    .option(
      "--record-separator <sep>",
      "csv record separator (default: newline)",
    )
    .addHelpText("after", formatStyleHelp())
    .action(async (files: string[], options: QuoteCommandOptions) => {
      try {
        const runOptions = resolveRunOptions(options, loadConfig());
        await runQuote(files, runOptions, {
          stdin: process.stdin,
          stdout: process.stdout,
        });
      } catch (error) {
        printError(errorMessage(error));
        process.exit(1);
      }
    });
}
