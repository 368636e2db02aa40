#!/usr/bin/env tsx
import { Command } from "commander";
import { registerQuoteCommand } from "./src/commands/quote.ts";
import { handleOutputErrors } from "./src/core/runner.ts";
import { PROGRAM_NAME } from "./src/lib/constants.ts";
import { errorMessage } from "./src/lib/errors.ts";
import { printError } from "./src/lib/theme.ts";
import pkg from "./package.json" with { type: "json" };

// Interrupt and termination end the run quietly
for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => process.exit(0));
}

handleOutputErrors(process.stdout);

async function main() {
  const program = new Command();

  program
    .version(pkg.version)
    .name(PROGRAM_NAME)
    .description("Quote the lines of each FILE according to a quoting style");

  registerQuoteCommand(program);

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  printError(errorMessage(error));
  process.exit(1);
});
