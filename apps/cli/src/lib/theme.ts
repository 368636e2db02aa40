import chalk from "chalk";
import { PROGRAM_NAME } from "./constants.ts";

export const theme = {
  error: chalk.red,
  info: chalk.blue,
  muted: chalk.gray,
  accent: chalk.cyan,
} as const;

export function formatSectionHeader(text: string): string {
  return theme.info(`\n${text}:`);
}

export function formatDetail(label: string, value: string): string {
  return `  ${theme.accent(label)}${value}`;
}

/** Print a diagnostic and the help hint to stderr. */
export function printError(message: string): void {
  console.error(theme.error(`Error: ${message}`));
  console.error(
    theme.muted(`Try '${PROGRAM_NAME} --help' for more information.`),
  );
}
