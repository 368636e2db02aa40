import { homedir } from "os";
import { join } from "path";

export const PROGRAM_NAME = "linequote";

// Local config
export const LINEQUOTE_DIR = join(homedir(), ".linequote");
export const CONFIG_FILE = join(LINEQUOTE_DIR, "config.toml");
export const CONFIG_ENV_VAR = "LINEQUOTE_CONFIG";

// Line delimiters
export const NEWLINE_DELIMITER = "\n";
export const NULL_DELIMITER = "\0";

// File argument that stands for standard input
export const STDIN_FILE = "-";
export const STDIN_NAME = "standard input";
