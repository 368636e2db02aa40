import { existsSync, readFileSync } from "fs";
import { parse as parseTOML } from "smol-toml";
import { z } from "zod";
import { CONFIG_ENV_VAR, CONFIG_FILE } from "@/lib/constants.ts";
import { ConfigError, errorMessage } from "@/lib/errors.ts";

export const LinequoteConfigSchema = z.object({
  defaults: z
    .object({
      quoting_style: z.string().optional(),
      null: z.boolean().default(false),
    })
    .default({}),
  csv: z
    .object({
      field_separator: z.string().optional(),
      record_separator: z.string().optional(),
    })
    .default({}),
});

export type LinequoteConfig = z.infer<typeof LinequoteConfigSchema>;

export function configPath(env: NodeJS.ProcessEnv = process.env): string {
  return env[CONFIG_ENV_VAR] || CONFIG_FILE;
}

/** Read the config file, or null when there is none. */
export function loadConfig(path: string = configPath()): LinequoteConfig | null {
  if (!existsSync(path)) {
    return null;
  }

  try {
    const raw = readFileSync(path, "utf-8");
    return LinequoteConfigSchema.parse(parseTOML(raw));
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new ConfigError(
        `Invalid config at ${path}: ${error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ")}`,
      );
    }
    throw new ConfigError(
      `Failed to read config at ${path}: ${errorMessage(error)}`,
    );
  }
}
