import { listStyleNames } from "@linequote/shared";

export class LinequoteError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnknownStyleError extends LinequoteError {
  constructor(style: string) {
    super(
      `${style} is not a valid quoting style. Valid styles: ${listStyleNames().join(", ")}`,
      "UNKNOWN_STYLE",
    );
  }
}

export class ConfigError extends LinequoteError {
  constructor(message: string) {
    super(message, "CONFIG_ERROR");
  }
}

export class InputError extends LinequoteError {
  constructor(input: string, reason: string) {
    super(`Cannot read ${input}: ${reason}`, "INPUT_ERROR");
  }
}

export class InputDecodeError extends LinequoteError {
  constructor(input: string) {
    super(`${input} is not valid UTF-8`, "INPUT_DECODE_ERROR");
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
