import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { Readable, Writable } from "stream";
import { afterAll, describe, expect, it, vi } from "vitest";
import type { LinequoteConfig } from "@/core/config.ts";
import {
  handleOutputErrors,
  quoteInput,
  resolveRunOptions,
  runQuote,
  type RunOptions,
} from "@/core/runner.ts";
import { InputError, UnknownStyleError } from "@/lib/errors.ts";

const dir = mkdtempSync(join(tmpdir(), "linequote-runner-"));

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

function sink(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { stream, text: () => chunks.join("") };
}

function source(text: string): Readable {
  return Readable.from([Buffer.from(text)]);
}

const shellOptions: RunOptions = {
  style: "shell",
  delimiter: "\n",
  quoteOptions: {},
};

describe("resolveRunOptions", () => {
  const config: LinequoteConfig = {
    defaults: { quoting_style: "shell", null: true },
    csv: { field_separator: ";" },
  };

  it("uses built-in defaults with no flags and no config", () => {
    expect(resolveRunOptions({}, null)).toEqual({
      style: "literal",
      delimiter: "\n",
      quoteOptions: { fieldSeparator: ",", recordSeparator: "\n" },
    });
  });

  it("takes values from the config file", () => {
    expect(resolveRunOptions({}, config)).toEqual({
      style: "shell",
      delimiter: "\0",
      quoteOptions: { fieldSeparator: ";", recordSeparator: "\n" },
    });
  });

  it("lets flags override the config file", () => {
    const options = resolveRunOptions(
      { quotingStyle: "csv", fieldSeparator: "\t" },
      config,
    );
    expect(options.style).toBe("csv");
    expect(options.quoteOptions.fieldSeparator).toBe("\t");
  });

  it("rejects unknown styles", () => {
    expect(() => resolveRunOptions({ quotingStyle: "bash" }, null)).toThrow(
      UnknownStyleError,
    );
    expect(() =>
      resolveRunOptions(
        {},
        { defaults: { quoting_style: "Shell", null: false }, csv: {} },
      ),
    ).toThrow(
      "Shell is not a valid quoting style. Valid styles: c, c-maybe, csv, escape, literal, pcre, shell, shell-always",
    );
  });
});

describe("quoteInput", () => {
  it("writes each quoted line followed by the delimiter", async () => {
    const out = sink();
    await quoteInput(source("it's\nplain\n"), out.stream, shellOptions);
    expect(out.text()).toBe("'it'\\''s'\nplain\n");
  });

  it("uses NUL as both input and output delimiter", async () => {
    const out = sink();
    await quoteInput(source("a b\0c\0"), out.stream, {
      ...shellOptions,
      delimiter: "\0",
    });
    expect(out.text()).toBe("'a b'\0c\0");
  });

  it("passes csv separators through", async () => {
    const out = sink();
    await quoteInput(source("a;b\na,b\n"), out.stream, {
      style: "csv",
      delimiter: "\n",
      quoteOptions: { fieldSeparator: ";" },
    });
    expect(out.text()).toBe('"a;b"\na,b\n');
  });
});

describe("runQuote", () => {
  it("reads standard input when no files are given", async () => {
    const out = sink();
    await runQuote([], shellOptions, {
      stdin: source("x y\n"),
      stdout: out.stream,
    });
    expect(out.text()).toBe("'x y'\n");
  });

  it("reads files and standard input in argument order", async () => {
    const first = join(dir, "first.txt");
    const second = join(dir, "second.txt");
    writeFileSync(first, "one\n");
    writeFileSync(second, "three four\n");

    const out = sink();
    await runQuote([first, "-", second], shellOptions, {
      stdin: source("two\n"),
      stdout: out.stream,
    });
    expect(out.text()).toBe("one\ntwo\n'three four'\n");
  });

  it("stops at the first missing file", async () => {
    const present = join(dir, "present.txt");
    const missing = join(dir, "missing.txt");
    const never = join(dir, "never.txt");
    writeFileSync(present, "kept\n");
    writeFileSync(never, "skipped\n");

    const out = sink();
    const run = runQuote([present, missing, never], shellOptions, {
      stdin: source(""),
      stdout: out.stream,
    });

    await expect(run).rejects.toThrow(InputError);
    await expect(run).rejects.toThrow(`Cannot read ${missing}: ENOENT`);
    expect(out.text()).toBe("kept\n");
  });

  it("reports invalid UTF-8 with the file name", async () => {
    const binary = join(dir, "binary.dat");
    writeFileSync(binary, Buffer.from([0xfe, 0x0a]));

    const out = sink();
    await expect(
      runQuote([binary], shellOptions, {
        stdin: source(""),
        stdout: out.stream,
      }),
    ).rejects.toThrow(`${binary} is not valid UTF-8`);
  });
});

describe("handleOutputErrors", () => {
  it("exits quietly when the reader closes the pipe", () => {
    const out = sink();
    const exit = vi.fn();
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});

    handleOutputErrors(out.stream, exit);
    out.stream.emit(
      "error",
      Object.assign(new Error("write EPIPE"), { code: "EPIPE" }),
    );

    expect(exit).toHaveBeenCalledWith(0);
    expect(stderr).not.toHaveBeenCalled();
    stderr.mockRestore();
  });

  it("reports other write failures and exits 1", () => {
    const out = sink();
    const exit = vi.fn();
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});

    handleOutputErrors(out.stream, exit);
    out.stream.emit(
      "error",
      Object.assign(new Error("no space left on device"), { code: "ENOSPC" }),
    );

    expect(exit).toHaveBeenCalledWith(1);
    expect(String(stderr.mock.calls[0]?.[0])).toContain(
      "Error: no space left on device",
    );
    stderr.mockRestore();
  });
});
