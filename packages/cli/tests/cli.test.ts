/**
 * Tests for the command-line surface: arguments, exit codes, output
 * streams, and the log file.
 */

import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import type { CliIo } from "../src/cli.js";
import { VERSION, runCli } from "../src/cli.js";

function fixture(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

interface Captured extends CliIo {
  readonly out: string[];
  readonly err: string[];
}

function captureIo(): Captured {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
  };
}

describe("runCli", () => {
  let io: Captured;
  let workDir: string;

  beforeEach(() => {
    io = captureIo();
    workDir = mkdtempSync(join(tmpdir(), "tally-cli-"));
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  const quiet = ["--log-level", "silent"];

  it("prints the snapshot and exits 0", async () => {
    const code = await runCli([fixture("deposits_and_withdrawals.csv"), ...quiet], io);
    expect(code).toBe(0);
    expect(io.out.join("")).toBe(
      "client,available,held,total,locked\n" +
        "1,1.5000,0.0000,1.5000,false\n" +
        "2,2.0000,0.0000,2.0000,false\n",
    );
    expect(io.err).toEqual([]);
  });

  it("exits 0 even when records are rejected", async () => {
    const code = await runCli([fixture("all_kinds.csv"), "--order", "client", ...quiet], io);
    expect(code).toBe(0);
    expect(io.out.join("")).toBe(
      "client,available,held,total,locked\n" +
        "1,-30.0000,100.0000,70.0000,false\n" +
        "2,8.0000,0.0000,8.0000,false\n" +
        "3,-0.5000,0.0000,-0.5000,true\n",
    );
  });

  it("exits 1 with a message when the input is missing", async () => {
    const code = await runCli([join(workDir, "missing.csv"), ...quiet], io);
    expect(code).toBe(1);
    expect(io.out).toEqual([]);
    expect(io.err.join("")).toContain("Failed to process input: ENOENT");
  });

  it("exits 1 on broken CSV", async () => {
    const code = await runCli([fixture("unterminated_quote.csv"), ...quiet], io);
    expect(code).toBe(1);
    expect(io.out).toEqual([]);
    expect(io.err.join("")).toContain("Failed to process input:");
  });

  it("exits 1 when a header column is missing", async () => {
    const code = await runCli([fixture("missing_column.csv"), ...quiet], io);
    expect(code).toBe(1);
    expect(io.err.join("")).toContain("Input header is missing column(s): tx");
  });

  it("exits 1 with a message when the log file cannot be opened", async () => {
    const code = await runCli([fixture("header_only.csv"), "--log-file", workDir], io);
    expect(code).toBe(1);
    expect(io.out).toEqual([]);
    expect(io.err.join("")).toContain("Failed to process input: EISDIR");
  });

  it("exits 1 without an input argument", async () => {
    const code = await runCli([], io);
    expect(code).toBe(1);
    expect(io.err.join("")).toContain("missing required argument 'input'");
  });

  it("rejects an unknown --order", async () => {
    const code = await runCli([fixture("header_only.csv"), "--order", "random"], io);
    expect(code).toBe(1);
    expect(io.out).toEqual([]);
  });

  it("prints the version", async () => {
    const code = await runCli(["--version"], io);
    expect(code).toBe(0);
    expect(io.out.join("")).toBe(`${VERSION}\n`);
  });

  it("logs skipped records to the log file", async () => {
    const logFile = join(workDir, "run.log");
    const code = await runCli([fixture("all_kinds.csv"), "--log-level", "info", "--log-file", logFile], io);
    expect(code).toBe(0);

    const entries = readFileSync(logFile, "utf8")
      .trim()
      .split("\n")
      .map((line): unknown => JSON.parse(line));

    expect(entries).toContainEqual(
      expect.objectContaining({
        level: 30,
        name: "tally",
        msg: "Skipping rejected deposit: Account 3 is locked",
        code: "ACCOUNT_LOCKED",
        client: 3,
        tx: 7,
        line: 13,
      }),
    );
    expect(entries).toContainEqual(
      expect.objectContaining({ msg: "Processing complete", applied: 11, rejected: 1, malformed: 0, accounts: 3 }),
    );
  });
});
