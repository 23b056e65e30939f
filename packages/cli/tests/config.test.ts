/**
 * Tests for config.ts — loadConfig.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({ inputPath: "tx.csv" })).toEqual({
      inputPath: "tx.csv",
      order: "first-seen",
      logLevel: "warn",
    });
  });

  it("accepts every option", () => {
    expect(
      loadConfig({ inputPath: "tx.csv", order: "client", logLevel: "debug", logFile: "run.log" }),
    ).toEqual({ inputPath: "tx.csv", order: "client", logLevel: "debug", logFile: "run.log" });
  });

  it("requires an input path", () => {
    expect(() => loadConfig({})).toThrow(ZodError);
    expect(() => loadConfig({ inputPath: "   " })).toThrow("Input path is required");
  });

  it("rejects an unknown order", () => {
    expect(() => loadConfig({ inputPath: "tx.csv", order: "random" })).toThrow(ZodError);
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ inputPath: "tx.csv", logLevel: "verbose" })).toThrow(ZodError);
  });
});
