/**
 * Tests for CLI configuration loading.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      PAYLEDGER_ENGINE: "serial",
      LOG_LEVEL: "warn",
      NODE_ENV: "production",
    });
  });

  it("selects the stream engine", () => {
    expect(loadConfig({ PAYLEDGER_ENGINE: "stream" }).PAYLEDGER_ENGINE).toBe("stream");
  });

  it("accepts silent logging", () => {
    expect(loadConfig({ LOG_LEVEL: "silent", NODE_ENV: "test" })).toEqual({
      PAYLEDGER_ENGINE: "serial",
      LOG_LEVEL: "silent",
      NODE_ENV: "test",
    });
  });

  it("ignores unrelated variables", () => {
    expect(loadConfig({ HOME: "/tmp", PATH: "/bin" })).not.toHaveProperty("HOME");
  });

  it("rejects an unknown engine", () => {
    expect(() => loadConfig({ PAYLEDGER_ENGINE: "parallel" })).toThrow(ZodError);
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(ZodError);
  });
});
