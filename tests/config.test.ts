/**
 * Tests for configuration loading and validation
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  DEFAULT_CONFIG,
  loadConfigFromEnv,
  loadConfigFromFiles,
  resolveConfig,
  validateConfig,
} from "../src/core/config.js";
import { ConfigError } from "../src/core/errors.js";

describe("validateConfig", () => {
  it("should fill in defaults", () => {
    expect(validateConfig({})).toEqual({ length: 100, numeric: "int64", verbose: false, strict: false });
    expect(validateConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it("should parse string values from the environment", () => {
    expect(validateConfig({ length: "0", numeric: "bigint", verbose: "1", strict: "false" })).toEqual({
      length: 0,
      numeric: "bigint",
      verbose: true,
      strict: false,
    });
  });

  it("should reject a negative or fractional length", () => {
    expect(() => validateConfig({ length: -1 })).toThrow(ConfigError);
    expect(() => validateConfig({ length: 2.5 })).toThrow("length must be a non-negative integer, got 2.5");
    expect(() => validateConfig({ length: "ten" })).toThrow('length must be a non-negative integer, got "ten"');
  });

  it("should reject an unknown numeric width and name the key", () => {
    try {
      validateConfig({ numeric: "int16" });
      expect.unreachable("validateConfig should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({
        key: "numeric",
        message: 'numeric must be one of int64, int32, number, bigint, got "int16"',
      });
    }
  });

  it("should reject a non-boolean flag", () => {
    expect(() => validateConfig({ strict: "yes" })).toThrow('strict must be a boolean, got "yes"');
  });
});

describe("loadConfigFromEnv", () => {
  it("should read MONADPLAY_ variables and ignore the rest", () => {
    expect(
      loadConfigFromEnv({
        MONADPLAY_LENGTH: "50",
        MONADPLAY_STRICT: "1",
        MONADPLAY_UNKNOWN: "x",
        PATH: "/usr/bin",
      }),
    ).toEqual({ length: "50", strict: "1" });
  });
});

describe("config files", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "monadplay-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("should find nothing in an empty directory", () => {
    expect(loadConfigFromFiles(dir)).toEqual({ config: {} });
  });

  it("should load .monadplayrc.json", () => {
    const file = path.join(dir, ".monadplayrc.json");
    fs.writeFileSync(file, JSON.stringify({ length: 10, numeric: "int32", extra: true }));
    expect(loadConfigFromFiles(dir)).toEqual({ config: { length: 10, numeric: "int32" }, filepath: file });
  });

  it("should load the monadplay key of package.json", () => {
    fs.writeFileSync(path.join(dir, "package.json"), JSON.stringify({ name: "x", monadplay: { strict: true } }));
    expect(loadConfigFromFiles(dir).config).toEqual({ strict: true });
  });

  it("should report a file that fails to parse as a ConfigError", () => {
    fs.writeFileSync(path.join(dir, ".monadplayrc.json"), "{ length: ");
    expect(() => loadConfigFromFiles(dir)).toThrow(ConfigError);
    expect(() => loadConfigFromFiles(dir)).toThrow(/^Failed to load config file: /);
  });

  it("should ignore monadplay.config.mjs", () => {
    fs.writeFileSync(path.join(dir, "monadplay.config.mjs"), "export default { length: 3 };");
    expect(loadConfigFromFiles(dir)).toEqual({ config: {} });
  });

  it("should reject a config file that is not an object", () => {
    fs.writeFileSync(path.join(dir, ".monadplayrc.json"), "[1, 2]");
    expect(() => loadConfigFromFiles(dir)).toThrow(ConfigError);
  });

  it("should prefer overrides to the environment and the environment to files", () => {
    fs.writeFileSync(path.join(dir, ".monadplayrc.json"), JSON.stringify({ length: 10, numeric: "int32", strict: true }));
    const resolved = resolveConfig({
      cwd: dir,
      env: { MONADPLAY_LENGTH: "20", MONADPLAY_NUMERIC: "bigint" },
      overrides: { length: 30, verbose: undefined },
    });
    expect(resolved.config).toEqual({ length: 30, numeric: "bigint", verbose: false, strict: true });
    expect(resolved.filepath).toBe(path.join(dir, ".monadplayrc.json"));
  });
});
