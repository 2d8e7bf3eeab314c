import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  loadConfig,
  parseConfig,
  resolveConfig
} from "./config";
import { VdfPatchError } from "./errors";

describe("resolveConfig", () => {
  it("should return the defaults for an empty object", () => {
    expect(resolveConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it("should merge nested reload settings over the defaults", () => {
    const config = resolveConfig({ reload: { signal: false } });
    expect(config.reload).toEqual({
      touch: true,
      signal: false,
      processHint: "steam",
      signalName: "SIGHUP"
    });
  });

  it("should reject unknown keys", () => {
    expect(() => resolveConfig({ bakup: "fixed" })).toThrow(/Unrecognized key/);
  });

  it("should reject unknown signals", () => {
    expect(() => resolveConfig({ reload: { signalName: "HUP" } })).toThrow(
      "Invalid configuration: reload.signalName: must be a signal name such as SIGHUP"
    );
  });

  it("should reject indentation that is not whitespace", () => {
    expect(() => resolveConfig({ indent: "xx" })).toThrow(
      "Invalid configuration: indent: may only contain spaces and tabs"
    );
  });
});

describe("parseConfig", () => {
  it("should accept comments and trailing commas", () => {
    const config = parseConfig(`{
      // keep one backup only
      "backup": "fixed",
      "anchors": ["name",],
      "reload": { "processHint": "steamwebhelper", },
    }`);
    expect(config.backup).toBe("fixed");
    expect(config.anchors).toEqual(["name"]);
    expect(config.reload.processHint).toBe("steamwebhelper");
    expect(config.indent).toBe(DEFAULT_CONFIG.indent);
  });

  it("should report syntax errors with their offset", () => {
    expect(() => parseConfig('{ "backup": }', "test.jsonc")).toThrow(
      "Invalid test.jsonc: ValueExpected at offset 12"
    );
  });

  it("should treat an empty file as defaults", () => {
    expect(parseConfig("")).toEqual(DEFAULT_CONFIG);
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "vdfpatch-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("should fall back to the defaults without a config file", () => {
    expect(loadConfig(undefined, dir)).toEqual(DEFAULT_CONFIG);
  });

  it("should read the config file from the working directory", () => {
    writeFileSync(join(dir, CONFIG_FILE_NAME), '{ "logLevel": "debug" }');
    expect(loadConfig(undefined, dir).logLevel).toBe("debug");
  });

  it("should fail for an explicit path that does not exist", () => {
    expect(() => loadConfig("nope.jsonc", dir)).toThrow(VdfPatchError);
  });
});
