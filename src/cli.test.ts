import {
  mkdirSync,
  mkdtempSync,
  readFileSync,
  readdirSync,
  rmSync,
  writeFileSync
} from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  type CliIO,
  USAGE,
  compactDiff,
  diff,
  formatResult,
  parseRecordPath,
  run
} from "./cli-lib";
import { VdfPatchError } from "./errors";
import type { PatchResult } from "./index";

const localconfig = readFileSync(
  join(__dirname, "__fixtures__", "localconfig.vdf"),
  "utf-8"
);

describe("parseRecordPath", () => {
  it("should split dot-separated keys", () => {
    expect(parseRecordPath("apps")).toEqual(["apps"]);
    expect(parseRecordPath("apps.12345")).toEqual(["apps", "12345"]);
  });

  it("should keep escaped dots inside a key", () => {
    expect(parseRecordPath("a\\.b.c")).toEqual(["a.b", "c"]);
  });

  it("should return empty array for empty string", () => {
    expect(parseRecordPath("")).toEqual([]);
  });

  it("should reject empty keys", () => {
    expect(() => parseRecordPath("apps..1")).toThrow(VdfPatchError);
    expect(() => parseRecordPath("apps.")).toThrow(VdfPatchError);
  });
});

describe("diff", () => {
  it("should show no changes for identical strings", () => {
    expect(diff("hello", "hello")).toBe("  hello");
  });

  it("should show additions", () => {
    expect(diff("line1", "line1\nline2")).toBe("  line1\n+ line2");
  });

  it("should show removals", () => {
    expect(diff("line1\nline2", "line1")).toBe("  line1\n- line2");
  });

  it("should show changes", () => {
    expect(diff("old", "new")).toBe("- old\n+ new");
  });

  it("should handle multi-line diffs", () => {
    const old = '"1"\n{\n\t"X"\t"123"\n}';
    const updated = '"1"\n{\n\t"X"\t"456"\n}';
    expect(diff(old, updated)).toBe(
      '  "1"\n  {\n- \t"X"\t"123"\n+ \t"X"\t"456"\n  }'
    );
  });
});

describe("compactDiff", () => {
  it("should keep changed lines with their context", () => {
    const full = ["  a", "  b", "  c", "- d", "+ e", "  f", "  g", "  h"].join("\n");
    expect(compactDiff(full, 1)).toBe(
      ["  ...", "  c", "- d", "+ e", "  f", "  ..."].join("\n")
    );
  });
});

describe("formatResult", () => {
  it("should summarise a successful patch", () => {
    const result: PatchResult = {
      success: true,
      written: true,
      inserted: false,
      document: "",
      backupPath: "/cfg/localconfig.vdf.backup",
      diagnostic: { code: "ok" },
      warnings: [{ code: "reload-failed", message: "could not update timestamp: gone" }],
      reload: { touched: false, signalled: [42], notes: [] }
    };
    expect(formatResult(result)).toEqual([
      "Field replaced and verified",
      "Backup: /cfg/localconfig.vdf.backup",
      "Warning: Reload signal: could not update timestamp: gone",
      "Signalled: 42"
    ]);
  });

  it("should describe a failure", () => {
    const result: PatchResult = {
      success: false,
      written: false,
      inserted: null,
      document: null,
      backupPath: null,
      diagnostic: { code: "record-not-found", key: "999", reason: "missing-key" },
      warnings: [],
      reload: null
    };
    expect(formatResult(result)).toEqual(['Record "999" not found']);
  });
});

describe("run", () => {
  let dir: string;
  let file: string;
  let out: string[];
  let err: string[];
  let io: CliIO;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "vdfpatch-cli-"));
    file = join(dir, "localconfig.vdf");
    writeFileSync(file, localconfig);
    writeFileSync(join(dir, "vdfpatch.jsonc"), '{ "logLevel": "silent" }');
    out = [];
    err = [];
    io = {
      out: (line) => out.push(line),
      err: (line) => err.push(line),
      cwd: dir,
      home: dir
    };
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("should print usage without a command", () => {
    expect(run([], io)).toBe(2);
    expect(out).toEqual([USAGE]);
  });

  it("should print usage for --help", () => {
    expect(run(["--help"], io)).toBe(0);
    expect(out).toEqual([USAGE]);
  });

  it("should reject unknown commands", () => {
    expect(run(["bogus"], io)).toBe(2);
    expect(err).toEqual(['Unknown command "bogus"']);
  });

  it("should reject unknown options", () => {
    expect(run(["set", "--wat"], io)).toBe(2);
    expect(err[1]).toBe(USAGE);
  });

  it("should print a field value", () => {
    expect(run(["get", file, "apps.54321", "LaunchOptions"], io)).toBe(0);
    expect(out).toEqual(["existing_option"]);
  });

  it("should fail for a field that is not set", () => {
    expect(run(["get", file, "apps.12345", "LaunchOptions"], io)).toBe(1);
    expect(err).toEqual(['Field "LaunchOptions" not set']);
  });

  it("should show a diff on dry runs without writing", () => {
    const code = run(
      ["set", file, "apps.12345", "LaunchOptions", "x %command%", "--dry-run"],
      io
    );
    expect(code).toBe(0);
    expect(out).toHaveLength(1);
    expect(out[0]).toContain('+ \t\t\t\t\t\t"LaunchOptions"\t\t"x %command%"');
    expect(readFileSync(file, "utf-8")).toBe(localconfig);
    expect(readdirSync(dir).sort()).toEqual(["localconfig.vdf", "vdfpatch.jsonc"]);
  });

  it("should patch the file", () => {
    const code = run(
      [
        "set",
        file,
        "apps.12345",
        "LaunchOptions",
        "x %command%",
        "--no-reload",
        "--backup",
        "fixed"
      ],
      io
    );
    expect(code).toBe(0);
    expect(out).toEqual([
      "Field inserted and verified",
      `Backup: ${file}.backup`
    ]);
    expect(readFileSync(`${file}.backup`, "utf-8")).toBe(localconfig);
    expect(readFileSync(file, "utf-8")).toContain(
      '\t\t\t\t\t\t"LaunchOptions"\t\t"x %command%"\n'
    );
  });

  it("should reject an unknown backup policy", () => {
    const code = run(
      ["set", file, "apps.12345", "X", "v", "--backup", "weekly"],
      io
    );
    expect(code).toBe(2);
    expect(err).toEqual(['--backup must be "fixed" or "timestamp", got "weekly"']);
  });

  it("should exit with 1 when the record is missing", () => {
    const code = run(["set", file, "apps.999", "X", "v", "--no-reload"], io);
    expect(code).toBe(1);
    expect(err).toEqual(['Record "999" not found']);
    expect(readFileSync(file, "utf-8")).toBe(localconfig);
  });

  it("should apply a launch option preset", () => {
    const code = run(
      ["launch-options", "54321", "--preset", "basic", "--file", file, "--no-reload"],
      io
    );
    expect(code).toBe(0);

    out = [];
    run(["get", file, "apps.54321", "LaunchOptions"], io);
    expect(out).toEqual(['WINEDLLOVERRIDES="dxgi=n,b" PROTON_FSR4_UPGRADE=1 %command%']);
  });

  it("should require a command when no preset is given", () => {
    expect(run(["launch-options", "54321", "--file", file], io)).toBe(2);
    expect(err).toEqual(["Expected <appId> <command>"]);
  });

  it("should explain a Steam root without user data", () => {
    const steamRoot = join(dir, "steam");
    mkdirSync(steamRoot);
    expect(
      run(["launch-options", "54321", "mangohud %command%", "--steam-root", steamRoot], io)
    ).toBe(2);
    expect(err).toEqual([
      `localconfig.vdf not found (no-userdata: ${join(steamRoot, "userdata")})`
    ]);
  });

  it("should exit cleanly when user data cannot be listed", () => {
    const steamRoot = join(dir, "steam");
    mkdirSync(steamRoot);
    writeFileSync(join(steamRoot, "userdata"), "");
    expect(
      run(["launch-options", "54321", "mangohud %command%", "--steam-root", steamRoot], io)
    ).toBe(2);
    expect(err).toHaveLength(1);
    expect(err[0]).toMatch(/^Could not list .*userdata: ENOTDIR/);
  });

  it("should patch the localconfig.vdf of the newest account", () => {
    const steamRoot = join(dir, "steam");
    const configDir = join(steamRoot, "userdata", "111", "config");
    mkdirSync(configDir, { recursive: true });
    writeFileSync(join(configDir, "localconfig.vdf"), localconfig);

    const code = run(
      ["launch-options", "54321", "mangohud %command%", "--steam-root", steamRoot, "--no-reload"],
      io
    );
    expect(code).toBe(0);
    expect(readFileSync(join(configDir, "localconfig.vdf"), "utf-8")).toBe(
      localconfig.replace("existing_option", "mangohud %command%")
    );
  });

  it("should list presets", () => {
    expect(run(["presets", "--no-mangohud"], io)).toBe(0);
    expect(out).toHaveLength(14);
    expect(out[1]).toBe('    WINEDLLOVERRIDES="dxgi=n,b" PROTON_FSR4_UPGRADE=1 %command%');
  });
});
