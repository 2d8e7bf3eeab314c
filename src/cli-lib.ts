import { readFileSync } from "node:fs";
import { homedir } from "node:os";
import { parseArgs } from "node:util";
import chalk from "chalk";

import { type CatalogOptions, findPreset, getLaunchOptionsCatalog } from "./catalog";
import { type BackupPolicy, type VdfPatchConfig, loadConfig } from "./config";
import {
  VdfPatchError,
  describeCause,
  describeDiagnostic,
  describeWarning
} from "./errors";
import {
  type PatchRequest,
  type PatchResult,
  applyPatch,
  patchDocument
} from "./index";
import { Logger } from "./logger";
import { findLocalConfig, findSteamRoot, launchOptionsRequest } from "./steam";
import { findField, locateRecordPath } from "./vdf";

/**
 * Split a dot-separated record path. `\.` keeps a literal dot in a key.
 */
export function parseRecordPath(path: string): string[] {
  if (path === "") return [];

  const keys: string[] = [];
  let current = "";
  for (let i = 0; i < path.length; i++) {
    const ch = path[i];
    if (ch === "\\" && path[i + 1] === ".") {
      current += ".";
      i++;
    } else if (ch === ".") {
      keys.push(current);
      current = "";
    } else {
      current += ch;
    }
  }
  keys.push(current);

  if (keys.some((key) => key === "")) {
    throw new VdfPatchError("usage", `Invalid record path: ${path}`);
  }
  return keys;
}

/**
 * Line diff of two texts: "- " removed, "+ " added, "  " unchanged
 */
export function diff(before: string, after: string): string {
  const oldLines = before.split("\n");
  const newLines = after.split("\n");

  // common leading and trailing lines stay out of the table
  let head = 0;
  while (
    head < oldLines.length &&
    head < newLines.length &&
    oldLines[head] === newLines[head]
  ) {
    head++;
  }
  let tail = 0;
  while (
    tail < oldLines.length - head &&
    tail < newLines.length - head &&
    oldLines[oldLines.length - 1 - tail] === newLines[newLines.length - 1 - tail]
  ) {
    tail++;
  }

  const a = oldLines.slice(head, oldLines.length - tail);
  const b = newLines.slice(head, newLines.length - tail);

  // lengths of longest common subsequences of the suffixes
  const table: number[][] = Array.from({ length: a.length + 1 }, () =>
    new Array<number>(b.length + 1).fill(0)
  );
  for (let i = a.length - 1; i >= 0; i--) {
    for (let j = b.length - 1; j >= 0; j--) {
      table[i][j] =
        a[i] === b[j]
          ? table[i + 1][j + 1] + 1
          : Math.max(table[i + 1][j], table[i][j + 1]);
    }
  }

  const lines = oldLines.slice(0, head).map((line) => `  ${line}`);
  let i = 0;
  let j = 0;
  while (i < a.length && j < b.length) {
    if (a[i] === b[j]) {
      lines.push(`  ${a[i]}`);
      i++;
      j++;
    } else if (table[i + 1][j] >= table[i][j + 1]) {
      lines.push(`- ${a[i]}`);
      i++;
    } else {
      lines.push(`+ ${b[j]}`);
      j++;
    }
  }
  for (; i < a.length; i++) lines.push(`- ${a[i]}`);
  for (; j < b.length; j++) lines.push(`+ ${b[j]}`);
  for (const line of oldLines.slice(oldLines.length - tail)) {
    lines.push(`  ${line}`);
  }

  return lines.join("\n");
}

/**
 * Only the changed lines of a diff, with `context` unchanged lines around them
 */
export function compactDiff(fullDiff: string, context = 2): string {
  const lines = fullDiff.split("\n");
  const keep = new Set<number>();
  lines.forEach((line, index) => {
    if (line.startsWith("  ")) return;
    for (let k = index - context; k <= index + context; k++) keep.add(k);
  });

  const out: string[] = [];
  let skipped = false;
  lines.forEach((line, index) => {
    if (keep.has(index)) {
      out.push(line);
      skipped = false;
    } else if (!skipped) {
      out.push("  ...");
      skipped = true;
    }
  });
  return out.join("\n");
}

export function colorizeDiff(text: string): string {
  return text
    .split("\n")
    .map((line) =>
      line.startsWith("+ ")
        ? chalk.green(line)
        : line.startsWith("- ")
          ? chalk.red(line)
          : line
    )
    .join("\n");
}

/**
 * Human readable summary lines for a patch result
 */
export function formatResult(result: PatchResult): string[] {
  const lines: string[] = [];

  if (result.success) {
    lines.push(
      result.inserted ? "Field inserted and verified" : "Field replaced and verified"
    );
  } else {
    lines.push(describeDiagnostic(result.diagnostic));
  }
  if (result.backupPath) {
    lines.push(`Backup: ${result.backupPath}`);
  }
  for (const warning of result.warnings) {
    lines.push(`Warning: ${describeWarning(warning)}`);
  }
  if (result.reload && result.reload.signalled.length > 0) {
    lines.push(`Signalled: ${result.reload.signalled.join(", ")}`);
  }

  return lines;
}

// =============================================================================
// Commands
// =============================================================================

export const USAGE = `Usage:
  vdfpatch set <file> <record.path> <field> <value> [--dry-run] [--backup fixed|timestamp] [--no-reload]
  vdfpatch get <file> <record.path> <field>
  vdfpatch launch-options <appId> (<command> | --preset <key>) [--file <path>] [--steam-root <dir>] [--rdna3] [--dry-run]
  vdfpatch presets [--rdna3] [--no-mangohud]

Options:
  --config <path>   JSONC config file (default: ./vdfpatch.jsonc when present)
  -v, --verbose     debug logging
  -h, --help        show this help`;

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
  cwd: string;
  home: string;
}

const defaultIO: CliIO = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
  cwd: process.cwd(),
  home: homedir()
};

const cliOptions = {
  "dry-run": { type: "boolean" },
  backup: { type: "string" },
  "no-reload": { type: "boolean" },
  config: { type: "string" },
  preset: { type: "string" },
  file: { type: "string" },
  "steam-root": { type: "string" },
  rdna3: { type: "boolean" },
  "no-mangohud": { type: "boolean" },
  verbose: { type: "boolean", short: "v" },
  help: { type: "boolean", short: "h" }
} as const;

function parseCommandLine(argv: string[]) {
  return parseArgs({ args: argv, options: cliOptions, allowPositionals: true });
}

type CliValues = ReturnType<typeof parseCommandLine>["values"];

interface Context {
  values: CliValues;
  config: VdfPatchConfig;
  logger: Logger;
  io: CliIO;
}

function requirePositionals(
  positionals: string[],
  names: string[]
): string[] {
  if (positionals.length !== names.length) {
    throw new VdfPatchError(
      "usage",
      `Expected ${names.map((name) => `<${name}>`).join(" ")}`
    );
  }
  return positionals;
}

function backupPolicy(value: string | undefined, fallback: BackupPolicy): BackupPolicy {
  if (value === undefined) return fallback;
  if (value === "fixed" || value === "timestamp") return value;
  throw new VdfPatchError("usage", `--backup must be "fixed" or "timestamp", got "${value}"`);
}

function readDocument(path: string): string {
  try {
    return readFileSync(path, "utf-8");
  } catch (error) {
    throw new VdfPatchError("usage", `Could not read ${path}: ${describeCause(error).message}`);
  }
}

function runPatch(ctx: Context, file: string, request: PatchRequest): number {
  const { config, io, logger, values } = ctx;

  if (values["dry-run"]) {
    const original = readDocument(file);
    const patched = patchDocument(original, request, config);
    if (!patched.ok) {
      io.err(describeDiagnostic(patched.diagnostic));
      return 1;
    }
    io.out(colorizeDiff(compactDiff(diff(original, patched.document))));
    return 0;
  }

  const result = applyPatch(file, request, {
    layout: config,
    backup: backupPolicy(values.backup, config.backup),
    reload: values["no-reload"] ? false : config.reload,
    logger
  });
  const [summary, ...details] = formatResult(result);
  (result.success ? io.out : io.err)(summary ?? "");
  for (const line of details) io.out(line);
  return result.success ? 0 : 1;
}

function setCommand(ctx: Context, positionals: string[]): number {
  const [file, path, field, value] = requirePositionals(positionals, [
    "file",
    "record.path",
    "field",
    "value"
  ]);
  return runPatch(ctx, file, {
    recordPath: parseRecordPath(path),
    fieldName: field,
    value
  });
}

function getCommand(ctx: Context, positionals: string[]): number {
  const [file, path, field] = requirePositionals(positionals, [
    "file",
    "record.path",
    "field"
  ]);
  const keys = parseRecordPath(path);
  if (keys.length === 0) {
    throw new VdfPatchError("usage", "Record path is empty");
  }
  const document = readDocument(file);
  const located = locateRecordPath(document, keys);
  if (!located.found) {
    ctx.io.err(
      located.reason === "unbalanced"
        ? `Unbalanced braces in record "${located.key}"`
        : `Record "${located.key}" not found`
    );
    return 1;
  }

  const found = findField(document.slice(located.span.start, located.span.end), field);
  if (found.rawValue === null) {
    ctx.io.err(`Field "${field}" not set`);
    return 1;
  }
  ctx.io.out(found.rawValue);
  return 0;
}

function catalogOptions(values: CliValues): CatalogOptions {
  return {
    rdna3Workaround: values.rdna3 === true,
    includeMangohud: values["no-mangohud"] !== true
  };
}

function resolveLocalConfig(ctx: Context): string {
  const { values, io } = ctx;
  if (values.file) return values.file;

  const root = values["steam-root"] ?? findSteamRoot(io.home);
  if (!root) {
    throw new VdfPatchError("usage", "Steam installation not found; pass --file or --steam-root");
  }
  const local = findLocalConfig(root);
  if (!local.found) {
    throw new VdfPatchError(
      "usage",
      local.reason === "unreadable"
        ? `Could not list ${local.searched}: ${local.message}`
        : `localconfig.vdf not found (${local.reason}: ${local.searched})`
    );
  }
  ctx.logger.child("STEAM").debug(`Using ${local.path} (user ${local.userId})`);
  return local.path;
}

function launchOptionsCommand(ctx: Context, positionals: string[]): number {
  const { values } = ctx;
  let appId: string;
  let command: string;

  if (values.preset !== undefined) {
    [appId] = requirePositionals(positionals, ["appId"]);
    const preset = findPreset(values.preset, catalogOptions(values));
    if (!preset) {
      throw new VdfPatchError("usage", `Unknown preset "${values.preset}"`);
    }
    command = preset.command;
  } else {
    [appId, command] = requirePositionals(positionals, ["appId", "command"]);
  }

  return runPatch(ctx, resolveLocalConfig(ctx), launchOptionsRequest(appId, command));
}

function presetsCommand(ctx: Context): number {
  for (const option of getLaunchOptionsCatalog(catalogOptions(ctx.values))) {
    ctx.io.out(`${chalk.bold(option.key)}  ${option.name}`);
    ctx.io.out(`    ${option.command}`);
  }
  return 0;
}

/**
 * Run the command line. Returns the exit code: 0 success, 1 failed patch,
 * 2 usage or configuration error.
 */
export function run(argv: string[], io: CliIO = defaultIO): number {
  try {
    const { values, positionals } = parseCommandLine(argv);

    const [command, ...rest] = positionals;
    if (values.help || command === undefined) {
      io.out(USAGE);
      return command === undefined && !values.help ? 2 : 0;
    }

    const config = loadConfig(values.config, io.cwd);
    const logger = new Logger({
      level: values.verbose ? "debug" : config.logLevel
    });
    const ctx: Context = { values, config, logger, io };

    switch (command) {
      case "set":
        return setCommand(ctx, rest);
      case "get":
        return getCommand(ctx, rest);
      case "launch-options":
        return launchOptionsCommand(ctx, rest);
      case "presets":
        return presetsCommand(ctx);
      default:
        throw new VdfPatchError("usage", `Unknown command "${command}"`);
    }
  } catch (error) {
    if (error instanceof VdfPatchError) {
      io.err(error.message);
      return 2;
    }
    if (error instanceof TypeError && "code" in error) {
      // parseArgs rejects unknown options and missing option values
      io.err(error.message);
      io.err(USAGE);
      return 2;
    }
    throw error;
  }
}
