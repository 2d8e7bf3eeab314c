import { existsSync, readFileSync } from "node:fs";
import { constants } from "node:os";
import { resolve } from "node:path";
import { type ParseError, parse, printParseErrorCode } from "jsonc-parser";
import { z } from "zod";

import { VdfPatchError } from "./errors";
import type { LogLevel } from "./logger";
import { DEFAULT_LAYOUT } from "./vdf";

// =============================================================================
// Types
// =============================================================================

export type BackupPolicy = "timestamp" | "fixed";

export interface ReloadConfig {
  touch: boolean;
  signal: boolean;
  processHint: string;
  signalName: NodeJS.Signals;
}

export interface VdfPatchConfig {
  backup: BackupPolicy;
  indent: string;
  separator: string;
  anchors: string[];
  reload: ReloadConfig;
  logLevel: LogLevel;
}

export const CONFIG_FILE_NAME = "vdfpatch.jsonc";

export const DEFAULT_CONFIG: VdfPatchConfig = {
  backup: "timestamp",
  indent: DEFAULT_LAYOUT.indent,
  separator: DEFAULT_LAYOUT.separator,
  anchors: [...DEFAULT_LAYOUT.anchors],
  reload: {
    touch: true,
    signal: true,
    processHint: "steam",
    signalName: "SIGHUP"
  },
  logLevel: "info"
};

// =============================================================================
// Schema
// =============================================================================

const signalSchema = z.custom<NodeJS.Signals>(
  (value) => typeof value === "string" && value in constants.signals,
  "must be a signal name such as SIGHUP"
);

const whitespaceSchema = z
  .string()
  .regex(/^[ \t]*$/, "may only contain spaces and tabs");

export const configSchema = z
  .object({
    backup: z.enum(["timestamp", "fixed"]),
    indent: whitespaceSchema,
    separator: whitespaceSchema.min(1),
    anchors: z.array(z.string().min(1)),
    reload: z
      .object({
        touch: z.boolean(),
        signal: z.boolean(),
        processHint: z.string().min(1),
        signalName: signalSchema
      })
      .partial()
      .strict(),
    logLevel: z.enum(["debug", "info", "warn", "error", "silent"])
  })
  .partial()
  .strict();

export type PartialConfig = z.input<typeof configSchema>;

// =============================================================================
// Loading
// =============================================================================

/**
 * Merge a partial config over the defaults, validating it first
 */
export function resolveConfig(
  partial: unknown = {},
  source = "configuration"
): VdfPatchConfig {
  const result = configSchema.safeParse(partial);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new VdfPatchError("invalid-config", `Invalid ${source}: ${issues}`);
  }

  const { reload, ...rest } = result.data;
  return {
    ...DEFAULT_CONFIG,
    ...rest,
    reload: { ...DEFAULT_CONFIG.reload, ...reload }
  };
}

/**
 * Parse JSONC config text. Comments and trailing commas are accepted.
 */
export function parseConfig(text: string, source = "configuration"): VdfPatchConfig {
  const errors: ParseError[] = [];
  const value: unknown = parse(text, errors, {
    allowTrailingComma: true,
    allowEmptyContent: true
  });

  const first = errors[0];
  if (first) {
    throw new VdfPatchError(
      "invalid-config",
      `Invalid ${source}: ${printParseErrorCode(first.error)} at offset ${first.offset}`
    );
  }

  return resolveConfig(value ?? {}, source);
}

/**
 * Load the config file. Without an explicit path, `vdfpatch.jsonc` in `cwd`
 * is used when it exists and the defaults otherwise.
 */
export function loadConfig(
  configPath?: string,
  cwd: string = process.cwd()
): VdfPatchConfig {
  const path = resolve(cwd, configPath ?? CONFIG_FILE_NAME);

  if (!existsSync(path)) {
    if (configPath !== undefined) {
      throw new VdfPatchError("invalid-config", `Config file not found: ${path}`);
    }
    return resolveConfig();
  }

  return parseConfig(readFileSync(path, "utf-8"), path);
}
