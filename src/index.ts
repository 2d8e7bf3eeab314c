import { readFileSync } from "node:fs";

import { commit } from "./commit";
import { type BackupPolicy, DEFAULT_CONFIG, type ReloadConfig } from "./config";
import {
  type PatchDiagnostic,
  type PatchWarning,
  describeCause,
  describeDiagnostic
} from "./errors";
import { type PatchLogger, logger as defaultLogger } from "./logger";
import { type ReloadOptions, type ReloadReport, notify } from "./reload";
import {
  DEFAULT_LAYOUT,
  type FieldLayout,
  type RecordSpan,
  encode,
  locateRecordPath,
  patchField
} from "./vdf";

// =============================================================================
// Types
// =============================================================================

export interface PatchRequest {
  /** Keys leading to the record, e.g. ["apps", "570"] */
  recordPath: readonly string[];
  fieldName: string;
  /** Logical value, unescaped */
  value: string;
}

export type DocumentPatch =
  | { ok: true; document: string; inserted: boolean; span: RecordSpan }
  | { ok: false; diagnostic: PatchDiagnostic };

export interface PatchResult {
  success: boolean;
  /** Whether the file on disk now holds new content */
  written: boolean;
  /** null when nothing was patched */
  inserted: boolean | null;
  document: string | null;
  backupPath: string | null;
  diagnostic: PatchDiagnostic;
  warnings: PatchWarning[];
  reload: ReloadReport | null;
}

export interface ApplyPatchOptions {
  layout?: Partial<FieldLayout>;
  backup?: BackupPolicy;
  /** false skips the reload signal entirely */
  reload?: Partial<ReloadConfig> | false;
  logger?: PatchLogger;
  now?: () => Date;
  /** Overrides for process lookup and signalling */
  reloadHooks?: Pick<ReloadOptions, "findProcesses" | "sendSignal">;
}

// =============================================================================
// Pure Operations
// =============================================================================

function validateRequest(request: PatchRequest): PatchDiagnostic | null {
  if (request.recordPath.length === 0) {
    return { code: "invalid-request", message: "record path is empty" };
  }
  if (request.recordPath.some((key) => key.length === 0)) {
    return { code: "invalid-request", message: "record path contains an empty key" };
  }
  if (request.fieldName.length === 0) {
    return { code: "invalid-request", message: "field name is empty" };
  }
  return null;
}

/**
 * Apply a request to document text without touching the filesystem
 */
export function patchDocument(
  document: string,
  request: PatchRequest,
  layout: Partial<FieldLayout> = {}
): DocumentPatch {
  const invalid = validateRequest(request);
  if (invalid) return { ok: false, diagnostic: invalid };

  const located = locateRecordPath(document, request.recordPath);
  if (!located.found) {
    if (located.reason === "unbalanced") {
      return {
        ok: false,
        diagnostic: {
          code: "malformed-document",
          key: located.key,
          offset: located.offset
        }
      };
    }
    return {
      ok: false,
      diagnostic: {
        code: "record-not-found",
        key: located.key,
        reason: located.reason
      }
    };
  }

  const { span } = located;
  const patched = patchField(
    document.slice(span.start, span.end),
    request.fieldName,
    request.value,
    { ...DEFAULT_LAYOUT, ...layout }
  );

  return {
    ok: true,
    document:
      document.slice(0, span.start) + patched.text + document.slice(span.end),
    inserted: patched.inserted,
    span
  };
}

// =============================================================================
// File Operations
// =============================================================================

function failure(diagnostic: PatchDiagnostic): PatchResult {
  return Object.freeze({
    success: false,
    written: false,
    inserted: null,
    document: null,
    backupPath: null,
    diagnostic,
    warnings: [],
    reload: null
  });
}

/**
 * Read, locate, patch, commit and signal. Every call starts again from the
 * file on disk; no state is kept between calls.
 */
export function applyPatch(
  filePath: string,
  request: PatchRequest,
  options: ApplyPatchOptions = {}
): PatchResult {
  const log = options.logger ?? defaultLogger;

  let original: string;
  try {
    original = readFileSync(filePath, "utf-8");
  } catch (error) {
    const cause = describeCause(error);
    log.error(`Could not read ${filePath}: ${cause.message}`);
    return failure({ code: "read-failed", path: filePath, ...cause });
  }
  log.debug(`Read ${filePath} (${original.length} characters)`);

  const patched = patchDocument(original, request, options.layout);
  if (!patched.ok) {
    log.error(`${describeDiagnostic(patched.diagnostic)}; ${filePath} left unchanged`);
    return failure(patched.diagnostic);
  }
  log.info(
    `${patched.inserted ? "Inserting" : "Replacing"} "${request.fieldName}" in ${request.recordPath.join(" > ")}`
  );

  const recordKey = request.recordPath[request.recordPath.length - 1] ?? "";
  const committed = commit(filePath, patched.document, {
    recordKey,
    expectedValue: encode(request.value),
    backup: options.backup ?? DEFAULT_CONFIG.backup,
    now: options.now,
    logger: log
  });

  const warnings = [...committed.warnings];
  let reload: ReloadReport | null = null;

  if (committed.written && options.reload !== false) {
    const settings = { ...DEFAULT_CONFIG.reload, ...options.reload };
    reload = notify(filePath, settings.processHint, {
      touch: settings.touch,
      signal: settings.signal,
      signalName: settings.signalName,
      now: options.now,
      logger: log,
      ...options.reloadHooks
    });
    for (const message of reload.notes) {
      warnings.push({ code: "reload-failed", message });
    }
  }

  return Object.freeze({
    success: committed.diagnostic.code === "ok",
    written: committed.written,
    inserted: committed.written ? patched.inserted : null,
    document: committed.written ? patched.document : null,
    backupPath: committed.backupPath,
    diagnostic: committed.diagnostic,
    warnings,
    reload
  });
}

// =============================================================================
// Re-exports
// =============================================================================

export {
  type FieldLayout,
  type Field,
  type LocateResult,
  type RecordSpan,
  type ScanResult,
  DEFAULT_LAYOUT,
  decode,
  encode,
  findField,
  findRecordBlock,
  locateRecord,
  locateRecordPath,
  patchField,
  quote
} from "./vdf";
export {
  type CommitOptions,
  type CommitOutcome,
  backupPathFor,
  commit,
  formatTimestamp,
  tempPathFor,
  verifyContent
} from "./commit";
export {
  type BackupPolicy,
  type PartialConfig,
  type ReloadConfig,
  type VdfPatchConfig,
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  loadConfig,
  parseConfig,
  resolveConfig
} from "./config";
export {
  type PatchDiagnostic,
  type PatchWarning,
  VdfPatchError,
  describeDiagnostic,
  describeWarning
} from "./errors";
export { type LogLevel, type PatchLogger, Logger, logger } from "./logger";
export { type ReloadOptions, type ReloadReport, notify, pgrep } from "./reload";
export {
  type LaunchOption,
  type CatalogOptions,
  findPreset,
  getLaunchOptionsCatalog
} from "./catalog";
export {
  type LocalConfigResult,
  LAUNCH_OPTIONS_FIELD,
  findLocalConfig,
  findSteamRoot,
  launchOptionsRequest,
  steamRootCandidates
} from "./steam";
