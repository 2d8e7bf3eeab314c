import {
  closeSync,
  constants,
  copyFileSync,
  existsSync,
  fchmodSync,
  fsyncSync,
  openSync,
  readFileSync,
  renameSync,
  statSync,
  unlinkSync,
  writeSync
} from "node:fs";

import type { BackupPolicy } from "./config";
import {
  type PatchDiagnostic,
  type PatchWarning,
  describeCause
} from "./errors";
import { type PatchLogger, logger as defaultLogger } from "./logger";
import { quote } from "./vdf";

export interface CommitOptions {
  /** Key that must still be present after the swap */
  recordKey: string;
  /** Value as it must appear on disk, already escaped */
  expectedValue: string;
  backup?: BackupPolicy;
  now?: () => Date;
  logger?: PatchLogger;
}

export interface CommitOutcome {
  /** True once the original path holds the new content */
  written: boolean;
  backupPath: string | null;
  diagnostic: PatchDiagnostic;
  warnings: PatchWarning[];
}

export const FIXED_BACKUP_SUFFIX = ".backup";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * `YYYYMMDD_HHMMSS` in local time
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function backupPathFor(
  targetPath: string,
  policy: BackupPolicy,
  now: Date
): string {
  return policy === "fixed"
    ? `${targetPath}${FIXED_BACKUP_SUFFIX}`
    : `${targetPath}.backup_${formatTimestamp(now)}`;
}

export function tempPathFor(targetPath: string): string {
  return `${targetPath}.tmp`;
}

/**
 * Whether the re-read content contains both the record key and the value
 */
export function verifyContent(
  content: string,
  recordKey: string,
  expectedValue: string
): boolean {
  return content.includes(quote(recordKey)) && content.includes(expectedValue);
}

/**
 * Copy the target next to itself. A timestamp backup never overwrites an
 * earlier one from the same second; a counter is appended instead.
 */
function writeBackup(
  targetPath: string,
  policy: BackupPolicy,
  now: Date
): string {
  const base = backupPathFor(targetPath, policy, now);
  if (policy === "fixed") {
    copyFileSync(targetPath, base);
    return base;
  }

  let candidate = base;
  for (let n = 1; existsSync(candidate); n++) {
    candidate = `${base}_${n}`;
  }
  copyFileSync(targetPath, candidate, constants.COPYFILE_EXCL);
  return candidate;
}

/**
 * Write the new text next to the target and flush it to disk. The staged file
 * takes the target's permission bits so the rename keeps them.
 */
function stage(tempPath: string, content: string, mode: number | undefined) {
  const fd = openSync(tempPath, "w", mode);
  try {
    if (mode !== undefined) fchmodSync(fd, mode);
    writeSync(fd, content, null, "utf-8");
    fsyncSync(fd);
  } finally {
    closeSync(fd);
  }
}

function removeStaged(tempPath: string, log: PatchLogger) {
  try {
    if (existsSync(tempPath) && statSync(tempPath).isFile()) {
      unlinkSync(tempPath);
      log.debug(`Removed staged file ${tempPath}`);
    }
  } catch (error) {
    log.warn(
      `Could not remove staged file ${tempPath}: ${describeCause(error).message}`
    );
  }
}

/**
 * Back up, stage, swap and verify. The original file is only affected by the
 * rename; anything that fails before it leaves the original untouched.
 */
export function commit(
  targetPath: string,
  newDocument: string,
  options: CommitOptions
): CommitOutcome {
  const log = options.logger ?? defaultLogger;
  const policy = options.backup ?? "timestamp";
  const now = (options.now ?? (() => new Date()))();
  const warnings: PatchWarning[] = [];

  // 1. backup (best effort)
  let backupPath: string | null = null;
  try {
    backupPath = writeBackup(targetPath, policy, now);
    log.info(`Backed up original to ${backupPath}`);
  } catch (error) {
    const path = backupPathFor(targetPath, policy, now);
    const { message } = describeCause(error);
    log.warn(`Could not create backup at ${path}: ${message}`);
    warnings.push({ code: "backup-failed", path, message });
  }

  // 2. stage, 3. swap
  const tempPath = tempPathFor(targetPath);
  try {
    const mode = statSync(targetPath, { throwIfNoEntry: false })?.mode;
    stage(tempPath, newDocument, mode === undefined ? undefined : mode & 0o7777);
    renameSync(tempPath, targetPath);
  } catch (error) {
    const cause = describeCause(error);
    log.error(`Could not write ${targetPath}: ${cause.message}`);
    removeStaged(tempPath, log);
    return {
      written: false,
      backupPath,
      diagnostic: { code: "write-failed", path: targetPath, ...cause },
      warnings
    };
  }
  log.debug(`Replaced ${targetPath} (${newDocument.length} characters)`);

  // 4. verify
  let verified: boolean;
  let reason = "expected key or value missing after write";
  try {
    verified = verifyContent(
      readFileSync(targetPath, "utf-8"),
      options.recordKey,
      options.expectedValue
    );
  } catch (error) {
    verified = false;
    reason = `re-read failed: ${describeCause(error).message}`;
  }

  if (!verified) {
    log.warn(
      `Could not verify ${targetPath}${backupPath ? `; original kept at ${backupPath}` : ""}`
    );
    return {
      written: true,
      backupPath,
      diagnostic: {
        code: "verification-failed",
        path: targetPath,
        message: reason
      },
      warnings
    };
  }

  log.debug(`Verified ${targetPath}`);
  return { written: true, backupPath, diagnostic: { code: "ok" }, warnings };
}
