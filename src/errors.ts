export type PatchDiagnostic =
  | { code: "ok" }
  | { code: "invalid-request"; message: string }
  | { code: "read-failed"; path: string; message: string; errno?: string }
  | {
      code: "record-not-found";
      key: string;
      reason: "missing-key" | "not-a-record";
    }
  | { code: "malformed-document"; key: string; offset: number }
  | { code: "write-failed"; path: string; message: string; errno?: string }
  | { code: "verification-failed"; path: string; message: string };

export type PatchWarning =
  | { code: "backup-failed"; path: string; message: string }
  | { code: "reload-failed"; message: string };

export type VdfPatchErrorCode = "invalid-config" | "usage";

/**
 * Thrown for configuration and usage mistakes. Failures of a patch itself are
 * reported through PatchDiagnostic instead.
 */
export class VdfPatchError extends Error {
  readonly code: VdfPatchErrorCode;

  constructor(code: VdfPatchErrorCode, message: string) {
    super(message);
    this.name = "VdfPatchError";
    this.code = code;
  }
}

/**
 * Message and errno code of something caught from node:fs
 */
export function describeCause(error: unknown): {
  message: string;
  errno?: string;
} {
  if (error instanceof Error) {
    const errno =
      "code" in error && typeof error.code === "string" ? error.code : undefined;
    return errno === undefined
      ? { message: error.message }
      : { message: error.message, errno };
  }
  return { message: String(error) };
}

/**
 * One-line, human readable form of a diagnostic
 */
export function describeDiagnostic(diagnostic: PatchDiagnostic): string {
  switch (diagnostic.code) {
    case "ok":
      return "Patch applied and verified";
    case "invalid-request":
      return `Invalid request: ${diagnostic.message}`;
    case "read-failed":
      return `Could not read ${diagnostic.path}: ${diagnostic.message}`;
    case "record-not-found":
      return diagnostic.reason === "missing-key"
        ? `Record "${diagnostic.key}" not found`
        : `Key "${diagnostic.key}" is not followed by a record block`;
    case "malformed-document":
      return `Unbalanced braces in record "${diagnostic.key}" (block opens at offset ${diagnostic.offset})`;
    case "write-failed":
      return `Could not write ${diagnostic.path}: ${diagnostic.message}`;
    case "verification-failed":
      return `${diagnostic.path} was replaced but could not be verified: ${diagnostic.message}`;
  }
}

export function describeWarning(warning: PatchWarning): string {
  switch (warning.code) {
    case "backup-failed":
      return `Backup to ${warning.path} failed: ${warning.message}`;
    case "reload-failed":
      return `Reload signal: ${warning.message}`;
  }
}
