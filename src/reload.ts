import { execFileSync } from "node:child_process";
import { utimesSync } from "node:fs";

import { describeCause } from "./errors";
import { type PatchLogger, logger as defaultLogger } from "./logger";

export interface ReloadOptions {
  touch?: boolean;
  signal?: boolean;
  signalName?: NodeJS.Signals;
  now?: () => Date;
  logger?: PatchLogger;
  /** Pids of processes whose command line matches the hint */
  findProcesses?: (hint: string) => number[];
  sendSignal?: (pid: number, signal: NodeJS.Signals) => void;
}

export interface ReloadReport {
  touched: boolean;
  signalled: number[];
  notes: string[];
}

function isExitStatus(error: unknown, status: number): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "status" in error &&
    error.status === status
  );
}

/**
 * Pids from `pgrep -f`. No match (exit status 1) is an empty list.
 */
export function pgrep(hint: string): number[] {
  let output: string;
  try {
    output = execFileSync("pgrep", ["-f", hint], {
      encoding: "utf-8",
      stdio: ["ignore", "pipe", "ignore"]
    });
  } catch (error) {
    if (isExitStatus(error, 1)) return [];
    throw error;
  }

  return output
    .split("\n")
    .map((line) => Number.parseInt(line.trim(), 10))
    .filter((pid) => Number.isInteger(pid) && pid > 0);
}

function killProcess(pid: number, signal: NodeJS.Signals) {
  process.kill(pid, signal);
}

/**
 * Let a running owner of the file notice the change. Never throws; every
 * failure ends up in the report's notes.
 */
export function notify(
  targetPath: string,
  ownerProcessNameHint: string,
  options: ReloadOptions = {}
): ReloadReport {
  const log = options.logger ?? defaultLogger;
  const signalName = options.signalName ?? "SIGHUP";
  const findProcesses = options.findProcesses ?? pgrep;
  const sendSignal = options.sendSignal ?? killProcess;
  const report: ReloadReport = { touched: false, signalled: [], notes: [] };
  const note = (message: string) => {
    report.notes.push(message);
    log.info(`Reload: ${message}`);
  };

  if (options.touch !== false) {
    try {
      const now = (options.now ?? (() => new Date()))();
      utimesSync(targetPath, now, now);
      report.touched = true;
      log.debug(`Touched ${targetPath}`);
    } catch (error) {
      note(`could not update timestamp: ${describeCause(error).message}`);
    }
  }

  if (options.signal === false) return report;

  let pids: number[];
  try {
    const own = new Set([process.pid, process.ppid]);
    pids = findProcesses(ownerProcessNameHint).filter((pid) => !own.has(pid));
  } catch (error) {
    note(
      `could not look up "${ownerProcessNameHint}" processes: ${describeCause(error).message}`
    );
    return report;
  }

  if (pids.length === 0) {
    log.debug(`No running "${ownerProcessNameHint}" process to signal`);
    return report;
  }

  for (const pid of pids) {
    try {
      sendSignal(pid, signalName);
      report.signalled.push(pid);
    } catch (error) {
      note(`could not send ${signalName} to ${pid}: ${describeCause(error).message}`);
    }
  }

  if (report.signalled.length > 0) {
    log.info(
      `Sent ${signalName} to "${ownerProcessNameHint}" (${report.signalled.join(", ")})`
    );
  }
  return report;
}
