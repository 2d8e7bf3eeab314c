import { existsSync, readdirSync, statSync } from "node:fs";
import { join } from "node:path";

import { describeCause } from "./errors";
import type { PatchRequest } from "./index";

export const LAUNCH_OPTIONS_FIELD = "LaunchOptions";

export type LocalConfigResult =
  | { found: true; path: string; userId: string }
  | { found: false; reason: "no-userdata" | "no-users"; searched: string }
  | { found: false; reason: "unreadable"; searched: string; message: string }
  | { found: false; reason: "no-localconfig"; searched: string; userId: string };

/**
 * Usual Steam install locations on Linux: native, snap and flatpak
 */
export function steamRootCandidates(home: string): string[] {
  return [
    join(home, ".steam", "steam"),
    join(home, ".local", "share", "Steam"),
    "/usr/share/steam",
    join(home, ".steam", "root"),
    join(home, "snap", "steam", "common", ".steam", "steam"),
    "/var/lib/flatpak/app/com.valvesoftware.Steam/home/.steam/steam",
    join(home, ".var", "app", "com.valvesoftware.Steam", "home", ".steam", "steam")
  ];
}

export function findSteamRoot(
  home: string,
  exists: (path: string) => boolean = existsSync
): string | null {
  return steamRootCandidates(home).find((path) => exists(path)) ?? null;
}

/**
 * Numeric account directories, most recently modified first. Entries that
 * disappear while listing are skipped.
 */
function listUsers(userdata: string): { name: string; mtime: number }[] {
  const users: { name: string; mtime: number }[] = [];
  for (const entry of readdirSync(userdata, { withFileTypes: true })) {
    if (!entry.isDirectory() || !/^\d+$/.test(entry.name)) continue;
    const stats = statSync(join(userdata, entry.name), { throwIfNoEntry: false });
    if (stats) users.push({ name: entry.name, mtime: stats.mtimeMs });
  }
  return users.sort((a, b) => b.mtime - a.mtime);
}

/**
 * localconfig.vdf of the most recently modified user under userdata/
 */
export function findLocalConfig(steamRoot: string): LocalConfigResult {
  const userdata = join(steamRoot, "userdata");
  if (!existsSync(userdata)) {
    return { found: false, reason: "no-userdata", searched: userdata };
  }

  let users: { name: string; mtime: number }[];
  try {
    users = listUsers(userdata);
  } catch (error) {
    return {
      found: false,
      reason: "unreadable",
      searched: userdata,
      message: describeCause(error).message
    };
  }

  const latest = users[0];
  if (!latest) {
    return { found: false, reason: "no-users", searched: userdata };
  }

  const path = join(userdata, latest.name, "config", "localconfig.vdf");
  if (!existsSync(path)) {
    return {
      found: false,
      reason: "no-localconfig",
      searched: path,
      userId: latest.name
    };
  }

  return { found: true, path, userId: latest.name };
}

export function launchOptionsRequest(appId: string, command: string): PatchRequest {
  return {
    recordPath: ["apps", appId],
    fieldName: LAUNCH_OPTIONS_FIELD,
    value: command
  };
}
