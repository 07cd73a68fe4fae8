/**
 * Builtin variables derived from the host, plus the OS identifier used to
 * pick `os:` overrides in manifests.
 */

import { hostname } from "node:os";

import { HostResolutionError, toError } from "@harvestkit/errors";

import type { BuiltinVars, HostInfoProvider } from "./types.js";

/** Host facts from the operating system */
export const osHostInfo: HostInfoProvider = {
  hostname: () => hostname(),
};

/**
 * Splits the host's fully-qualified name on the first `.` into
 * `hostname` and `domain` (empty when there is no dot).
 *
 * @throws {HostResolutionError} if the provider fails or reports an empty name
 */
export function getBuiltinVars(hostInfo: HostInfoProvider = osHostInfo): BuiltinVars {
  let host: string;
  try {
    host = hostInfo.hostname();
  } catch (error: unknown) {
    throw new HostResolutionError(toError(error));
  }
  if (host.length === 0) {
    throw new HostResolutionError();
  }

  const dot = host.indexOf(".");
  return dot === -1
    ? { hostname: host, domain: "" }
    : { hostname: host.slice(0, dot), domain: host.slice(dot + 1) };
}

/** Node platform names that manifests spell differently */
const OS_NAMES: Partial<Record<NodeJS.Platform, string>> = {
  win32: "windows",
  sunos: "solaris",
};

/**
 * OS identifier as written in manifest `os:` maps. Other platforms keep
 * their Node name (`linux`, `darwin`, `freebsd`, ...).
 */
export function currentOsName(platform: NodeJS.Platform = process.platform): string {
  return OS_NAMES[platform] ?? platform;
}
