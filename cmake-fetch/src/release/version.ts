import { PipelineError } from "../core/errors.js";

export type Version = {
  major: number;
  minor: number;
  patch: number;
  /** Release candidate number, or null for a final release. */
  rc: number | null;
  raw: string;
};

export const VERSION_PATTERN = /^(\d+)\.(\d+)\.(\d+)(?:-rc(\d+))?$/;

export const LATEST = "latest";

export function isValidVersion(value: string): boolean {
  return VERSION_PATTERN.test(value);
}

/** Parse `MAJOR.MINOR.PATCH[-rcN]`, or null when the string does not match. */
export function tryParseVersion(value: string): Version | null {
  const m = VERSION_PATTERN.exec(value);
  if (!m) return null;
  return {
    major: parseInt(m[1], 10),
    minor: parseInt(m[2], 10),
    patch: parseInt(m[3], 10),
    rc: m[4] === undefined ? null : parseInt(m[4], 10),
    raw: value,
  };
}

export function parseVersion(value: string): Version {
  const version = tryParseVersion(value);
  if (!version) {
    throw new PipelineError(
      "INVALID_VERSION",
      `Invalid version "${value}": expected MAJOR.MINOR.PATCH or MAJOR.MINOR.PATCH-rcN`,
      { version: value },
    );
  }
  return version;
}

/**
 * Total order on versions. A final release sorts after every release
 * candidate of the same triple; rc numbers compare numerically.
 */
export function compareVersions(a: Version, b: Version): number {
  if (a.major !== b.major) return a.major - b.major;
  if (a.minor !== b.minor) return a.minor - b.minor;
  if (a.patch !== b.patch) return a.patch - b.patch;
  if (a.rc === b.rc) return 0;
  if (a.rc === null) return 1;
  if (b.rc === null) return -1;
  return a.rc - b.rc;
}

/** Highest version in the list, or null when it is empty. */
export function maxVersion(versions: Version[]): Version | null {
  let best: Version | null = null;
  for (const v of versions) {
    if (!best || compareVersions(v, best) > 0) best = v;
  }
  return best;
}

/** `MAJOR.MINOR`, the feature line some download hosts key their directories by. */
export function featureRelease(version: Version): string {
  return `${version.major}.${version.minor}`;
}
