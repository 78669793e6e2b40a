import { describe, expect, it } from "vitest";
import { PipelineError } from "../src/core/errors.js";
import {
  compareVersions,
  featureRelease,
  isValidVersion,
  maxVersion,
  parseVersion,
  tryParseVersion,
} from "../src/release/version.js";

function v(raw: string) {
  return parseVersion(raw);
}

describe("version parsing", () => {
  it("accepts MAJOR.MINOR.PATCH and -rcN unchanged", () => {
    for (const raw of ["3.20.0", "0.0.1", "10.200.3000", "3.21.0-rc1", "3.21.0-rc12"]) {
      expect(isValidVersion(raw)).toBe(true);
      expect(parseVersion(raw).raw).toBe(raw);
    }
  });

  it("splits the components", () => {
    expect(tryParseVersion("3.21.4-rc2")).toEqual({ major: 3, minor: 21, patch: 4, rc: 2, raw: "3.21.4-rc2" });
    expect(tryParseVersion("3.21.4")?.rc).toBeNull();
  });

  it("rejects anything else with INVALID_VERSION", () => {
    for (const raw of ["3.20", "v3.20.0", "3.20.0-beta1", "3.20.0-rc", "3.20.x", " 3.20.0", "3.20.0.1", "latest", ""]) {
      expect(isValidVersion(raw)).toBe(false);
      try {
        parseVersion(raw);
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(PipelineError);
        expect((e as PipelineError).code).toBe("INVALID_VERSION");
      }
    }
  });
});

describe("version ordering", () => {
  it("ranks a final release above its own release candidates", () => {
    expect(compareVersions(v("1.2.0"), v("1.2.0-rc1"))).toBeGreaterThan(0);
    expect(compareVersions(v("1.2.0-rc1"), v("1.2.0"))).toBeLessThan(0);
  });

  it("compares rc numbers numerically", () => {
    expect(compareVersions(v("1.2.0-rc10"), v("1.2.0-rc2"))).toBeGreaterThan(0);
  });

  it("compares numeric components numerically", () => {
    expect(compareVersions(v("3.10.0"), v("3.9.9"))).toBeGreaterThan(0);
    expect(compareVersions(v("2.0.0"), v("10.0.0"))).toBeLessThan(0);
    expect(compareVersions(v("3.20.1"), v("3.20.1"))).toBe(0);
  });

  it("picks the maximum of 1.2.0, 1.2.0-rc1 and 1.1.9", () => {
    expect(maxVersion([v("1.2.0-rc1"), v("1.2.0"), v("1.1.9")])?.raw).toBe("1.2.0");
    expect(maxVersion([v("1.1.9"), v("1.2.0-rc1"), v("1.2.0")])?.raw).toBe("1.2.0");
  });

  it("returns null for an empty list", () => {
    expect(maxVersion([])).toBeNull();
  });

  it("derives the feature line", () => {
    expect(featureRelease(v("3.20.5-rc1"))).toBe("3.20");
  });
});
