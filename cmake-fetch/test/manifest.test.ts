import { describe, expect, it } from "vitest";
import { PipelineError } from "../src/core/errors.js";
import { parseHashList } from "../src/release/hash-list.js";
import {
  findSha256HashFile,
  manifestFileName,
  parseManifest,
  selectArtifact,
} from "../src/release/manifest.js";
import { createRegistry } from "../src/schema/registry.js";
import { sampleManifest } from "./helpers.js";

const schemas = createRegistry();

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (e) {
    if (e instanceof PipelineError) return e.code;
    throw e;
  }
  return undefined;
}

describe("manifest file name", () => {
  it("follows <product>-<version>-files-v<major>.json", () => {
    expect(manifestFileName("cmake", "3.20.0", 1)).toBe("cmake-3.20.0-files-v1.json");
    expect(manifestFileName("cmake", "latest", 1)).toBe("cmake-latest-files-v1.json");
  });
});

describe("parseManifest", () => {
  it("parses a valid document", () => {
    const manifest = parseManifest(JSON.stringify(sampleManifest()), 1, schemas);
    expect(manifest.version?.string).toBe("3.20.0");
    expect(manifest.files).toHaveLength(3);
  });

  it("surfaces the last 13 lines of a non-JSON body", () => {
    const body = Array.from({ length: 20 }, (_, i) => `line ${i + 1}`).join("\n") + "\n";
    try {
      parseManifest(body, 1, schemas);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(PipelineError);
      const err = e as PipelineError;
      expect(err.code).toBe("MANIFEST_PARSE_FAILED");
      expect(err.details?.tail).toEqual(Array.from({ length: 13 }, (_, i) => `line ${i + 8}`));
    }
  });

  it("rejects JSON that does not fit the schema", () => {
    expect(codeOf(() => parseManifest(JSON.stringify({ message: "Not Found" }), 1, schemas))).toBe(
      "MANIFEST_PARSE_FAILED",
    );
  });

  it("rejects hash and signature names with a directory part", () => {
    const manifest = sampleManifest();
    manifest.hashFiles[0] = { algorithm: ["SHA-256"], name: "../../escaped.txt", signature: ["sig/../x.asc"] };
    try {
      parseManifest(JSON.stringify(manifest), 1, schemas);
      expect.unreachable();
    } catch (e) {
      const err = e as PipelineError;
      expect(err.code).toBe("MANIFEST_PARSE_FAILED");
      expect(err.details?.names).toEqual(["../../escaped.txt", "sig/../x.asc"]);
    }
  });

  it("rejects package names that are not bare file names", () => {
    for (const name of ["..", "/tmp/cmake.tar.gz", "dir\\cmake.tar.gz"]) {
      const manifest = sampleManifest();
      manifest.files[0] = { ...manifest.files[0], name };
      expect(codeOf(() => parseManifest(JSON.stringify(manifest), 1, schemas))).toBe("MANIFEST_PARSE_FAILED");
    }
  });

  it("rejects a version string that is not a release version", () => {
    try {
      parseManifest(JSON.stringify(sampleManifest("..")), 1, schemas);
      expect.unreachable();
    } catch (e) {
      const err = e as PipelineError;
      expect(err.code).toBe("MANIFEST_PARSE_FAILED");
      expect(err.details?.version).toBe("..");
    }
  });

  it("refuses a schema major it has no schema for", () => {
    try {
      parseManifest(JSON.stringify(sampleManifest()), 2, schemas);
      expect.unreachable();
    } catch (e) {
      const err = e as PipelineError;
      expect(err.code).toBe("MANIFEST_PARSE_FAILED");
      expect(err.message).toBe("Unsupported manifest schema files-v2");
      expect(err.details?.supported).toEqual(["files-v1"]);
    }
  });
});

describe("findSha256HashFile", () => {
  it("picks the descriptor listing SHA-256", () => {
    const manifest = sampleManifest();
    manifest.hashFiles.unshift({ algorithm: ["SHA-1"], name: "cmake-3.20.0-SHA-1.txt" });
    expect(findSha256HashFile(manifest).name).toBe("cmake-3.20.0-SHA-256.txt");
  });

  it("fails with NO_HASH_FILE when none lists SHA-256", () => {
    const manifest = sampleManifest();
    manifest.hashFiles = [{ algorithm: ["MD5"], name: "x.txt" }];
    expect(codeOf(() => findSha256HashFile(manifest))).toBe("NO_HASH_FILE");
  });
});

describe("selectArtifact", () => {
  it("matches os, architecture and the archive class", () => {
    const { artifact, ignored } = selectArtifact(sampleManifest(), "linux", "x86_64");
    expect(artifact.name).toBe("cmake-3.20.0-linux-x86_64.tar.gz");
    expect(ignored).toEqual([]);
  });

  it("matches the macOS universal archive for either architecture", () => {
    expect(selectArtifact(sampleManifest(), "macOS", "arm64").artifact.name).toBe("cmake-3.20.0-macos-universal.tar.gz");
    expect(selectArtifact(sampleManifest(), "macOS", "x86_64").artifact.name).toBe(
      "cmake-3.20.0-macos-universal.tar.gz",
    );
  });

  it("fails instead of picking an unrelated entry", () => {
    expect(codeOf(() => selectArtifact(sampleManifest(), "linux", "aarch64"))).toBe("UNSUPPORTED_PLATFORM");
  });

  it("breaks ties by manifest order", () => {
    const manifest = sampleManifest();
    manifest.files.push({ os: ["linux"], architecture: ["x86_64"], class: "archive", name: "second.tar.gz" });
    const { artifact, ignored } = selectArtifact(manifest, "linux", "x86_64");
    expect(artifact.name).toBe("cmake-3.20.0-linux-x86_64.tar.gz");
    expect(ignored.map((a) => a.name)).toEqual(["second.tar.gz"]);
  });
});

describe("parseHashList", () => {
  it("reads sha256sum lines, text and binary mode", () => {
    const a = "a".repeat(64);
    const b = "B".repeat(64);
    const record = parseHashList(`${a}  cmake-3.20.0-linux-x86_64.tar.gz\n${b} *cmake-3.20.0.zip\nnot a hash line\n\n`);
    expect([...record.entries()]).toEqual([
      ["cmake-3.20.0-linux-x86_64.tar.gz", a],
      ["cmake-3.20.0.zip", "b".repeat(64)],
    ]);
  });
});
