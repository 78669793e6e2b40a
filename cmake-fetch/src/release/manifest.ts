import { PipelineError } from "../core/errors.js";
import { tailLines } from "../report/text.js";
import { isValidVersion } from "./version.js";
import type { SchemaRegistry } from "../schema/registry.js";
import type { ArtifactDescriptor, HashFileDescriptor, ReleaseManifest } from "../types/manifest.js";

export const SHA256_ALGORITHM = "SHA-256";

export const ARCHIVE_CLASS = "archive";

/** cmake-3.20.0-files-v1.json */
export function manifestFileName(product: string, tag: string, schemaMajor: number): string {
  return `${product}-${tag}-files-v${schemaMajor}.json`;
}

export function manifestSchemaName(schemaMajor: number): string {
  return `files-v${schemaMajor}`;
}

/** A bare file name: no directory part, not `.` or `..`. */
export function isPlainFileName(name: string): boolean {
  return /^[^/\\]+$/.test(name) && name !== "." && name !== "..";
}

function unsafeNames(manifest: ReleaseManifest): string[] {
  const names = [
    ...manifest.hashFiles.flatMap((h) => [h.name, ...(h.signature ?? [])]),
    ...manifest.files.map((f) => f.name),
  ];
  return names.filter((n) => !isPlainFileName(n));
}

function isReleaseManifest(data: unknown): data is ReleaseManifest {
  if (typeof data !== "object" || data === null) return false;
  return "hashFiles" in data && Array.isArray(data.hashFiles) && "files" in data && Array.isArray(data.files);
}

/**
 * Parse and schema-check a manifest body. The schema is picked by major
 * version; a major without a registered schema is refused outright.
 */
export function parseManifest(raw: string, schemaMajor: number, schemas: SchemaRegistry): ReleaseManifest {
  const schemaName = manifestSchemaName(schemaMajor);
  if (!schemas.has(schemaName)) {
    throw new PipelineError("MANIFEST_PARSE_FAILED", `Unsupported manifest schema ${schemaName}`, {
      schema: schemaName,
      supported: schemas.names().filter((n) => n.startsWith("files-v")),
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new PipelineError("MANIFEST_PARSE_FAILED", `Manifest is not valid JSON: ${(e as Error).message}`, {
      tail: tailLines(raw),
    });
  }

  const check = schemas.validate(schemaName, parsed);
  if (!check.valid || !isReleaseManifest(parsed)) {
    throw new PipelineError("MANIFEST_PARSE_FAILED", `Manifest does not match ${schemaName}: ${check.errors ?? "wrong shape"}`, {
      tail: tailLines(raw),
    });
  }

  // Every name lands under the output directory before any signature is checked.
  const unsafe = unsafeNames(parsed);
  if (unsafe.length > 0) {
    throw new PipelineError("MANIFEST_PARSE_FAILED", `Manifest lists file names with a directory part: ${unsafe.join(", ")}`, {
      names: unsafe,
    });
  }
  const versionString = parsed.version?.string;
  if (versionString !== undefined && !isValidVersion(versionString)) {
    throw new PipelineError("MANIFEST_PARSE_FAILED", `Manifest version "${versionString}" is not MAJOR.MINOR.PATCH[-rcN]`, {
      version: versionString,
    });
  }
  return parsed;
}

export function findSha256HashFile(manifest: ReleaseManifest): HashFileDescriptor {
  const found = manifest.hashFiles.find((h) => h.algorithm.includes(SHA256_ALGORITHM));
  if (!found) {
    throw new PipelineError("NO_HASH_FILE", `Manifest lists no ${SHA256_ALGORITHM} hash file`);
  }
  return found;
}

export type ArtifactSelection = {
  artifact: ArtifactDescriptor;
  /** Further matches, in manifest order, that lost the tie-break. */
  ignored: ArtifactDescriptor[];
};

/**
 * The archive for an OS/architecture pair. Ties go to the first entry in
 * manifest order.
 */
export function selectArtifact(manifest: ReleaseManifest, os: string, arch: string): ArtifactSelection {
  const matches = manifest.files.filter(
    (f) => f.os.includes(os) && f.architecture.includes(arch) && f.class === ARCHIVE_CLASS,
  );
  const [artifact, ...ignored] = matches;
  if (!artifact) {
    throw new PipelineError("UNSUPPORTED_PLATFORM", `No ${ARCHIVE_CLASS} published for ${os}/${arch}`, { os, arch });
  }
  return { artifact, ignored };
}
