import fs from "node:fs";
import path from "node:path";
import { assetUrl, type PipelineContext, type ReleaseWorkspace } from "../context.js";
import { PipelineError } from "../errors.js";
import { checkSha256 } from "../../trust/checksum.js";
import type { HashRecord } from "../../types/manifest.js";

export type VerifiedArtifact = {
  path: string;
  sha256: string;
  /** True when a previously downloaded copy already matched. */
  reused: boolean;
};

/**
 * Leave a byte-correct archive at `<outputDir>/<name>`. A matching local copy
 * is reused; anything else is downloaded and must match the trusted digest.
 */
export async function ensureArtifact(
  ctx: PipelineContext,
  ws: ReleaseWorkspace,
  name: string,
  hashes: HashRecord,
): Promise<VerifiedArtifact> {
  const expected = hashes.get(name);
  if (!expected) {
    throw new PipelineError("CHECKSUM_MISMATCH", `The trusted hash list has no entry for ${name}`, { file: name });
  }

  const target = path.join(ws.outputDir, name);
  if (fs.existsSync(target)) {
    const existing = await checkSha256(target, expected);
    if (existing.ok) {
      ctx.reporter.info("PACKAGE_REUSED", `Reusing previously downloaded package file: ${name}`);
      return { path: target, sha256: existing.actual, reused: true };
    }
    ctx.reporter.debug("PACKAGE_STALE", `Existing ${name} does not match its checksum; downloading again`);
  }

  ctx.reporter.info("PACKAGE_DOWNLOAD", `Downloading package file: ${name}`);
  await ctx.downloader.downloadFile(assetUrl(ws, name), target, ctx.channel.requestOptions());

  ctx.reporter.info("PACKAGE_VERIFY", "Verifying downloaded file");
  const result = await checkSha256(target, expected);
  if (!result.ok) {
    throw new PipelineError("CHECKSUM_MISMATCH", `${name}: checksum did not match`, {
      file: name,
      expected,
      actual: result.actual ?? null,
    });
  }
  return { path: target, sha256: result.actual, reused: false };
}
