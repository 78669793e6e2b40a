import fs from "node:fs";
import path from "node:path";
import { assetUrl, type PipelineContext, type ReleaseWorkspace } from "../context.js";
import { PipelineError } from "../errors.js";
import { findSha256HashFile } from "../../release/manifest.js";
import { parseHashList } from "../../release/hash-list.js";
import { KEYRING_FILE, listTrustedKeys } from "../../trust/trusted-keys.js";
import type { HashRecord } from "../../types/manifest.js";

export type TrustSearch = { ok: true; signature: string } | { ok: false; tried: string[] };

/**
 * Try candidates in order and stop at the first that verifies.
 */
export async function findTrustedSignature(
  signatures: string[],
  verifies: (signature: string) => Promise<boolean>,
): Promise<TrustSearch> {
  const tried: string[] = [];
  for (const signature of signatures) {
    tried.push(signature);
    if (await verifies(signature)) return { ok: true, signature };
  }
  return { ok: false, tried };
}

/**
 * Keyring for this invocation: the trusted-key directory imported into a file
 * under the output directory, or null for gpg's default keyring.
 */
export async function prepareKeyring(ctx: PipelineContext, outputDir: string): Promise<string | null> {
  const keyDir = path.resolve(ctx.cwd, ctx.trustedKeysDir);
  const keys = listTrustedKeys(keyDir);
  if (keys.length === 0) {
    ctx.reporter.debug("KEYRING_DEFAULT", `No trusted keys in ${keyDir}; using the default keyring`);
    return null;
  }

  const keyringPath = path.join(outputDir, KEYRING_FILE);
  ctx.reporter.info("KEYRING_CREATE", `Creating local keyring ${keyringPath} for trusted keys in ${keyDir}`, {
    keys: keys.map((k) => path.basename(k)),
  });
  try {
    await ctx.verifier.importKeys(keys, keyringPath);
  } catch (e) {
    throw new PipelineError("UNTRUSTED_SIGNATURE", `Could not build keyring from ${keyDir}: ${(e as Error).message}`, {
      keyDir,
    });
  }
  return keyringPath;
}

export type TrustedHashes = {
  hashFile: string;
  signature: string;
  hashes: HashRecord;
};

/**
 * Establish that the SHA-256 hash list is authentic before anything relies on it.
 */
export async function verifyTrust(ctx: PipelineContext, ws: ReleaseWorkspace): Promise<TrustedHashes> {
  const { reporter, downloader, verifier, channel } = ctx;
  const descriptor = findSha256HashFile(ws.manifest);
  if (descriptor.deprecated) {
    reporter.warn("HASH_FILE_DEPRECATED", `The hash file provides the following deprecation message:\n${descriptor.deprecated}`);
  }

  const keyring = await prepareKeyring(ctx, ws.outputDir);

  const hashPath = path.join(ws.outputDir, descriptor.name);
  await downloader.downloadFile(assetUrl(ws, descriptor.name), hashPath, channel.requestOptions());

  const search = await findTrustedSignature(descriptor.signature ?? [], async (signature) => {
    reporter.info("SIGNATURE_CHECK", `Downloading and checking signature file: ${signature}`);
    const sigPath = path.join(ws.outputDir, signature);
    await downloader.downloadFile(assetUrl(ws, signature), sigPath, channel.requestOptions());
    const outcome = await verifier.verify(sigPath, hashPath, keyring);
    if (outcome.output) reporter.debug("GPG_OUTPUT", outcome.output);
    return outcome.valid;
  });

  if (!search.ok) {
    throw new PipelineError(
      "UNTRUSTED_SIGNATURE",
      [
        "Unable to verify hashes with provided signature(s).",
        "Check if a new public key is now being used.",
        "This may require updating your project with new public key files.",
      ].join("\n"),
      { hashFile: descriptor.name, tried: search.tried },
    );
  }

  const hashes = parseHashList(fs.readFileSync(hashPath, "utf8"));
  return { hashFile: hashPath, signature: search.signature, hashes };
}
