import { createHash } from "node:crypto";
import fs from "node:fs";

/** SHA-256 of a file, streamed so release archives never sit in memory whole. */
export async function computeSha256(filePath: string): Promise<string> {
  const hash = createHash("sha256");
  for await (const chunk of fs.createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}

export function computeSha256FromContent(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

export type ChecksumResult =
  | { ok: true; actual: string }
  | { ok: false; reason: "missing_file" | "mismatch"; actual?: string };

/** Compare a file on disk with an expected hex digest (case-insensitive). */
export async function checkSha256(filePath: string, expected: string): Promise<ChecksumResult> {
  if (!fs.existsSync(filePath)) return { ok: false, reason: "missing_file" };
  const actual = await computeSha256(filePath);
  if (actual !== expected.toLowerCase()) return { ok: false, reason: "mismatch", actual };
  return { ok: true, actual };
}
