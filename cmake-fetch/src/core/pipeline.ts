import type { PipelineContext, ReleaseWorkspace } from "./context.js";
import { isPipelineError, type ErrorCode } from "./errors.js";
import { resolveVersion } from "./steps/resolve-version.js";
import { fetchManifest } from "./steps/fetch-manifest.js";
import { verifyTrust, type TrustedHashes } from "./steps/verify-trust.js";
import { selectPlatformArtifact } from "./steps/select-artifact.js";
import { ensureArtifact, type VerifiedArtifact } from "./steps/check-integrity.js";
import { unpack } from "./steps/unpack.js";
import type { ArtifactDescriptor } from "../types/manifest.js";

export const STAGES = ["resolve", "manifest", "trust", "select", "integrity", "unpack"] as const;

export type StageId = (typeof STAGES)[number];

export type StageRecord = {
  id: StageId;
  status: "ok" | "error";
  duration_ms: number;
};

export type PipelineResult =
  | {
      ok: true;
      version: string;
      outputDir: string;
      archive: string;
      binDir: string;
      reusedArchive: boolean;
      stages: StageRecord[];
    }
  | {
      ok: false;
      error: { code: ErrorCode; message: string; details?: Record<string, unknown> };
      stages: StageRecord[];
    };

/**
 * Resolver → Fetcher → Verifier → Selector → Checker → Unpacker.
 * Strictly forward; the first failing stage ends the run.
 */
export async function runPipeline(ctx: PipelineContext, requested: string): Promise<PipelineResult> {
  const stages: StageRecord[] = [];

  async function stage<T>(id: StageId, fn: () => Promise<T> | T): Promise<T> {
    const start = Date.now();
    try {
      const out = await fn();
      stages.push({ id, status: "ok", duration_ms: Date.now() - start });
      if (ctx.reporter.format === "jsonl") {
        ctx.reporter.info(`${id.toUpperCase()}_OK`, `${id} OK`);
      }
      return out;
    } catch (e) {
      stages.push({ id, status: "error", duration_ms: Date.now() - start });
      throw e;
    }
  }

  try {
    const ref = await stage("resolve", () => resolveVersion(ctx, requested));
    const ws: ReleaseWorkspace = await stage("manifest", () => fetchManifest(ctx, ref));
    const trusted: TrustedHashes = await stage("trust", () => verifyTrust(ctx, ws));
    const artifact: ArtifactDescriptor = await stage("select", () => selectPlatformArtifact(ctx, ws));
    const archive: VerifiedArtifact = await stage("integrity", () =>
      ensureArtifact(ctx, ws, artifact.name, trusted.hashes),
    );
    const binDir = await stage("unpack", () => unpack(ctx, archive.path, ws.outputDir));

    return {
      ok: true,
      version: ws.version,
      outputDir: ws.outputDir,
      archive: archive.path,
      binDir,
      reusedArchive: archive.reused,
      stages,
    };
  } catch (e) {
    if (!isPipelineError(e)) throw e;
    return {
      ok: false,
      error: { code: e.code, message: e.message, ...(e.details ? { details: e.details } : {}) },
      stages,
    };
  }
}
