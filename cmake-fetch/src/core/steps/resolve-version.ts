import type { PipelineContext } from "../context.js";
import type { ReleaseRef } from "../../release/channels.js";
import { LATEST, parseVersion } from "../../release/version.js";

/**
 * Explicit versions are validated locally and never touch the network;
 * "latest" is answered by the configured channel.
 */
export function parseRequestedVersion(requested: string): ReleaseRef {
  if (requested === LATEST) return { kind: "latest" };
  return { kind: "version", version: parseVersion(requested) };
}

export async function resolveVersion(ctx: PipelineContext, requested: string): Promise<ReleaseRef> {
  const ref = parseRequestedVersion(requested);
  if (ref.kind === "version") return ref;

  const resolved = await ctx.channel.resolveLatest(ctx.downloader);
  if (resolved.kind === "version") {
    ctx.reporter.info("LATEST_RESOLVED", `Latest release on ${ctx.channel.name}: ${resolved.version.raw}`, {
      version: resolved.version.raw,
    });
  } else {
    ctx.reporter.debug("LATEST_DEFERRED", `Using the ${ctx.channel.name} latest-release pointer`);
  }
  return resolved;
}
