import fs from "node:fs";
import path from "node:path";
import { assetUrl, type PipelineContext, type ReleaseWorkspace } from "../context.js";
import type { ReleaseRef } from "../../release/channels.js";
import { manifestFileName, parseManifest } from "../../release/manifest.js";

/**
 * Download and parse the release manifest, then settle the output directory.
 * The directory name needs the concrete version, which a "latest" pointer only
 * reveals inside the manifest.
 */
export async function fetchManifest(ctx: PipelineContext, ref: ReleaseRef): Promise<ReleaseWorkspace> {
  const { config, channel } = ctx;
  const baseUrl = channel.downloadBase(ref);
  const fileName = manifestFileName(config.product, channel.fileTag(ref), config.manifest_schema);
  const url = assetUrl({ baseUrl }, fileName);

  ctx.reporter.info("MANIFEST_DOWNLOAD", `Downloading JSON package descriptions file: ${fileName}`, { url });
  const raw = await ctx.downloader.fetchText(url, channel.requestOptions());
  const manifest = parseManifest(raw, config.manifest_schema, ctx.schemas);

  const version = manifest.version?.string ?? (ref.kind === "version" ? ref.version.raw : "latest");
  const outputDir = ctx.outputDir
    ? path.resolve(ctx.cwd, ctx.outputDir)
    : path.resolve(ctx.cwd, `${config.product}-${version}`);
  fs.mkdirSync(outputDir, { recursive: true });

  const manifestPath = path.join(outputDir, fileName);
  fs.writeFileSync(manifestPath, raw, "utf8");

  return { version, baseUrl, outputDir, manifestPath, manifest };
}
