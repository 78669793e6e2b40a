import * as tar from "tar";
import type { PipelineContext } from "../context.js";
import { PipelineError } from "../errors.js";
import { binDirFor } from "../platform.js";

/**
 * Extract a gzip'd tarball with its single top-level directory stripped, so
 * `cmake-3.20.0/bin/cmake` lands at `<outputDir>/bin/cmake`.
 */
export async function extractArchive(archivePath: string, outputDir: string): Promise<void> {
  try {
    await tar.x({ file: archivePath, cwd: outputDir, strip: 1, strict: true });
  } catch (e) {
    throw new PipelineError("EXTRACTION_FAILED", `Could not extract ${archivePath}: ${(e as Error).message}`, {
      archive: archivePath,
    });
  }
}

export async function unpack(ctx: PipelineContext, archivePath: string, outputDir: string): Promise<string> {
  ctx.reporter.info("EXTRACT", `Extracting package to ${outputDir}`);
  await extractArchive(archivePath, outputDir);

  const binDir = binDirFor(ctx.platform.os, outputDir);
  ctx.reporter.info("PATH_HINT", `Prepend the following to your PATH: ${binDir}`, { binDir });
  return binDir;
}
