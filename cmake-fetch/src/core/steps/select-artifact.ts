import type { PipelineContext, ReleaseWorkspace } from "../context.js";
import { selectArtifact } from "../../release/manifest.js";
import type { ArtifactDescriptor } from "../../types/manifest.js";

export function selectPlatformArtifact(ctx: PipelineContext, ws: ReleaseWorkspace): ArtifactDescriptor {
  const { os, arch } = ctx.platform;
  const { artifact, ignored } = selectArtifact(ws.manifest, os, arch);

  if (ignored.length > 0) {
    ctx.reporter.debug("ARTIFACT_TIE", `Several archives match ${os}/${arch}; using ${artifact.name}`, {
      ignored: ignored.map((a) => a.name),
    });
  }
  if (artifact.deprecated) {
    ctx.reporter.warn("PACKAGE_DEPRECATED", `The package provides the following deprecation message:\n${artifact.deprecated}`);
  }
  return artifact;
}
