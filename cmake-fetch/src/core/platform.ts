import path from "node:path";
import { PipelineError } from "./errors.js";

export type HostOs = "linux" | "macOS";

export type HostPlatform = {
  os: HostOs;
  /** Architecture as `uname -m` spells it, which is what manifests list. */
  arch: string;
};

const OS_NAMES: Partial<Record<NodeJS.Platform, HostOs>> = {
  linux: "linux",
  darwin: "macOS",
};

function unameArch(os: HostOs, arch: string): string {
  switch (arch) {
    case "x64":
      return "x86_64";
    case "arm64":
      return os === "linux" ? "aarch64" : "arm64";
    case "ia32":
      return "i386";
    case "ppc64":
      return "ppc64le";
    default:
      return arch;
  }
}

export function detectPlatform(platform: NodeJS.Platform = process.platform, arch: string = process.arch): HostPlatform {
  const os = OS_NAMES[platform];
  if (!os) {
    throw new PipelineError("UNSUPPORTED_PLATFORM", `Unrecognized platform ${platform}`, { platform, arch });
  }
  return { os, arch: unameArch(os, arch) };
}

/** Directory to prepend to PATH once the archive is unpacked. macOS ships an app bundle. */
export function binDirFor(os: HostOs, outputDir: string): string {
  return os === "macOS" ? path.join(outputDir, "CMake.app", "Contents", "bin") : path.join(outputDir, "bin");
}
