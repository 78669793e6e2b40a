import type { DistributionChannel } from "../release/channels.js";
import type { Reporter } from "../report/reporter.js";
import type { SchemaRegistry } from "../schema/registry.js";
import type { Downloader } from "../transport/downloader.js";
import type { SignatureVerifier } from "../trust/gpg.js";
import type { FetchConfig } from "../types/config.js";
import type { ReleaseManifest } from "../types/manifest.js";
import type { HostPlatform } from "./platform.js";

/**
 * Everything a stage may consult. Built once per invocation and passed
 * explicitly; stages never read process state themselves.
 */
export type PipelineContext = {
  config: FetchConfig;
  channel: DistributionChannel;
  platform: HostPlatform;
  downloader: Downloader;
  verifier: SignatureVerifier;
  schemas: SchemaRegistry;
  reporter: Reporter;
  /** Base for relative paths (output dir, trusted-key dir). */
  cwd: string;
  /** Explicit output directory; defaults to `<product>-<version>` under cwd. */
  outputDir?: string;
  trustedKeysDir: string;
};

/** The fetched release and the directory everything for it lands in. */
export type ReleaseWorkspace = {
  version: string;
  baseUrl: string;
  outputDir: string;
  manifestPath: string;
  manifest: ReleaseManifest;
};

export function assetUrl(workspace: Pick<ReleaseWorkspace, "baseUrl">, fileName: string): string {
  return `${workspace.baseUrl.replace(/\/+$/, "")}/${fileName}`;
}
