import { PipelineError } from "../core/errors.js";
import type { SchemaRegistry } from "../schema/registry.js";
import type { FetchConfig, RepoName } from "../types/config.js";
import type { Downloader, RequestOptions } from "../transport/downloader.js";
import { featureRelease, maxVersion, tryParseVersion, type Version } from "./version.js";

/** A version the pipeline will fetch: concrete, or the channel's own "latest" pointer. */
export type ReleaseRef = { kind: "version"; version: Version } | { kind: "latest" };

export type GithubRelease = {
  tag_name: string;
  draft?: boolean;
  prerelease?: boolean;
};

/**
 * Where release files live and how "latest" is answered.
 * Channels differ in URL shape: one keys by full version, the other by feature line.
 */
export interface DistributionChannel {
  readonly name: RepoName;
  /** Turn a "latest" request into something this channel can download. */
  resolveLatest(downloader: Downloader): Promise<ReleaseRef>;
  downloadBase(ref: ReleaseRef): string;
  /** Version segment used in file names ("3.20.0" or "latest"). */
  fileTag(ref: ReleaseRef): string;
  requestOptions(): RequestOptions;
}

export const REPO_NAMES: readonly RepoName[] = ["github", "kitware"];

export function isRepoName(value: string): value is RepoName {
  return REPO_NAMES.some((name) => name === value);
}

function fillTemplate(template: string, version: Version): string {
  return template.replaceAll("{version}", version.raw).replaceAll("{feature}", featureRelease(version));
}

/**
 * Highest non-draft release tag, leading "v" stripped.
 * Tags that are not MAJOR.MINOR.PATCH[-rcN] are ignored.
 */
export function selectLatestRelease(releases: GithubRelease[]): Version | null {
  const versions: Version[] = [];
  for (const r of releases) {
    if (r.draft) continue;
    const v = tryParseVersion(r.tag_name.replace(/^v/, ""));
    if (v) versions.push(v);
  }
  return maxVersion(versions);
}

export class GithubChannel implements DistributionChannel {
  readonly name = "github" as const;

  constructor(
    private readonly config: FetchConfig,
    private readonly schemas: SchemaRegistry,
  ) {}

  async resolveLatest(downloader: Downloader): Promise<ReleaseRef> {
    const url = this.config.channels.github.releases_api;
    const raw = await downloader.fetchText(url, {
      headers: { ...this.requestOptions().headers, accept: "application/vnd.github+json" },
    });

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (e) {
      throw new PipelineError("FETCH_FAILED", `Release list from ${url} is not JSON: ${(e as Error).message}`, { url });
    }

    const check = this.schemas.validate("github-releases", parsed);
    if (!check.valid || !isReleaseList(parsed)) {
      throw new PipelineError("FETCH_FAILED", `Unexpected release list from ${url}`, { url, errors: check.errors });
    }

    const latest = selectLatestRelease(parsed);
    if (!latest) {
      throw new PipelineError("FETCH_FAILED", `No published release found at ${url}`, { url });
    }
    return { kind: "version", version: latest };
  }

  downloadBase(ref: ReleaseRef): string {
    if (ref.kind === "latest") {
      throw new Error("github channel needs a concrete version; resolve latest first");
    }
    return fillTemplate(this.config.channels.github.download_base, ref.version);
  }

  fileTag(ref: ReleaseRef): string {
    return ref.kind === "latest" ? "latest" : ref.version.raw;
  }

  requestOptions(): RequestOptions {
    const token = this.config.github_token;
    return token ? { headers: { authorization: `Bearer ${token}` } } : {};
  }
}

export class KitwareChannel implements DistributionChannel {
  readonly name = "kitware" as const;

  constructor(private readonly config: FetchConfig) {}

  /** The LatestRelease directory is the pointer; nothing to look up. */
  async resolveLatest(): Promise<ReleaseRef> {
    return { kind: "latest" };
  }

  downloadBase(ref: ReleaseRef): string {
    if (ref.kind === "latest") return this.config.channels.kitware.latest_base;
    return fillTemplate(this.config.channels.kitware.download_base, ref.version);
  }

  fileTag(ref: ReleaseRef): string {
    return ref.kind === "latest" ? "latest" : ref.version.raw;
  }

  requestOptions(): RequestOptions {
    return {};
  }
}

export function createChannel(config: FetchConfig, schemas: SchemaRegistry): DistributionChannel {
  const repo = config.repo;
  if (!isRepoName(repo)) {
    throw new PipelineError("UNSUPPORTED_REPO", `Unsupported repo "${repo}": expected one of ${REPO_NAMES.join(", ")}`, {
      repo,
    });
  }
  return repo === "github" ? new GithubChannel(config, schemas) : new KitwareChannel(config);
}

function isReleaseList(data: unknown): data is GithubRelease[] {
  return Array.isArray(data) && data.every((r) => typeof r === "object" && r !== null && typeof r.tag_name === "string");
}
