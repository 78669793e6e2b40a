import fs from "node:fs";
import path from "node:path";
import * as tar from "tar";
import { loadConfig } from "../src/config/loader.js";
import { validateConfig } from "../src/config/validator.js";
import type { PipelineContext } from "../src/core/context.js";
import { PipelineError } from "../src/core/errors.js";
import { createChannel } from "../src/release/channels.js";
import { Reporter } from "../src/report/reporter.js";
import { createRegistry } from "../src/schema/registry.js";
import type { DownloadResult, Downloader, RequestOptions, TransferProgress } from "../src/transport/downloader.js";
import type { SignatureVerifier, VerifyOutcome } from "../src/trust/gpg.js";
import { computeSha256FromContent } from "../src/trust/checksum.js";
import type { FetchConfig } from "../src/types/config.js";
import type { ReleaseManifest } from "../src/types/manifest.js";

export const GITHUB_BASE = "https://github.com/Kitware/CMake/releases/download/v3.20.0";

/** Captures writes so assertions can read them back. */
export class MemoryStream {
  chunks: string[] = [];
  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }
  text(): string {
    return this.chunks.join("");
  }
}

/** In-memory stand-in for the network: serves registered URLs, records every request. */
export class FakeDownloader implements Downloader {
  readonly requests: string[] = [];
  readonly requestHeaders: Array<Record<string, string> | undefined> = [];
  /** Called once per completed file download, at 100%. */
  onProgress?: (progress: TransferProgress) => void;
  private readonly routes = new Map<string, string | Buffer>();

  serve(url: string, body: string | Buffer): this {
    this.routes.set(url, body);
    return this;
  }

  private lookup(url: string, opts?: RequestOptions): string | Buffer {
    this.requests.push(url);
    this.requestHeaders.push(opts?.headers);
    const body = this.routes.get(url);
    if (body === undefined) {
      throw new PipelineError("FETCH_FAILED", `GET ${url} returned HTTP 404`, { url, status: 404 });
    }
    return body;
  }

  async fetchText(url: string, opts?: RequestOptions): Promise<string> {
    return this.lookup(url, opts).toString();
  }

  async downloadFile(url: string, destPath: string, opts?: RequestOptions): Promise<DownloadResult> {
    const body = this.lookup(url, opts);
    fs.writeFileSync(destPath, body);
    const bytes = Buffer.byteLength(body);
    this.onProgress?.({ url, received: bytes, total: bytes, percent: 100 });
    return { url, path: destPath, bytes };
  }
}

/** Accepts exactly the signature file names it was given. */
export class FakeVerifier implements SignatureVerifier {
  readonly verified: Array<{ signature: string; keyring: string | null }> = [];
  readonly imports: Array<{ keys: string[]; keyring: string }> = [];

  constructor(private readonly trusted: Set<string> = new Set()) {}

  async importKeys(keyFiles: string[], keyringPath: string): Promise<void> {
    this.imports.push({ keys: keyFiles.map((k) => path.basename(k)), keyring: keyringPath });
    fs.writeFileSync(keyringPath, "keyring");
  }

  async verify(signaturePath: string, _dataPath: string, keyringPath: string | null): Promise<VerifyOutcome> {
    const signature = path.basename(signaturePath);
    this.verified.push({ signature, keyring: keyringPath });
    const valid = this.trusted.has(signature);
    return { valid, output: valid ? "gpg: Good signature" : "gpg: BAD signature" };
  }
}

export function testConfig(overrides: Record<string, unknown> = {}): FetchConfig {
  const res = validateConfig(loadConfig({ env: {}, overrides }));
  if (!res.valid) throw new Error(res.errors);
  return res.config;
}

export function sampleManifest(version = "3.20.0"): ReleaseManifest {
  return {
    version: { major: 3, minor: 20, patch: 0, suffix: "", string: version },
    hashFiles: [
      {
        algorithm: ["SHA-256"],
        name: `cmake-${version}-SHA-256.txt`,
        signature: [`cmake-${version}-SHA-256.txt.asc`, `cmake-${version}-SHA-256.txt.qs.asc`],
      },
    ],
    files: [
      { os: ["linux", "Linux"], architecture: ["x86_64"], class: "archive", name: `cmake-${version}-linux-x86_64.tar.gz` },
      { os: ["linux", "Linux"], architecture: ["x86_64"], class: "installer", name: `cmake-${version}-linux-x86_64.sh` },
      { os: ["macos", "macOS"], architecture: ["arm64", "x86_64"], class: "archive", name: `cmake-${version}-macos-universal.tar.gz` },
    ],
  };
}

export function hashListFor(files: Record<string, string | Buffer>): string {
  return Object.entries(files)
    .map(([name, body]) => `${computeSha256FromContent(body)}  ${name}`)
    .join("\n") + "\n";
}

export function makeContext(
  cwd: string,
  parts: {
    downloader?: Downloader;
    verifier?: SignatureVerifier;
    config?: FetchConfig;
    os?: "linux" | "macOS";
    arch?: string;
    outputDir?: string;
    trustedKeysDir?: string;
  } = {},
): { ctx: PipelineContext; stdout: MemoryStream; stderr: MemoryStream } {
  const config = parts.config ?? testConfig();
  const schemas = createRegistry();
  const stdout = new MemoryStream();
  const stderr = new MemoryStream();
  const ctx: PipelineContext = {
    config,
    channel: createChannel(config, schemas),
    platform: { os: parts.os ?? "linux", arch: parts.arch ?? "x86_64" },
    downloader: parts.downloader ?? new FakeDownloader(),
    verifier: parts.verifier ?? new FakeVerifier(),
    schemas,
    reporter: new Reporter({ format: "human", verbose: false, stdout, stderr }),
    cwd,
    outputDir: parts.outputDir,
    trustedKeysDir: parts.trustedKeysDir ?? "trusted_pubkeys",
  };
  return { ctx, stdout, stderr };
}

/** A gzip'd tarball whose entries all sit under `top/`, like a release archive. */
export async function buildArchive(workDir: string, top: string): Promise<Buffer> {
  const src = path.join(workDir, "archive-src");
  fs.mkdirSync(path.join(src, top, "bin"), { recursive: true });
  fs.mkdirSync(path.join(src, top, "share", "cmake"), { recursive: true });
  fs.writeFileSync(path.join(src, top, "bin", "cmake"), "#!/bin/sh\necho cmake version 3.20.0\n", { mode: 0o755 });
  fs.writeFileSync(path.join(src, top, "share", "cmake", "README"), "modules\n");
  const file = path.join(workDir, `${top}.tar.gz`);
  await tar.c({ gzip: true, file, cwd: src }, [top]);
  fs.rmSync(src, { recursive: true, force: true });
  return fs.readFileSync(file);
}
