import fs from "node:fs";
import { Transform } from "node:stream";
import { pipeline } from "node:stream/promises";
import { request, type Dispatcher } from "undici";
import { PipelineError } from "../core/errors.js";
import { tailLines } from "../report/text.js";

export type RequestOptions = {
  headers?: Record<string, string>;
};

export type DownloadResult = {
  url: string;
  path: string;
  bytes: number;
};

export type TransferProgress = {
  url: string;
  received: number;
  total: number;
  percent: number;
};

/** Everything the pipeline needs from the network. */
export interface Downloader {
  fetchText(url: string, opts?: RequestOptions): Promise<string>;
  downloadFile(url: string, destPath: string, opts?: RequestOptions): Promise<DownloadResult>;
}

export type HttpDownloaderOptions = {
  /** Upper bound for a whole transfer, headers and body included. */
  timeoutMs: number;
  userAgent: string;
  dispatcher?: Dispatcher;
  maxRedirections?: number;
  onProgress?: (progress: TransferProgress) => void;
};

type ResponseData = Dispatcher.ResponseData;

/**
 * undici-backed downloader. One GET per call, redirects followed, no retry:
 * any transport failure or non-2xx status is a FETCH_FAILED.
 */
export class HttpDownloader implements Downloader {
  private readonly opts: HttpDownloaderOptions;

  constructor(opts: HttpDownloaderOptions) {
    this.opts = opts;
  }

  async fetchText(url: string, opts?: RequestOptions): Promise<string> {
    const res = await this.get(url, opts);
    const text = await readBody(res, url);
    if (res.statusCode < 200 || res.statusCode >= 300) {
      throw new PipelineError("FETCH_FAILED", `GET ${url} returned HTTP ${res.statusCode}`, {
        url,
        status: res.statusCode,
        tail: tailLines(text),
      });
    }
    return text;
  }

  async downloadFile(url: string, destPath: string, opts?: RequestOptions): Promise<DownloadResult> {
    const res = await this.get(url, opts);
    if (res.statusCode < 200 || res.statusCode >= 300) {
      const text = await readBody(res, url);
      throw new PipelineError("FETCH_FAILED", `GET ${url} returned HTTP ${res.statusCode}`, {
        url,
        status: res.statusCode,
        tail: tailLines(text),
      });
    }

    const total = parseContentLength(res.headers["content-length"]);
    const partPath = `${destPath}.part`;
    let received = 0;
    let lastDecile = -1;
    const onProgress = this.opts.onProgress;

    const counter = new Transform({
      transform(chunk: Buffer, _enc, cb) {
        received += chunk.length;
        if (onProgress && total > 0) {
          const percent = Math.min(100, Math.floor((received / total) * 100));
          const decile = Math.floor(percent / 10);
          if (decile > lastDecile) {
            lastDecile = decile;
            onProgress({ url, received, total, percent });
          }
        }
        cb(null, chunk);
      },
    });

    try {
      await pipeline(res.body, counter, fs.createWriteStream(partPath));
      fs.renameSync(partPath, destPath);
    } catch (e) {
      fs.rmSync(partPath, { force: true });
      throw new PipelineError("FETCH_FAILED", `Download of ${url} failed: ${(e as Error).message}`, { url });
    }

    return { url, path: destPath, bytes: received };
  }

  private async get(url: string, opts?: RequestOptions): Promise<ResponseData> {
    try {
      return await request(url, {
        method: "GET",
        headers: { "user-agent": this.opts.userAgent, ...opts?.headers },
        dispatcher: this.opts.dispatcher,
        maxRedirections: this.opts.maxRedirections ?? 5,
        signal: AbortSignal.timeout(this.opts.timeoutMs),
      });
    } catch (e) {
      throw new PipelineError("FETCH_FAILED", `GET ${url} failed: ${(e as Error).message}`, { url });
    }
  }
}

async function readBody(res: ResponseData, url: string): Promise<string> {
  try {
    return await res.body.text();
  } catch (e) {
    throw new PipelineError("FETCH_FAILED", `Reading ${url} failed: ${(e as Error).message}`, { url });
  }
}

function parseContentLength(value: string | string[] | undefined): number {
  const raw = Array.isArray(value) ? value[0] : value;
  if (raw === undefined) return 0;
  const n = parseInt(raw, 10);
  return Number.isFinite(n) ? n : 0;
}
