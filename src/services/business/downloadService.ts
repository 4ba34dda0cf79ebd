/**
 * Download Service
 * Streams a remote media resource to disk, resuming partial files with byte-range
 * requests and retrying transient failures with linear backoff.
 */

import { createWriteStream } from "fs";
import { rm, stat } from "fs/promises";
import { Readable } from "stream";
import type { ReadableStream as WebReadableStream } from "stream/web";
import { pipeline } from "stream/promises";
import { setTimeout as sleep } from "timers/promises";
import { errorText, truncate } from "../../utils/errorMessages.js";
import { DownloadError } from "../../utils/errors.js";

export const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36";

export interface DownloadOptions {
  referer?: string;
  /** Per-attempt timeout. */
  timeoutMs?: number;
  /** Caller cancellation (job deadline). Checked during requests and between attempts. */
  signal?: AbortSignal;
  maxAttempts?: number;
  /** Backoff unit; attempt n waits n × backoffMs before the next try. */
  backoffMs?: number;
}

export type Downloader = (url: string, destPath: string, options?: DownloadOptions) => Promise<void>;

const DEFAULT_TIMEOUT_MS = 10 * 60 * 1000;
const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_BACKOFF_MS = 1000;

async function existingSize(path: string): Promise<number> {
  try {
    return (await stat(path)).size;
  } catch {
    return 0;
  }
}

function isRetryableStatus(status: number): boolean {
  return status >= 500 || status === 429;
}

/**
 * One GET attempt. Resumes from the current size of `destPath` when it exists.
 */
async function downloadOnce(url: string, destPath: string, options: DownloadOptions): Promise<void> {
  const offset = await existingSize(destPath);
  const headers: Record<string, string> = { "User-Agent": BROWSER_USER_AGENT };
  if (options.referer?.trim()) {
    headers.Referer = options.referer;
  }
  if (offset > 0) {
    headers.Range = `bytes=${offset}-`;
  }

  const timeout = AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
  const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

  let response: Response;
  try {
    response = await fetch(url, { headers, signal });
  } catch (error) {
    throw new DownloadError(errorText(error), true);
  }

  if (response.status === 416) {
    // Partial file is unusable for this resource; next attempt starts from zero.
    await rm(destPath, { force: true });
    throw new DownloadError(`download http status ${response.status}`, true);
  }
  if (response.status !== 200 && response.status !== 206) {
    throw new DownloadError(`download http status ${response.status}`, isRetryableStatus(response.status));
  }
  if (!response.body) {
    throw new DownloadError("download response has no body", true);
  }

  const append = response.status === 206 && offset > 0;
  const body: WebReadableStream<Uint8Array> = response.body;
  try {
    await pipeline(Readable.fromWeb(body), createWriteStream(destPath, { flags: append ? "a" : "w" }));
  } catch (error) {
    // Truncated transfers keep what was written so the next attempt can resume.
    throw new DownloadError(errorText(error), true);
  }
}

/**
 * Downloads `url` to `destPath`, retrying retryable failures up to maxAttempts.
 * Surfaces the last error once attempts are exhausted.
 */
export async function downloadToFile(url: string, destPath: string, options: DownloadOptions = {}): Promise<void> {
  if (!url.trim()) {
    throw new DownloadError("download url is empty", false);
  }

  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const backoffMs = options.backoffMs ?? DEFAULT_BACKOFF_MS;

  for (let attempt = 1; ; attempt++) {
    options.signal?.throwIfAborted();
    try {
      await downloadOnce(url, destPath, options);
      return;
    } catch (error) {
      const retryable = error instanceof DownloadError && error.retryable;
      if (!retryable || attempt >= maxAttempts || options.signal?.aborted) {
        throw error;
      }
      console.warn(`[download] retrying attempt=${attempt + 1} err=${truncate(errorText(error), 200)}`);
      await sleep(attempt * backoffMs, undefined, { signal: options.signal });
    }
  }
}
