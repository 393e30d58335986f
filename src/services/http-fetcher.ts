/**
 * Direct HTTP media fetcher.
 *
 * Default MediaFetcher for links that point straight at a media file.
 * Streams the response body to `<destination>.part`, renaming it into place
 * once complete so partial files are never mistaken for finished ones.
 */

import { mkdir, open, rename, rm, type FileHandle } from "node:fs/promises";
import { dirname } from "node:path";

import { PARTIAL_SUFFIX } from "./file-store.ts";
import type { FetchErrorKind, FetchRequest, FetchResult, MediaFetcher, ProbeResult } from "./job-types.ts";

// ============================================================================
// Types
// ============================================================================

/**
 * HTTP client interface for dependency injection.
 * Allows mocking in tests.
 */
export interface HttpClient {
  fetch(url: string, init?: RequestInit): Promise<Response>;
}

/**
 * Default HTTP client using global fetch.
 */
export const defaultHttpClient: HttpClient = {
  fetch: (url, init) => fetch(url, init),
};

export interface HttpFetcherConfig {
  /** Rate limit in bytes per second (0 = unlimited) */
  rateLimit?: number;
  /** Minimum milliseconds between progress callbacks */
  progressIntervalMs?: number;
  /** Timeout for the HEAD probe */
  probeTimeoutMs?: number;
}

// ============================================================================
// Pure Functions
// ============================================================================

/**
 * Parse the total size from Content-Range or Content-Length.
 */
export function parseTotalSize(headers: Headers): number | null {
  const contentRange = headers.get("content-range");
  if (contentRange) {
    // Format: "bytes 21010-47021/47022" or "bytes 21010-47021/*"
    const match = contentRange.match(/bytes \d+-\d+\/(\d+|\*)/);
    if (match && match[1] !== "*") {
      return parseInt(match[1], 10);
    }
    return null;
  }

  const contentLength = headers.get("content-length");
  if (contentLength && /^\d+$/.test(contentLength.trim())) {
    return parseInt(contentLength.trim(), 10);
  }
  return null;
}

/**
 * Map an HTTP status to a fetch error kind.
 */
export function classifyHttpStatus(status: number): FetchErrorKind {
  if (status >= 400 && status < 500 && status !== 408 && status !== 429) {
    return "unsupported-url";
  }
  return "network-failure";
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}

// ============================================================================
// HTTP Fetcher
// ============================================================================

export function createHttpFetcher(
  config: HttpFetcherConfig = {},
  client: HttpClient = defaultHttpClient,
): MediaFetcher {
  const rateLimit = config.rateLimit ?? 0;
  const progressIntervalMs = config.progressIntervalMs ?? 100;
  const probeTimeoutMs = config.probeTimeoutMs ?? 30_000;

  async function probe(url: string, signal: AbortSignal): Promise<ProbeResult> {
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal.addEventListener("abort", onAbort, { once: true });
    const timer = setTimeout(() => controller.abort(), probeTimeoutMs);

    try {
      const response = await client.fetch(url, {
        method: "HEAD",
        redirect: "follow",
        signal: controller.signal,
      });

      // Some servers refuse HEAD; let the download itself decide
      if (response.status === 405 || response.status === 501) {
        return { ok: true, contentType: null, sizeBytes: null };
      }

      if (!response.ok) {
        return {
          ok: false,
          error: {
            kind: classifyHttpStatus(response.status),
            message: `HTTP error: ${response.status}`,
          },
        };
      }

      return {
        ok: true,
        contentType: response.headers.get("content-type"),
        sizeBytes: parseTotalSize(response.headers),
      };
    } catch (error) {
      if (signal.aborted) {
        return { ok: false, error: { kind: "cancelled", message: "Probe cancelled" } };
      }
      return {
        ok: false,
        error: {
          kind: "network-failure",
          message: `URL access error: ${error instanceof Error ? error.message : String(error)}`,
        },
      };
    } finally {
      clearTimeout(timer);
      signal.removeEventListener("abort", onAbort);
    }
  }

  async function fetchToFile(request: FetchRequest): Promise<FetchResult> {
    const { url, destination, signal, onProgress } = request;
    const partPath = `${destination}${PARTIAL_SUFFIX}`;
    let file: FileHandle | null = null;
    let completed = false;

    try {
      await mkdir(dirname(destination), { recursive: true });

      const response = await client.fetch(url, { signal, redirect: "follow" });

      if (!response.ok) {
        return {
          ok: false,
          error: {
            kind: classifyHttpStatus(response.status),
            message: `HTTP ${response.status}: ${response.statusText}`,
          },
        };
      }

      const total = parseTotalSize(response.headers);
      const reader = response.body?.getReader();
      if (!reader) {
        return { ok: false, error: { kind: "extractor-failure", message: "No response body" } };
      }

      file = await open(partPath, "w");

      let downloaded = 0;
      let lastProgressTime = 0;
      let lastReported = 0;

      // Rate limiting state
      let rateLimitBucket = rateLimit;
      let lastRateLimitTime = Date.now();

      onProgress(0, total);

      while (true) {
        const { done, value } = await reader.read();
        if (done) break;
        if (signal.aborted) {
          await reader.cancel();
          return { ok: false, error: { kind: "cancelled", message: "Download cancelled" } };
        }

        // Write chunk directly to disk (no memory accumulation)
        await file.write(value);
        downloaded += value.length;

        if (rateLimit > 0) {
          const now = Date.now();
          const elapsed = (now - lastRateLimitTime) / 1000;
          rateLimitBucket = Math.min(rateLimit, rateLimitBucket + rateLimit * elapsed) - value.length;
          lastRateLimitTime = now;
          if (rateLimitBucket < 0) {
            await new Promise((resolve) => setTimeout(resolve, (-rateLimitBucket / rateLimit) * 1000));
          }
        }

        const now = Date.now();
        if (now - lastProgressTime >= progressIntervalMs) {
          onProgress(downloaded, total);
          lastReported = downloaded;
          lastProgressTime = now;
        }
      }

      if (downloaded !== lastReported) {
        onProgress(downloaded, total);
      }

      await file.close();
      file = null;
      await rename(partPath, destination);
      completed = true;

      return { ok: true, filePath: destination, sizeBytes: downloaded };
    } catch (error) {
      if (signal.aborted || isAbortError(error)) {
        return { ok: false, error: { kind: "cancelled", message: "Download cancelled" } };
      }
      return {
        ok: false,
        error: {
          kind: "network-failure",
          message: error instanceof Error ? error.message : "Unknown error",
        },
      };
    } finally {
      if (file) {
        await file.close().catch((error: unknown) => {
          console.warn(`[fetch] Failed to close ${partPath}:`, error);
        });
      }
      if (!completed) {
        await rm(partPath, { force: true });
      }
    }
  }

  return {
    probe,
    fetch: fetchToFile,
  };
}
