/**
 * File handler for serving delivered downloads.
 *
 * Handles:
 * - Serving files with proper headers
 * - Range request support for resuming and seeking
 * - MIME type detection
 */

import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";

import { isNotFound } from "../services/file-store.ts";

// ============================================================================
// Types
// ============================================================================

/**
 * File system interface for dependency injection.
 */
export interface ServeFileSystem {
  stat(path: string): Promise<{ size: number; mtime: Date | null }>;
  /** Read the whole file, or the inclusive byte range */
  read(path: string, range?: { start: number; end: number }): AsyncIterable<Uint8Array>;
}

/**
 * Default file system using node:fs.
 */
export const defaultServeFileSystem: ServeFileSystem = {
  stat: async (path) => {
    const info = await stat(path);
    return { size: info.size, mtime: info.mtime };
  },
  read: (path, range) => createReadStream(path, range ? { start: range.start, end: range.end } : {}),
};

/**
 * File serve result.
 */
export type FileServeResult =
  | { ok: true; response: Response }
  | { ok: false; error: FileServeError };

export interface FileServeError {
  type: "not_found" | "invalid_range" | "filesystem_error";
  message: string;
  cause?: unknown;
}

// ============================================================================
// Pure Functions
// ============================================================================

/**
 * Parse a Range header value.
 * Returns the start and end byte positions.
 */
export function parseRangeHeader(
  rangeHeader: string | null,
  fileSize: number,
): { start: number; end: number } | null {
  if (!rangeHeader) return null;

  const match = rangeHeader.match(/bytes=(\d*)-(\d*)/);
  if (!match) return null;

  const [, startStr, endStr] = match;

  let start: number;
  let end: number;

  if (startStr === "" && endStr !== "") {
    // Suffix range: bytes=-500 (last 500 bytes)
    const suffix = parseInt(endStr, 10);
    start = Math.max(0, fileSize - suffix);
    end = fileSize - 1;
  } else if (startStr !== "" && endStr === "") {
    // Open-ended range: bytes=500-
    start = parseInt(startStr, 10);
    end = fileSize - 1;
  } else if (startStr !== "" && endStr !== "") {
    // Closed range: bytes=500-999
    start = parseInt(startStr, 10);
    end = Math.min(parseInt(endStr, 10), fileSize - 1);
  } else {
    return null;
  }

  if (start > end || start < 0 || start >= fileSize) {
    return null;
  }

  return { start, end };
}

/**
 * Get MIME type for a file extension.
 */
export function getMimeType(filename: string): string {
  const ext = filename.split(".").pop()?.toLowerCase();

  const mimeTypes: Record<string, string> = {
    mp4: "video/mp4",
    webm: "video/webm",
    mkv: "video/x-matroska",
    avi: "video/x-msvideo",
    mov: "video/quicktime",
    wmv: "video/x-ms-wmv",
    flv: "video/x-flv",
    m4v: "video/x-m4v",
    mp3: "audio/mpeg",
    m4a: "audio/mp4",
    ogg: "audio/ogg",
    opus: "audio/opus",
  };

  return mimeTypes[ext ?? ""] ?? "application/octet-stream";
}

/**
 * Content-Disposition value for a download, with an ASCII fallback name.
 */
export function contentDisposition(name: string): string {
  const fallback = name.replace(/[^\x20-\x7e]/g, "_").replace(/["\\]/g, "_");
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(name)}`;
}

// ============================================================================
// File Handler
// ============================================================================

export function createFileHandler(fs: ServeFileSystem = defaultServeFileSystem) {
  /**
   * Serve a file, honouring a Range header when present and satisfiable.
   */
  async function serveFile(
    path: string,
    name: string,
    rangeHeader: string | null,
  ): Promise<FileServeResult> {
    let info: { size: number; mtime: Date | null };
    try {
      info = await fs.stat(path);
    } catch (error) {
      if (isNotFound(error)) {
        return { ok: false, error: { type: "not_found", message: `File ${name} is no longer available` } };
      }
      return {
        ok: false,
        error: {
          type: "filesystem_error",
          message: error instanceof Error ? error.message : "Unknown error",
          cause: error,
        },
      };
    }

    const fileSize = info.size;
    const headers = new Headers({
      "Content-Type": getMimeType(name),
      "Accept-Ranges": "bytes",
      "Content-Disposition": contentDisposition(name),
      "Cache-Control": "private, max-age=3600",
    });

    if (info.mtime) {
      headers.set("Last-Modified", info.mtime.toUTCString());
    }

    if (rangeHeader) {
      const range = parseRangeHeader(rangeHeader, fileSize);
      if (!range) {
        return {
          ok: false,
          error: { type: "invalid_range", message: `Range not satisfiable for size ${fileSize}` },
        };
      }

      const { start, end } = range;
      headers.set("Content-Length", (end - start + 1).toString());
      headers.set("Content-Range", `bytes ${start}-${end}/${fileSize}`);

      return {
        ok: true,
        response: new Response(fs.read(path, range), { status: 206, headers }),
      };
    }

    headers.set("Content-Length", fileSize.toString());
    return {
      ok: true,
      response: new Response(fileSize === 0 ? null : fs.read(path), { status: 200, headers }),
    };
  }

  return { serveFile };
}

export type FileHandler = ReturnType<typeof createFileHandler>;
