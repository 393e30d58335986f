/**
 * URL and content checks applied before a download is accepted.
 * All functions are pure.
 */

export type UrlRejection = "invalid-url" | "invalid-scheme" | "blocked-domain" | "disallowed-type";

export type UrlValidation =
  | { ok: true; url: URL }
  | { ok: false; reason: UrlRejection; message: string };

export interface UrlRules {
  blockedDomains: string[];
  allowedExtensions?: string[];
}

export const ALLOWED_FILE_EXTENSIONS = [
  ".mp4", ".mkv", ".avi", ".mov", ".wmv", ".flv", ".webm", ".mp3", ".m4a",
];

export const ALLOWED_MIME_TYPES = [
  "video/",
  "audio/",
  "application/octet-stream",
  "application/mp4",
  "application/x-matroska",
];

/**
 * True when `host` equals `domain` or is one of its subdomains.
 */
export function matchesDomain(host: string, domain: string): boolean {
  const h = host.toLowerCase().replace(/\.$/, "");
  const d = domain.toLowerCase().replace(/^\./, "");
  return h === d || h.endsWith(`.${d}`);
}

/**
 * Extension of the last path segment, lower-cased, including the dot.
 */
export function pathExtension(pathname: string): string | null {
  const last = pathname.split("/").pop() ?? "";
  const dot = last.lastIndexOf(".");
  if (dot <= 0 || dot === last.length - 1) return null;
  return last.slice(dot).toLowerCase();
}

/**
 * Check URL structure, scheme, domain blocklist and file extension.
 */
export function validateUrl(input: string, rules: UrlRules): UrlValidation {
  const trimmed = input.trim();

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    return { ok: false, reason: "invalid-url", message: "Invalid URL structure" };
  }

  if (url.protocol !== "http:" && url.protocol !== "https:") {
    return {
      ok: false,
      reason: "invalid-scheme",
      message: `Invalid URL scheme: ${url.protocol.replace(/:$/, "")}`,
    };
  }

  if (!url.hostname) {
    return { ok: false, reason: "invalid-url", message: "Invalid URL structure" };
  }

  const blocked = rules.blockedDomains.find((domain) => matchesDomain(url.hostname, domain));
  if (blocked) {
    return { ok: false, reason: "blocked-domain", message: `Blocked domain: ${url.hostname}` };
  }

  const allowed = rules.allowedExtensions ?? ALLOWED_FILE_EXTENSIONS;
  const ext = pathExtension(url.pathname);
  if (ext && !allowed.includes(ext)) {
    return { ok: false, reason: "disallowed-type", message: `Invalid file type: ${ext}` };
  }

  return { ok: true, url };
}

/**
 * Whether a Content-Type header is acceptable. A missing header is accepted.
 */
export function isAllowedContentType(
  contentType: string | null,
  allowed: string[] = ALLOWED_MIME_TYPES,
): boolean {
  if (!contentType) return true;
  const value = contentType.toLowerCase();
  return allowed.some((prefix) => value.includes(prefix));
}
