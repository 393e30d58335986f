/**
 * Types shared by the job manager and its collaborators.
 */

// ============================================================================
// Jobs
// ============================================================================

export type JobState =
  | "queued"
  | "validating"
  | "downloading"
  | "uploading"
  | "completed"
  | "failed"
  | "cancelled";

export const TERMINAL_STATES: ReadonlySet<JobState> = new Set([
  "completed",
  "failed",
  "cancelled",
]);

export function isTerminal(state: JobState): boolean {
  return TERMINAL_STATES.has(state);
}

export interface JobProgress {
  fraction: number; // 0..1
  bytesDone: number;
  bytesTotal: number | null;
}

export type JobError =
  | { type: "validation_error"; reason: "disallowed-type" | "too-large"; message: string }
  | { type: "transient_fetch_error"; kind: TransientFetchKind; message: string }
  | { type: "size_limit_exceeded"; message: string }
  | { type: "storage_full"; message: string }
  | { type: "delivery_error"; kind: DeliveryErrorKind; message: string }
  | { type: "internal_error"; message: string };

export type TransientFetchKind =
  | Exclude<FetchErrorKind, "cancelled">
  | "stall-timeout"
  | "download-timeout";

export interface Job {
  id: string;
  ownerId: number;
  url: string;
  state: JobState;
  progress: JobProgress;
  createdAt: number;
  finishedAt: number | null;
  filePath: string | null;
  sizeBytes: number | null;
  error?: JobError;
}

// ============================================================================
// Media Fetcher (extraction/download collaborator)
// ============================================================================

export type FetchErrorKind =
  | "unsupported-url"
  | "network-failure"
  | "extractor-failure"
  | "cancelled";

export interface FetchRequest {
  url: string;
  /** Path the fetcher should write to; it may return a different final path */
  destination: string;
  signal: AbortSignal;
  onProgress: (bytesDone: number, bytesTotal: number | null) => void;
}

export type FetchResult =
  | { ok: true; filePath: string; sizeBytes: number }
  | { ok: false; error: { kind: FetchErrorKind; message: string } };

export type ProbeResult =
  | { ok: true; contentType: string | null; sizeBytes: number | null }
  | { ok: false; error: { kind: FetchErrorKind; message: string } };

export interface MediaFetcher {
  /** Cheap metadata lookup before the download starts */
  probe?(url: string, signal: AbortSignal): Promise<ProbeResult>;
  fetch(request: FetchRequest): Promise<FetchResult>;
}

// ============================================================================
// Transport (message delivery collaborator)
// ============================================================================

export type DeliveryErrorKind = "too-large-for-transport" | "send-failure";

export interface DeliverOptions {
  signal: AbortSignal;
  caption: string;
  onProgress?: (bytesSent: number, bytesTotal: number) => void;
}

export type DeliveryResult =
  | { ok: true }
  | { ok: false; error: { kind: DeliveryErrorKind; message: string } };

export interface Transport {
  deliver(userId: number, filePath: string, options: DeliverOptions): Promise<DeliveryResult>;
  notify(userId: number, message: string): Promise<void>;
}
