/**
 * Job Manager.
 *
 * Takes a submitted URL through validation, quota reservation, download,
 * delivery and retention:
 *
 *   queued -> validating -> downloading -> uploading -> completed
 *                 |              |             |
 *                 +--------------+-------------+--> failed
 *   any non-terminal state --> cancelled
 *
 * Concurrency limits live entirely in the quota tracker. Each job runs as its
 * own async task; collaborator calls are raced against the job's abort signal
 * so a cancel, size overrun or stall ends the job without waiting for a
 * collaborator that ignores the signal.
 */

import { randomUUID } from "node:crypto";
import { basename, join } from "node:path";

import type { FileStore } from "./file-store.ts";
import { sanitizeFilename, userDir } from "./file-store.ts";
import type {
  DeliveryResult,
  FetchResult,
  Job,
  JobError,
  JobState,
  MediaFetcher,
  ProbeResult,
  Transport,
} from "./job-types.ts";
import { isTerminal } from "./job-types.ts";
import { createProgressNotifier } from "./progress-notifier.ts";
import type { QuotaDenial, QuotaTracker, Reservation } from "./quota-tracker.ts";
import { isAllowedContentType, validateUrl, type UrlRejection } from "./url-validator.ts";
import { formatBytes } from "../utils/format.ts";

// ============================================================================
// Types
// ============================================================================

export interface JobManagerConfig {
  downloadDir: string;
  maxFileSizeBytes: number;
  stallTimeoutMs: number;
  downloadTimeoutMs: number;
  /** How long finished jobs stay in the job table */
  jobRetentionMs: number;
  minFreeDiskBytes: number;
  duplicateCooldownMs: number;
  progressIntervalMs: number;
  authEnabled: boolean;
  allowedUsers: number[];
  adminUsers: number[];
  blockedDomains: string[];
}

export interface JobManagerDependencies {
  quota: QuotaTracker;
  files: FileStore;
  fetcher: MediaFetcher;
  transport: Transport;
  /** Free bytes on the volume holding the given path (null if unknown) */
  freeDiskBytes?: (path: string) => Promise<number | null>;
  now?: () => number;
}

export type SubmitError =
  | {
    type: "validation_error";
    reason: UrlRejection | "unauthorized" | "duplicate-request";
    message: string;
  }
  | { type: "quota_denied"; reason: QuotaDenial; message: string }
  | { type: "storage_full"; message: string }
  | { type: "unavailable"; message: string };

export type SubmitResult =
  | { ok: true; job: Job }
  | { ok: false; error: SubmitError };

export type CancelResult =
  | { ok: true; job: Job }
  | { ok: false; error: "not_found" };

export interface ShutdownReport {
  cancelled: number;
  leaked: string[];
}

type AbortReason = "cancel" | "shutdown" | "size" | "stall" | "timeout";

interface JobRuntime {
  reservation: Reservation;
  controller: AbortController;
  abortReason: AbortReason | null;
  destination: string;
  stallTimer: NodeJS.Timeout | null;
  /** Set once the output has been handed to the file store */
  registered: boolean;
  done: Promise<void>;
}

// ============================================================================
// Pure Functions
// ============================================================================

/**
 * Build the download path for a job: <downloadDir>/user_<owner>/<id8>_<name>.
 */
export function buildDestinationPath(
  downloadDir: string,
  ownerId: number,
  jobId: string,
  url: string,
): string {
  let name = "";
  try {
    name = sanitizeFilename(decodeURIComponent(new URL(url).pathname));
  } catch {
    name = "";
  }
  if (!name || name === "_") {
    name = "download";
  }
  return join(userDir(downloadDir, ownerId), `${jobId.slice(0, 8)}_${name}`);
}

export function snapshotJob(job: Job): Job {
  const copy: Job = { ...job, progress: { ...job.progress } };
  if (job.error) copy.error = { ...job.error };
  return copy;
}

/**
 * Resolve with the work's result, or with null as soon as the signal aborts.
 * A result that arrives after the abort is handed to `onLate`.
 */
export function raceAbort<T>(
  work: Promise<T>,
  signal: AbortSignal,
  onLate?: (late: T) => Promise<void>,
): Promise<T | null> {
  const handleLate = (late: T) => onLate?.(late);
  const logLate = (error: unknown) => {
    console.warn("[jobs] Abandoned operation failed:", error instanceof Error ? error.message : error);
  };

  if (signal.aborted) {
    void work.then(handleLate).catch(logLate);
    return Promise.resolve(null);
  }

  return new Promise<T | null>((resolve, reject) => {
    let settled = false;

    const onAbort = () => {
      if (settled) return;
      settled = true;
      resolve(null);
      void work.then(handleLate).catch(logLate);
    };
    signal.addEventListener("abort", onAbort, { once: true });

    work.then(
      (value) => {
        if (settled) return;
        settled = true;
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        if (settled) return;
        settled = true;
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

// ============================================================================
// Job Manager
// ============================================================================

export function createJobManager(
  config: JobManagerConfig,
  deps: JobManagerDependencies,
) {
  const { quota, files, fetcher, transport } = deps;
  const now = deps.now ?? Date.now;

  const jobs = new Map<string, Job>();
  const runtimes = new Map<string, JobRuntime>();
  const recentRequests = new Map<string, number>();
  const progressNotifier = createProgressNotifier({ minIntervalMs: config.progressIntervalMs }, now);
  let shuttingDown = false;

  // ==========================================================================
  // Helpers
  // ==========================================================================

  function isAuthorized(userId: number): boolean {
    if (!config.authEnabled) return true;
    if (config.allowedUsers.length === 0) return true;
    return config.allowedUsers.includes(userId) || config.adminUsers.includes(userId);
  }

  function notify(userId: number, message: string): void {
    void transport.notify(userId, message).catch((error: unknown) => {
      console.error(`[jobs] Failed to notify user ${userId}:`, error instanceof Error ? error.message : error);
    });
  }

  function transition(job: Job, state: JobState): void {
    if (isTerminal(job.state)) return;
    job.state = state;
  }

  function abortJob(runtime: JobRuntime, reason: AbortReason): void {
    if (runtime.controller.signal.aborted) return;
    runtime.abortReason = reason;
    runtime.controller.abort();
  }

  function armStall(runtime: JobRuntime): void {
    disarmStall(runtime);
    runtime.stallTimer = setTimeout(() => abortJob(runtime, "stall"), config.stallTimeoutMs);
  }

  function disarmStall(runtime: JobRuntime): void {
    if (runtime.stallTimer !== null) {
      clearTimeout(runtime.stallTimer);
      runtime.stallTimer = null;
    }
  }

  function isDuplicate(key: string, at: number): boolean {
    for (const [seenKey, seenAt] of recentRequests) {
      if (at - seenAt >= config.duplicateCooldownMs) recentRequests.delete(seenKey);
    }
    const last = recentRequests.get(key);
    return last !== undefined && at - last < config.duplicateCooldownMs;
  }

  /**
   * The single terminal transition. Releases quota exactly once.
   */
  function finish(
    job: Job,
    runtime: JobRuntime,
    state: "completed" | "failed" | "cancelled",
    error?: JobError,
  ): boolean {
    if (isTerminal(job.state)) return false;

    job.state = state;
    job.finishedAt = now();
    if (error) job.error = error;
    if (state === "completed") {
      job.progress = { ...job.progress, fraction: 1 };
    }

    disarmStall(runtime);
    progressNotifier.finish(job.id);
    quota.release(runtime.reservation);
    runtimes.delete(job.id);

    if (state === "completed") {
      console.log(`[jobs] Job ${job.id} completed (${formatBytes(job.sizeBytes ?? 0)})`);
      notify(job.ownerId, `File sent successfully!\n\nFile: ${basename(job.filePath ?? "")}\nSize: ${formatBytes(job.sizeBytes ?? 0)}`);
    } else if (state === "failed") {
      console.warn(`[jobs] Job ${job.id} failed: ${error?.type ?? "unknown"} - ${error?.message ?? ""}`);
      notify(job.ownerId, `Download failed: ${error?.message ?? "unknown error"}`);
    } else {
      console.log(`[jobs] Job ${job.id} cancelled`);
      notify(job.ownerId, "Download cancelled.");
    }

    return true;
  }

  /**
   * End a job whose abort signal fired, cleaning up any output it produced.
   */
  async function abandon(job: Job, runtime: JobRuntime): Promise<void> {
    if (!runtime.registered) {
      await files.discard(runtime.destination);
      if (job.filePath && job.filePath !== runtime.destination) {
        await files.discard(job.filePath);
      }
    }

    const max = formatBytes(config.maxFileSizeBytes);
    switch (runtime.abortReason) {
      case "size":
        finish(job, runtime, "failed", {
          type: "size_limit_exceeded",
          message: `File too large (maximum: ${max})`,
        });
        break;
      case "stall":
        finish(job, runtime, "failed", {
          type: "transient_fetch_error",
          kind: "stall-timeout",
          message: `No progress for ${Math.round(config.stallTimeoutMs / 1000)} seconds`,
        });
        break;
      case "timeout":
        finish(job, runtime, "failed", {
          type: "transient_fetch_error",
          kind: "download-timeout",
          message: `Download did not finish within ${Math.round(config.downloadTimeoutMs / 1000)} seconds`,
        });
        break;
      default:
        finish(job, runtime, "cancelled");
    }
  }

  async function fail(job: Job, runtime: JobRuntime, error: JobError): Promise<void> {
    if (!runtime.registered) {
      await files.discard(runtime.destination);
    }
    finish(job, runtime, "failed", error);
  }

  function onProgress(job: Job, runtime: JobRuntime, bytesDone: number, bytesTotal: number | null): void {
    if (runtime.controller.signal.aborted || isTerminal(job.state)) return;

    armStall(runtime);
    const fraction = bytesTotal && bytesTotal > 0 ? Math.min(1, bytesDone / bytesTotal) : 0;
    // Replaced as a whole so readers never see a half-updated value
    job.progress = { fraction, bytesDone, bytesTotal };

    if ((bytesTotal !== null && bytesTotal > config.maxFileSizeBytes) || bytesDone > config.maxFileSizeBytes) {
      console.warn(`[jobs] Job ${job.id} exceeds size limit (${formatBytes(bytesTotal ?? bytesDone)}), aborting`);
      abortJob(runtime, "size");
      return;
    }

    const message = progressNotifier.update(job.id, basename(runtime.destination), bytesDone, bytesTotal);
    if (message) notify(job.ownerId, message);
  }

  // ==========================================================================
  // Orchestration
  // ==========================================================================

  async function checkProbe(job: Job, runtime: JobRuntime, probe: ProbeResult): Promise<boolean> {
    if (!probe.ok) {
      if (probe.error.kind === "unsupported-url") {
        await fail(job, runtime, {
          type: "transient_fetch_error",
          kind: "unsupported-url",
          message: probe.error.message,
        });
        return false;
      }
      // Other probe failures are left for the download itself to report
      return true;
    }

    if (!isAllowedContentType(probe.contentType)) {
      await fail(job, runtime, {
        type: "validation_error",
        reason: "disallowed-type",
        message: `Invalid content type: ${probe.contentType}`,
      });
      return false;
    }

    if (probe.sizeBytes !== null && probe.sizeBytes > config.maxFileSizeBytes) {
      await fail(job, runtime, {
        type: "validation_error",
        reason: "too-large",
        message: `File too large: ${formatBytes(probe.sizeBytes)} (maximum: ${formatBytes(config.maxFileSizeBytes)})`,
      });
      return false;
    }

    if (probe.sizeBytes !== null && !files.hasCapacityFor(probe.sizeBytes)) {
      await fail(job, runtime, {
        type: "storage_full",
        message: "Not enough storage for this download, try again later",
      });
      return false;
    }

    return true;
  }

  async function run(job: Job, runtime: JobRuntime): Promise<void> {
    const signal = runtime.controller.signal;
    const discardLate = async (late: FetchResult) => {
      if (late.ok) await files.discard(late.filePath);
    };

    try {
      // Validating
      transition(job, "validating");
      if (fetcher.probe) {
        armStall(runtime);
        let probe: ProbeResult | null;
        try {
          probe = await raceAbort(fetcher.probe(job.url, signal), signal);
        } finally {
          disarmStall(runtime);
        }
        if (probe === null || signal.aborted) return await abandon(job, runtime);
        if (!(await checkProbe(job, runtime, probe))) return;
      }

      // Downloading
      transition(job, "downloading");
      notify(job.ownerId, "Starting download...");
      progressNotifier.start(job.id);
      armStall(runtime);
      const timeout = setTimeout(() => abortJob(runtime, "timeout"), config.downloadTimeoutMs);

      let fetched: FetchResult | null;
      try {
        fetched = await raceAbort(
          fetcher.fetch({
            url: job.url,
            destination: runtime.destination,
            signal,
            onProgress: (bytesDone, bytesTotal) => onProgress(job, runtime, bytesDone, bytesTotal),
          }),
          signal,
          discardLate,
        );
      } finally {
        clearTimeout(timeout);
        disarmStall(runtime);
      }

      if (fetched === null || signal.aborted) {
        if (fetched?.ok) job.filePath = fetched.filePath;
        return await abandon(job, runtime);
      }

      if (!fetched.ok) {
        return await fail(job, runtime, {
          type: "transient_fetch_error",
          kind: fetched.error.kind === "cancelled" ? "extractor-failure" : fetched.error.kind,
          message: fetched.error.message,
        });
      }

      job.filePath = fetched.filePath;
      job.sizeBytes = fetched.sizeBytes;
      job.progress = { fraction: 1, bytesDone: fetched.sizeBytes, bytesTotal: fetched.sizeBytes };

      if (fetched.sizeBytes > config.maxFileSizeBytes) {
        await files.discard(fetched.filePath);
        return await fail(job, runtime, {
          type: "size_limit_exceeded",
          message: `File too large: ${formatBytes(fetched.sizeBytes)} (maximum: ${formatBytes(config.maxFileSizeBytes)})`,
        });
      }

      // Uploading
      transition(job, "uploading");
      const fileName = basename(fetched.filePath);
      notify(
        job.ownerId,
        `Download complete!\n\nFile: ${fileName}\nSize: ${formatBytes(fetched.sizeBytes)}\n\nNow sending the file...`,
      );

      armStall(runtime);
      let delivered: DeliveryResult | null;
      try {
        delivered = await raceAbort(
          transport.deliver(job.ownerId, fetched.filePath, {
            signal,
            caption: `File: ${fileName}\nSize: ${formatBytes(fetched.sizeBytes)}`,
            onProgress: () => armStall(runtime),
          }),
          signal,
        );
      } finally {
        disarmStall(runtime);
      }

      if (delivered === null || signal.aborted) {
        return await abandon(job, runtime);
      }

      // Kept for normal retention even when delivery failed, so a retry needs no re-download
      files.register({ jobId: job.id, ownerId: job.ownerId }, fetched.filePath, fetched.sizeBytes);
      runtime.registered = true;

      if (!delivered.ok) {
        return await fail(job, runtime, {
          type: "delivery_error",
          kind: delivered.error.kind,
          message: delivered.error.message,
        });
      }

      finish(job, runtime, "completed");
    } catch (error) {
      console.error(`[jobs] Job ${job.id} crashed:`, error);
      await fail(job, runtime, {
        type: "internal_error",
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }

  // ==========================================================================
  // Public API
  // ==========================================================================

  /**
   * Validate, reserve quota and start a download job.
   */
  async function submit(userId: number, url: string): Promise<SubmitResult> {
    if (shuttingDown) {
      return { ok: false, error: { type: "unavailable", message: "Service is shutting down" } };
    }

    if (!isAuthorized(userId)) {
      console.warn(`[jobs] Unauthorized access attempt by user ${userId}`);
      return {
        ok: false,
        error: {
          type: "validation_error",
          reason: "unauthorized",
          message: "You are not authorized to use this bot.",
        },
      };
    }

    const validation = validateUrl(url, { blockedDomains: config.blockedDomains });
    if (!validation.ok) {
      return {
        ok: false,
        error: { type: "validation_error", reason: validation.reason, message: validation.message },
      };
    }

    if (!files.hasCapacityFor(0)) {
      return { ok: false, error: { type: "storage_full", message: "Storage limit reached, try again later" } };
    }

    if (deps.freeDiskBytes) {
      try {
        const free = await deps.freeDiskBytes(config.downloadDir);
        if (free !== null && free < config.minFreeDiskBytes) {
          console.warn(`[jobs] Low disk space: only ${formatBytes(free)} available`);
          return { ok: false, error: { type: "storage_full", message: "Server is low on disk space, try again later" } };
        }
      } catch (error) {
        console.warn("[jobs] Could not read free disk space:", error instanceof Error ? error.message : error);
      }
      if (shuttingDown) {
        return { ok: false, error: { type: "unavailable", message: "Service is shutting down" } };
      }
    }

    // From here to the end of the function nothing awaits
    const at = now();
    const requestKey = `${userId}:${validation.url.href}`;
    if (isDuplicate(requestKey, at)) {
      return {
        ok: false,
        error: {
          type: "validation_error",
          reason: "duplicate-request",
          message: "This URL is already being processed",
        },
      };
    }

    const reserved = quota.tryReserve(userId);
    if (!reserved.ok) {
      return { ok: false, error: { type: "quota_denied", reason: reserved.reason, message: reserved.message } };
    }
    recentRequests.set(requestKey, at);

    const id = randomUUID();
    const job: Job = {
      id,
      ownerId: userId,
      url: validation.url.href,
      state: "queued",
      progress: { fraction: 0, bytesDone: 0, bytesTotal: null },
      createdAt: at,
      finishedAt: null,
      filePath: null,
      sizeBytes: null,
    };
    jobs.set(id, job);

    const runtime: JobRuntime = {
      reservation: reserved.reservation,
      controller: new AbortController(),
      abortReason: null,
      destination: buildDestinationPath(config.downloadDir, userId, id, validation.url.href),
      stallTimer: null,
      registered: false,
      done: Promise.resolve(),
    };
    runtimes.set(id, runtime);

    console.log(`[jobs] Accepted job ${id} from user ${userId}: ${job.url}`);
    notify(userId, "Checking URL...");
    const accepted = snapshotJob(job);
    runtime.done = run(job, runtime);

    return { ok: true, job: accepted };
  }

  /**
   * Cancel a job. Cancelling a finished job is a no-op.
   */
  async function cancel(jobId: string): Promise<CancelResult> {
    const job = jobs.get(jobId);
    if (!job) return { ok: false, error: "not_found" };

    const runtime = runtimes.get(jobId);
    if (runtime && !isTerminal(job.state)) {
      abortJob(runtime, "cancel");
      await runtime.done;
    }

    return { ok: true, job: snapshotJob(job) };
  }

  function getJob(jobId: string): Job | null {
    const job = jobs.get(jobId);
    return job ? snapshotJob(job) : null;
  }

  function listJobs(filter: { ownerId?: number; states?: JobState[] } = {}): Job[] {
    return [...jobs.values()]
      .filter((job) => filter.ownerId === undefined || job.ownerId === filter.ownerId)
      .filter((job) => !filter.states || filter.states.includes(job.state))
      .sort((a, b) => b.createdAt - a.createdAt)
      .map(snapshotJob);
  }

  /**
   * Number of jobs not yet in a terminal state.
   */
  function activeCount(): number {
    return runtimes.size;
  }

  /**
   * Reservation ids held by jobs that are still running.
   */
  function liveReservationIds(): Set<string> {
    return new Set([...runtimes.values()].map((runtime) => runtime.reservation.id));
  }

  /**
   * Drop finished jobs older than the job retention period. Returns how many were dropped.
   */
  function pruneFinishedJobs(at: number = now()): number {
    let pruned = 0;
    for (const [id, job] of jobs) {
      if (job.finishedAt !== null && at - job.finishedAt >= config.jobRetentionMs) {
        jobs.delete(id);
        pruned++;
      }
    }
    return pruned;
  }

  /**
   * Cancel every in-flight job and wait up to `graceMs` for them to settle.
   */
  async function shutdown(graceMs: number): Promise<ShutdownReport> {
    shuttingDown = true;
    const inFlight = [...runtimes.entries()];
    if (inFlight.length === 0) {
      return { cancelled: 0, leaked: [] };
    }

    console.log(`[jobs] Cancelling ${inFlight.length} in-flight job(s)`);
    for (const [, runtime] of inFlight) {
      abortJob(runtime, "shutdown");
    }

    let timer: NodeJS.Timeout | undefined;
    const graceElapsed = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, graceMs);
    });
    await Promise.race([Promise.all(inFlight.map(([, runtime]) => runtime.done)), graceElapsed]);
    clearTimeout(timer);

    const leaked = inFlight
      .filter(([id]) => {
        const job = jobs.get(id);
        return job !== undefined && !isTerminal(job.state);
      })
      .map(([id]) => id);

    for (const id of leaked) {
      const runtime = runtimes.get(id);
      console.warn(`[jobs] Job ${id} did not stop within ${graceMs}ms; abandoning its slot`, {
        reservation: runtime?.reservation.id,
      });
    }

    return { cancelled: inFlight.length - leaked.length, leaked };
  }

  return {
    submit,
    cancel,
    getJob,
    listJobs,
    activeCount,
    liveReservationIds,
    pruneFinishedJobs,
    shutdown,
  };
}

export type JobManager = ReturnType<typeof createJobManager>;
