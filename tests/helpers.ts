/**
 * Shared fakes for job manager, server and end-to-end tests.
 */

import { mkdir, stat, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import type { Config } from "../src/config.ts";
import { createFileHandler } from "../src/server/file-handler.ts";
import { createServer } from "../src/server/index.ts";
import { createNotificationHub } from "../src/server/notification-hub.ts";
import { createFileStore } from "../src/services/file-store.ts";
import { createJobManager, type JobManager } from "../src/services/job-manager.ts";
import type {
  DeliveryResult,
  FetchRequest,
  FetchResult,
  Job,
  MediaFetcher,
  Transport,
} from "../src/services/job-types.ts";
import { createQuotaTracker } from "../src/services/quota-tracker.ts";
import { createStatusReporter } from "../src/services/status-reporter.ts";
import { createSweeper } from "../src/services/sweeper.ts";
import { createSystemMetrics, type MetricsSource } from "../src/services/system-metrics.ts";

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

export async function waitUntil(check: () => boolean | Promise<boolean>, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!(await check())) {
    if (Date.now() > deadline) throw new Error("Timed out waiting for condition");
    await sleep(5);
  }
}

export async function waitForJob(
  jobs: JobManager,
  id: string,
  predicate: (job: Job) => boolean,
  timeoutMs = 2000,
): Promise<Job> {
  const deadline = Date.now() + timeoutMs;
  for (;;) {
    const job = jobs.getJob(id);
    if (job && predicate(job)) return job;
    if (Date.now() > deadline) {
      throw new Error(`Timed out waiting for job ${id} (state: ${job?.state ?? "missing"})`);
    }
    await sleep(5);
  }
}

export function isFinished(job: Job): boolean {
  return job.finishedAt !== null;
}

export function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

// ============================================================================
// Fetchers
// ============================================================================

export async function writeDownload(request: FetchRequest, sizeBytes: number): Promise<FetchResult> {
  await mkdir(dirname(request.destination), { recursive: true });
  await writeFile(request.destination, Buffer.alloc(sizeBytes));
  return { ok: true, filePath: request.destination, sizeBytes };
}

/**
 * Writes a file of the given size, reporting the listed progress points first.
 */
export function fileFetcher(sizeBytes: number, progress: number[] = [sizeBytes]) {
  const requests: FetchRequest[] = [];
  const fetcher: MediaFetcher = {
    fetch: async (request) => {
      requests.push(request);
      for (const done of progress) {
        request.onProgress(done, sizeBytes);
      }
      return await writeDownload(request, sizeBytes);
    },
  };
  return { fetcher, requests };
}

/**
 * Never settles on its own; each call's result is resolved by the test.
 */
export function controlledFetcher() {
  const requests: FetchRequest[] = [];
  const pending: { resolve: (result: FetchResult) => void }[] = [];
  const fetcher: MediaFetcher = {
    fetch: (request) => {
      requests.push(request);
      const call = deferred<FetchResult>();
      pending.push(call);
      return call.promise;
    },
  };
  return { fetcher, requests, pending };
}

/**
 * Runs until its abort signal fires, then reports cancellation.
 */
export function cooperativeFetcher() {
  const requests: FetchRequest[] = [];
  const fetcher: MediaFetcher = {
    fetch: (request) => {
      requests.push(request);
      return new Promise<FetchResult>((resolve) => {
        request.signal.addEventListener(
          "abort",
          () => resolve({ ok: false, error: { kind: "cancelled", message: "Download cancelled" } }),
          { once: true },
        );
      });
    },
  };
  return { fetcher, requests };
}

// ============================================================================
// Transport
// ============================================================================

export function fakeTransport(result: DeliveryResult = { ok: true }) {
  const messages: { userId: number; text: string }[] = [];
  const deliveries: { userId: number; filePath: string; caption: string }[] = [];
  const transport: Transport = {
    notify: async (userId, text) => {
      messages.push({ userId, text });
    },
    deliver: async (userId, filePath, options) => {
      deliveries.push({ userId, filePath, caption: options.caption });
      return result;
    },
  };
  return { transport, messages, deliveries };
}

// ============================================================================
// Service
// ============================================================================

const GB = 1024 ** 3;

/**
 * Create a test configuration.
 */
export function createTestConfig(downloadDir: string, overrides: Partial<Config> = {}): Config {
  return {
    downloadDir,
    port: 0,
    publicBaseUrl: "http://localhost:8080",
    maxGlobalConcurrent: 3,
    maxUserConcurrent: 2,
    maxUserDaily: 10,
    maxFileSizeBytes: 1000,
    maxDeliveryBytes: 1000,
    maxStorageBytes: 0,
    minFreeDiskBytes: 1 * GB,
    downloadRateLimit: 0,
    fileRetentionMs: 60 * 60 * 1000,
    sweepIntervalMs: 5 * 60 * 1000,
    jobRetentionMs: 60 * 60 * 1000,
    stallTimeoutMs: 5000,
    downloadTimeoutMs: 60_000,
    shutdownGraceMs: 1000,
    duplicateCooldownMs: 30_000,
    progressIntervalMs: 0,
    authEnabled: false,
    allowedUsers: [],
    adminUsers: [],
    blockedDomains: ["malware.com"],
    ...overrides,
  };
}

/**
 * Host metrics with 10 of 100 GB free.
 */
export const fakeMetricsSource: MetricsSource = {
  cpuTimes: () => ({ idle: 0, total: 0 }),
  memory: () => ({ total: 1000, free: 500 }),
  disk: async () => ({ totalBytes: 100 * GB, usedBytes: 90 * GB, freeBytes: 10 * GB }),
};

/**
 * Wire every service the way the entry point does, around the given fetcher.
 */
export function createTestService(
  config: Config,
  fetcher: MediaFetcher,
  options: { now?: () => number; metricsSource?: MetricsSource } = {},
) {
  const now = options.now ?? Date.now;
  const files = createFileStore(
    { downloadDir: config.downloadDir, retentionMs: config.fileRetentionMs, maxStorageBytes: config.maxStorageBytes },
    undefined,
    now,
  );
  const quota = createQuotaTracker(
    {
      maxGlobalConcurrent: config.maxGlobalConcurrent,
      maxUserConcurrent: config.maxUserConcurrent,
      maxUserDaily: config.maxUserDaily,
      exemptUsers: config.adminUsers,
    },
    now,
  );
  const hub = createNotificationHub(
    { maxDeliveryBytes: config.maxDeliveryBytes, publicBaseUrl: config.publicBaseUrl, linkTtlMs: config.fileRetentionMs },
    { now },
  );
  const metrics = createSystemMetrics({ path: config.downloadDir }, options.metricsSource ?? fakeMetricsSource, now);
  const jobs = createJobManager(config, {
    quota,
    files,
    fetcher,
    transport: hub.transport,
    freeDiskBytes: (path) => metrics.freeDiskBytes(path),
    now,
  });
  const sweeper = createSweeper({ files, quota, jobs, now }, { intervalMs: config.sweepIntervalMs });
  const status = createStatusReporter({ quota, files, metrics, now }, { minFreeDiskBytes: config.minFreeDiskBytes });
  const { app } = createServer({
    jobs,
    quota,
    files,
    hub,
    sweeper,
    status,
    fileHandler: createFileHandler(),
    auth: { enabled: config.authEnabled, adminUsers: config.adminUsers },
    quiet: true,
  });
  return { app, jobs, quota, files, hub, sweeper, status };
}
