/**
 * Main entry point for the media fetch bot.
 *
 * Initializes and starts all services:
 * - File store (rebuilt from the download directory)
 * - Quota tracker and job manager
 * - Sweeper (retention and orphaned quota)
 * - HTTP server (status, API, file downloads)
 */

import { serve } from "@hono/node-server";
import { config as loadDotenv } from "dotenv";

import { loadConfigFromEnv, type Config } from "./config.ts";
import { createServer } from "./server/index.ts";
import { createFileHandler } from "./server/file-handler.ts";
import { createNotificationHub } from "./server/notification-hub.ts";
import { createFileStore } from "./services/file-store.ts";
import { createHttpFetcher } from "./services/http-fetcher.ts";
import { createJobManager } from "./services/job-manager.ts";
import { createQuotaTracker } from "./services/quota-tracker.ts";
import { createStatusReporter } from "./services/status-reporter.ts";
import { createSweeper } from "./services/sweeper.ts";
import { createSystemMetrics } from "./services/system-metrics.ts";
import { formatBytes } from "./utils/format.ts";

// ============================================================================
// Logger
// ============================================================================

const log = {
  info: (msg: string, data?: Record<string, unknown>) => {
    console.log(`[INFO] ${msg}`, data ? JSON.stringify(data) : "");
  },
  error: (msg: string, data?: Record<string, unknown>) => {
    console.error(`[ERROR] ${msg}`, data ? JSON.stringify(data) : "");
  },
  warn: (msg: string, data?: Record<string, unknown>) => {
    console.warn(`[WARN] ${msg}`, data ? JSON.stringify(data) : "");
  },
};

// ============================================================================
// Graceful Shutdown
// ============================================================================

interface Cleanup {
  name: string;
  fn: () => void | Promise<void>;
}

const cleanupTasks: Cleanup[] = [];
let shuttingDown = false;

function registerCleanup(name: string, fn: () => void | Promise<void>): void {
  cleanupTasks.push({ name, fn });
}

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info(`Received ${signal}, shutting down...`);

  for (const task of [...cleanupTasks].reverse()) {
    try {
      log.info(`Cleaning up: ${task.name}`);
      await task.fn();
    } catch (err) {
      log.error(`Error during cleanup of ${task.name}`, {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  log.info("Shutdown complete");
  process.exit(0);
}

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  log.info("Starting media fetch bot...");

  // 1. Parse configuration
  loadDotenv();
  const configResult = loadConfigFromEnv();
  if (!configResult.ok) {
    log.error("Configuration error", {
      errors: configResult.errors.map((e) => ({ field: e.field, message: e.message })),
    });
    process.exit(1);
  }
  const config: Config = configResult.config;
  log.info("Configuration loaded", {
    downloadDir: config.downloadDir,
    port: config.port,
    maxGlobalConcurrent: config.maxGlobalConcurrent,
    maxUserConcurrent: config.maxUserConcurrent,
    maxUserDaily: config.maxUserDaily,
    maxFileSize: formatBytes(config.maxFileSizeBytes),
    authEnabled: config.authEnabled,
  });

  // 2. Storage
  log.info("Scanning download directory...");
  const files = createFileStore({
    downloadDir: config.downloadDir,
    retentionMs: config.fileRetentionMs,
    maxStorageBytes: config.maxStorageBytes,
  });
  const tracked = await files.rescan();
  log.info("Download directory scanned", { files: tracked, bytes: files.usage().totalBytes });

  const metrics = createSystemMetrics({ path: config.downloadDir });
  const freeBytes = await metrics.freeDiskBytes();
  if (freeBytes !== null && freeBytes < config.minFreeDiskBytes) {
    log.warn("Low disk space at startup, removing stored downloads", { free: formatBytes(freeBytes) });
    await files.forceCleanup();
  }

  // 3. Initialize services
  log.info("Initializing services...");

  const quota = createQuotaTracker({
    maxGlobalConcurrent: config.maxGlobalConcurrent,
    maxUserConcurrent: config.maxUserConcurrent,
    maxUserDaily: config.maxUserDaily,
    exemptUsers: config.adminUsers,
  });

  const hub = createNotificationHub({
    maxDeliveryBytes: config.maxDeliveryBytes,
    publicBaseUrl: config.publicBaseUrl,
    linkTtlMs: config.fileRetentionMs,
  });

  const fetcher = createHttpFetcher({ rateLimit: config.downloadRateLimit });

  const jobs = createJobManager(config, {
    quota,
    files,
    fetcher,
    transport: hub.transport,
    freeDiskBytes: (path) => metrics.freeDiskBytes(path),
  });

  const sweeper = createSweeper({ files, quota, jobs }, { intervalMs: config.sweepIntervalMs });

  const status = createStatusReporter({ quota, files, metrics }, { minFreeDiskBytes: config.minFreeDiskBytes });

  log.info("Services initialized");

  // 4. Create and start HTTP server
  log.info("Starting HTTP server...");
  const server = createServer({
    jobs,
    quota,
    files,
    hub,
    sweeper,
    status,
    fileHandler: createFileHandler(),
    auth: { enabled: config.authEnabled, adminUsers: config.adminUsers },
  });

  const httpServer = serve({ fetch: server.app.fetch, port: config.port });
  registerCleanup("HTTP Server", () =>
    new Promise<void>((resolve, reject) => {
      httpServer.close((err) => (err ? reject(err) : resolve()));
    }));
  registerCleanup("Notification Hub", () => hub.closeAll());
  log.info(`HTTP server listening on port ${config.port}`);

  // 5. Start background services
  sweeper.start();
  registerCleanup("Sweeper", () => sweeper.stop());

  registerCleanup("Job Manager", async () => {
    const report = await jobs.shutdown(config.shutdownGraceMs);
    if (report.leaked.length > 0) {
      log.warn("Jobs still running after grace period", { leaked: report.leaked });
    }
    log.info("Job manager stopped", { cancelled: report.cancelled });
  });

  log.info("Media fetch bot is ready!");
  log.info(`Status available at ${config.publicBaseUrl}/status`);

  // 6. Set up signal handlers
  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  log.error("Fatal error", { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
