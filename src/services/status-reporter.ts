/**
 * Read-only status snapshot served by the status endpoint.
 */

import type { FileStore } from "./file-store.ts";
import type { QuotaTracker } from "./quota-tracker.ts";
import type { SystemMetrics } from "./system-metrics.ts";
import { roundTo } from "../utils/format.ts";

const GB = 1024 ** 3;

export interface DiskReport {
  totalGB: number;
  usedGB: number;
  freeGB: number;
  percent: number;
}

export interface StatusSnapshot {
  status: "ok" | "degraded";
  timestamp: string;
  /** Seconds since the reporter was created */
  uptime: number;
  activeDownloads: number;
  userCount: number;
  fileCount: number;
  cpuPercent: number;
  memoryPercent: number;
  disk: DiskReport | null;
}

export interface StatusReporterDependencies {
  quota: QuotaTracker;
  files: FileStore;
  metrics: SystemMetrics;
  now?: () => number;
}

export function createStatusReporter(
  deps: StatusReporterDependencies,
  config: { minFreeDiskBytes: number },
) {
  const now = deps.now ?? Date.now;
  const startedAt = now();

  async function snapshot(): Promise<StatusSnapshot> {
    const at = now();
    const quota = deps.quota.stats();
    const usage = deps.files.usage();
    const host = await deps.metrics.collect();

    let disk: DiskReport | null = null;
    if (host.disk) {
      const { totalBytes, usedBytes, freeBytes } = host.disk;
      disk = {
        totalGB: roundTo(totalBytes / GB),
        usedGB: roundTo(usedBytes / GB),
        freeGB: roundTo(freeBytes / GB),
        percent: totalBytes > 0 ? roundTo((usedBytes / totalBytes) * 100) : 0,
      };
    }

    const degraded = host.disk !== null && host.disk.freeBytes < config.minFreeDiskBytes;

    return {
      status: degraded ? "degraded" : "ok",
      timestamp: new Date(at).toISOString(),
      uptime: roundTo((at - startedAt) / 1000),
      activeDownloads: quota.globalActive,
      userCount: quota.userCount,
      fileCount: usage.fileCount,
      cpuPercent: roundTo(host.cpuPercent),
      memoryPercent: roundTo(host.memoryPercent),
      disk,
    };
  }

  return { snapshot };
}

export type StatusReporter = ReturnType<typeof createStatusReporter>;
