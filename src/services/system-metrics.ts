/**
 * Host metrics for the status report: CPU, memory and disk usage.
 */

import { statfs } from "node:fs/promises";
import { cpus, freemem, totalmem } from "node:os";

// ============================================================================
// Types
// ============================================================================

export interface DiskUsage {
  totalBytes: number;
  usedBytes: number;
  freeBytes: number;
}

export interface HostMetrics {
  cpuPercent: number;
  memoryPercent: number;
  disk: DiskUsage | null;
}

/**
 * Metrics source interface for dependency injection.
 */
export interface MetricsSource {
  cpuTimes(): { idle: number; total: number };
  memory(): { total: number; free: number };
  disk(path: string): Promise<DiskUsage>;
}

export const defaultMetricsSource: MetricsSource = {
  cpuTimes: () => {
    let idle = 0;
    let total = 0;
    for (const cpu of cpus()) {
      const { user, nice, sys, idle: cpuIdle, irq } = cpu.times;
      idle += cpuIdle;
      total += user + nice + sys + cpuIdle + irq;
    }
    return { idle, total };
  },
  memory: () => ({ total: totalmem(), free: freemem() }),
  disk: async (path) => {
    const info = await statfs(path);
    const totalBytes = info.blocks * info.bsize;
    const freeBytes = info.bavail * info.bsize;
    return { totalBytes, freeBytes, usedBytes: totalBytes - info.bfree * info.bsize };
  },
};

// ============================================================================
// System Metrics
// ============================================================================

export function createSystemMetrics(
  config: { path: string; cacheMs?: number },
  source: MetricsSource = defaultMetricsSource,
  now: () => number = Date.now,
) {
  const cacheMs = config.cacheMs ?? 1000;
  let lastCpu = source.cpuTimes();
  let cached: { at: number; metrics: HostMetrics } | null = null;

  /**
   * CPU usage since the previous sample, in percent.
   */
  function sampleCpu(): number {
    const current = source.cpuTimes();
    const totalDelta = current.total - lastCpu.total;
    const idleDelta = current.idle - lastCpu.idle;
    lastCpu = current;
    if (totalDelta <= 0) return 0;
    return Math.max(0, Math.min(100, (1 - idleDelta / totalDelta) * 100));
  }

  async function freeDiskBytes(path: string = config.path): Promise<number | null> {
    try {
      return (await source.disk(path)).freeBytes;
    } catch (error) {
      console.warn(`[metrics] Could not read disk usage for ${path}:`, error instanceof Error ? error.message : error);
      return null;
    }
  }

  async function collect(): Promise<HostMetrics> {
    const at = now();
    if (cached && at - cached.at < cacheMs) {
      return cached.metrics;
    }

    const memory = source.memory();
    const memoryPercent = memory.total > 0 ? ((memory.total - memory.free) / memory.total) * 100 : 0;

    let disk: DiskUsage | null = null;
    try {
      disk = await source.disk(config.path);
    } catch (error) {
      console.warn(`[metrics] Could not read disk usage for ${config.path}:`, error instanceof Error ? error.message : error);
    }

    const metrics: HostMetrics = { cpuPercent: sampleCpu(), memoryPercent, disk };
    cached = { at, metrics };
    return metrics;
  }

  return { collect, freeDiskBytes };
}

export type SystemMetrics = ReturnType<typeof createSystemMetrics>;
