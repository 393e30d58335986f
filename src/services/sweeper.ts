/**
 * Sweeper.
 *
 * Background schedule that keeps the download directory and the in-memory
 * tables from growing without bound.
 *
 * Each cycle:
 * - Evicts files whose retention has expired
 * - Releases quota still held by reservations whose job is gone
 * - Drops finished jobs from the job table after their retention
 *
 * A failure in one step is recorded and never stops the schedule.
 */

import type { FileStore } from "./file-store.ts";
import type { JobManager } from "./job-manager.ts";
import type { QuotaTracker } from "./quota-tracker.ts";
import { formatBytes } from "../utils/format.ts";

// ============================================================================
// Types
// ============================================================================

export interface SweeperConfig {
  /** How often to run a cycle */
  intervalMs: number;
}

export interface SweeperState {
  isRunning: boolean;
  lastRunAt: Date | null;
  lastRunDurationMs: number | null;
  filesDeletedTotal: number;
  bytesFreedTotal: number;
  runsCompleted: number;
  errors: SweeperError[];
}

export interface SweeperError {
  timestamp: Date;
  type: "fs_error" | "unknown";
  message: string;
  path?: string;
}

export interface SweepCycleResult {
  ok: boolean;
  skipped: boolean;
  filesDeleted: number;
  bytesFreed: number;
  reservationsReleased: number;
  jobsPruned: number;
  durationMs: number;
  errors: SweeperError[];
}

export interface SweeperDependencies {
  files: FileStore;
  quota: QuotaTracker;
  jobs: Pick<JobManager, "liveReservationIds" | "pruneFinishedJobs">;
  now?: () => number;
}

// ============================================================================
// Sweeper
// ============================================================================

export function createSweeper(
  deps: SweeperDependencies,
  config: SweeperConfig,
) {
  const now = deps.now ?? Date.now;

  let state: SweeperState = {
    isRunning: false,
    lastRunAt: null,
    lastRunDurationMs: null,
    filesDeletedTotal: 0,
    bytesFreedTotal: 0,
    runsCompleted: 0,
    errors: [],
  };

  let intervalId: NodeJS.Timeout | null = null;
  let cycleInProgress = false;

  function emptyResult(skipped: boolean): SweepCycleResult {
    return {
      ok: true,
      skipped,
      filesDeleted: 0,
      bytesFreed: 0,
      reservationsReleased: 0,
      jobsPruned: 0,
      durationMs: 0,
      errors: [],
    };
  }

  /**
   * Run a single sweep cycle. A cycle requested while one is running is skipped.
   */
  async function runCycle(): Promise<SweepCycleResult> {
    if (cycleInProgress) {
      console.log("[sweeper] Previous cycle still running, skipping");
      return emptyResult(true);
    }
    cycleInProgress = true;

    const startTime = Date.now();
    const result = emptyResult(false);

    try {
      try {
        const sweep = await deps.files.sweep(now());
        result.filesDeleted = sweep.evicted.length;
        result.bytesFreed = sweep.evicted.reduce((sum, record) => sum + record.sizeBytes, 0);
        for (const error of sweep.errors) {
          result.errors.push({ timestamp: new Date(), type: "fs_error", message: error.message, path: error.path });
        }
      } catch (e) {
        result.errors.push({
          timestamp: new Date(),
          type: "unknown",
          message: e instanceof Error ? e.message : String(e),
        });
      }

      result.reservationsReleased = deps.quota.releaseExcept(deps.jobs.liveReservationIds());
      result.jobsPruned = deps.jobs.pruneFinishedJobs(now());
    } catch (e) {
      result.errors.push({
        timestamp: new Date(),
        type: "unknown",
        message: e instanceof Error ? e.message : String(e),
      });
    } finally {
      cycleInProgress = false;
    }

    result.durationMs = Date.now() - startTime;
    result.ok = result.errors.length === 0;

    state = {
      ...state,
      lastRunAt: new Date(),
      lastRunDurationMs: result.durationMs,
      filesDeletedTotal: state.filesDeletedTotal + result.filesDeleted,
      bytesFreedTotal: state.bytesFreedTotal + result.bytesFreed,
      runsCompleted: state.runsCompleted + 1,
      errors: [...result.errors, ...state.errors].slice(0, 20), // Keep last 20 errors
    };

    if (result.filesDeleted > 0 || result.reservationsReleased > 0 || result.jobsPruned > 0) {
      console.log(
        `[sweeper] Deleted ${result.filesDeleted} file(s), freed ${formatBytes(result.bytesFreed)}, ` +
          `released ${result.reservationsReleased} reservation(s), pruned ${result.jobsPruned} job(s) in ${result.durationMs}ms`,
      );
    }
    for (const error of result.errors) {
      console.error(`[sweeper] ${error.type}: ${error.message}`);
    }

    return result;
  }

  function runInBackground(): void {
    runCycle().catch((e: unknown) => {
      console.error("[sweeper] Cycle failed:", e);
    });
  }

  /**
   * Start the sweeper: one cycle now, then every interval.
   */
  function start(): void {
    if (state.isRunning) return;

    state = { ...state, isRunning: true };
    console.log(`[sweeper] Starting sweeper (every ${Math.round(config.intervalMs / 1000)} seconds)`);

    runInBackground();
    intervalId = setInterval(runInBackground, config.intervalMs);
    intervalId.unref();
  }

  /**
   * Stop the sweeper.
   */
  function stop(): void {
    if (!state.isRunning) return;

    if (intervalId !== null) {
      clearInterval(intervalId);
      intervalId = null;
    }

    state = { ...state, isRunning: false };
    console.log("[sweeper] Sweeper stopped");
  }

  function getState(): SweeperState {
    return { ...state, errors: [...state.errors] };
  }

  /**
   * Manually trigger a sweep cycle.
   */
  async function triggerSweep(): Promise<SweepCycleResult> {
    return await runCycle();
  }

  return {
    start,
    stop,
    getState,
    triggerSweep,
  };
}

export type Sweeper = ReturnType<typeof createSweeper>;
