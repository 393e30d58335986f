/**
 * Decides when a download's progress is worth a user-facing message.
 *
 * Messages go out when a milestone (0/25/50/75/100 %) is crossed and at
 * least `minIntervalMs` has passed since the previous message for that job.
 * The 100 % milestone is always reported.
 */

import { formatBytes, formatDuration } from "../utils/format.ts";

export interface ProgressNotifierConfig {
  milestones?: number[];
  minIntervalMs: number;
}

interface JobProgressState {
  startedAt: number;
  lastSentAt: number | null;
  lastMilestone: number;
}

export const DEFAULT_MILESTONES = [0, 25, 50, 75, 100];

export function createProgressNotifier(
  config: ProgressNotifierConfig,
  now: () => number = Date.now,
) {
  const milestones = [...(config.milestones ?? DEFAULT_MILESTONES)].sort((a, b) => a - b);
  const jobs = new Map<string, JobProgressState>();

  function start(jobId: string): void {
    jobs.set(jobId, { startedAt: now(), lastSentAt: null, lastMilestone: -1 });
  }

  /**
   * Returns the message to send, or null when this update should stay silent.
   */
  function update(
    jobId: string,
    fileName: string,
    bytesDone: number,
    bytesTotal: number | null,
  ): string | null {
    const state = jobs.get(jobId);
    if (!state || !bytesTotal || bytesTotal <= 0) return null;

    const percentage = Math.min(100, (bytesDone * 100) / bytesTotal);
    const reached = milestones.filter((m) => m <= percentage && m > state.lastMilestone);
    if (reached.length === 0) return null;

    const milestone = reached[reached.length - 1];
    const at = now();
    const intervalElapsed = state.lastSentAt === null || at - state.lastSentAt >= config.minIntervalMs;
    if (!intervalElapsed && milestone < 100) return null;

    state.lastMilestone = milestone;
    state.lastSentAt = at;

    const elapsedSeconds = Math.max((at - state.startedAt) / 1000, 0.001);
    const speed = bytesDone / elapsedSeconds;
    const eta = speed > 0 ? (bytesTotal - bytesDone) / speed : 0;

    return [
      "Downloading:",
      `File: ${fileName}`,
      `Progress: ${percentage.toFixed(1)}%`,
      `Speed: ${formatBytes(speed)}/s`,
      `Downloaded: ${formatBytes(bytesDone)} / ${formatBytes(bytesTotal)}`,
      `Time remaining: ${formatDuration(eta)}`,
    ].join("\n");
  }

  function finish(jobId: string): void {
    jobs.delete(jobId);
  }

  return { start, update, finish };
}

export type ProgressNotifier = ReturnType<typeof createProgressNotifier>;
