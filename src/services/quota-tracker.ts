/**
 * Quota Tracker.
 *
 * Owns the global and per-user download counters. Every mutation happens
 * inside a single synchronous function body (no await), so a reservation's
 * check-and-increment across all three counters is atomic with respect to
 * every other task on the event loop.
 */

import { randomUUID } from "node:crypto";

// ============================================================================
// Types
// ============================================================================

export interface QuotaConfig {
  maxGlobalConcurrent: number;
  maxUserConcurrent: number;
  maxUserDaily: number;
  /** Length of each user's sliding daily window */
  dailyWindowMs?: number;
  /** Users not subject to the daily limit (admins) */
  exemptUsers?: number[];
}

export type QuotaDenial = "global-busy" | "user-busy" | "daily-limit-exceeded";

export interface Reservation {
  readonly id: string;
  readonly userId: number;
  readonly reservedAt: number;
}

export type ReserveResult =
  | { ok: true; reservation: Reservation }
  | { ok: false; reason: QuotaDenial; message: string };

export interface QuotaStats {
  globalActive: number;
  maxGlobalConcurrent: number;
  perUserActive: Record<string, number>;
  perUserDailyCount: Record<string, number>;
  /** Users with an open daily window or an active download */
  userCount: number;
}

interface DailyWindow {
  startedAt: number;
  count: number;
}

export const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================================================
// Quota Tracker
// ============================================================================

export function createQuotaTracker(
  config: QuotaConfig,
  now: () => number = Date.now,
) {
  const windowMs = config.dailyWindowMs ?? DAY_MS;
  const exempt = new Set(config.exemptUsers ?? []);

  const reservations = new Map<string, Reservation>();
  const perUserActive = new Map<number, number>();
  const daily = new Map<number, DailyWindow>();
  let globalActive = 0;

  /**
   * Current daily window for a user, dropping it once it has elapsed.
   */
  function currentWindow(userId: number, at: number): DailyWindow | null {
    const window = daily.get(userId);
    if (!window) return null;
    if (at - window.startedAt >= windowMs) {
      daily.delete(userId);
      return null;
    }
    return window;
  }

  function tryReserve(userId: number): ReserveResult {
    const at = now();
    const window = currentWindow(userId, at);
    const dailyCount = window?.count ?? 0;
    const userActive = perUserActive.get(userId) ?? 0;

    if (!exempt.has(userId) && dailyCount >= config.maxUserDaily) {
      return {
        ok: false,
        reason: "daily-limit-exceeded",
        message: `Daily limit of ${config.maxUserDaily} downloads reached`,
      };
    }

    if (userActive >= config.maxUserConcurrent) {
      return {
        ok: false,
        reason: "user-busy",
        message: `Already running ${config.maxUserConcurrent} downloads`,
      };
    }

    if (globalActive >= config.maxGlobalConcurrent) {
      return {
        ok: false,
        reason: "global-busy",
        message: "Server is busy, try again shortly",
      };
    }

    const reservation: Reservation = { id: randomUUID(), userId, reservedAt: at };
    reservations.set(reservation.id, reservation);
    globalActive++;
    perUserActive.set(userId, userActive + 1);
    if (window) {
      window.count++;
    } else {
      daily.set(userId, { startedAt: at, count: 1 });
    }

    return { ok: true, reservation };
  }

  /**
   * Release a reservation. Unknown or already-released reservations are ignored.
   * Returns true if this call released it.
   */
  function release(reservation: Reservation | string): boolean {
    const id = typeof reservation === "string" ? reservation : reservation.id;
    const held = reservations.get(id);
    if (!held) return false;

    reservations.delete(id);
    globalActive = Math.max(0, globalActive - 1);

    const userActive = (perUserActive.get(held.userId) ?? 0) - 1;
    if (userActive > 0) {
      perUserActive.set(held.userId, userActive);
    } else {
      perUserActive.delete(held.userId);
    }

    return true;
  }

  /**
   * Release every reservation not in the given set. Returns how many were released.
   */
  function releaseExcept(liveIds: ReadonlySet<string>): number {
    let released = 0;
    for (const id of [...reservations.keys()]) {
      if (!liveIds.has(id) && release(id)) {
        released++;
      }
    }
    if (released > 0) {
      console.warn(`[quota] Released ${released} orphaned reservation(s)`);
    }
    return released;
  }

  function dailyCount(userId: number): number {
    return currentWindow(userId, now())?.count ?? 0;
  }

  function activeReservations(): string[] {
    return [...reservations.keys()];
  }

  function stats(): QuotaStats {
    const at = now();
    const perUserDailyCount: Record<string, number> = {};
    for (const userId of [...daily.keys()]) {
      const window = currentWindow(userId, at);
      if (window) perUserDailyCount[String(userId)] = window.count;
    }

    const active: Record<string, number> = {};
    for (const [userId, count] of perUserActive) {
      active[String(userId)] = count;
    }

    const users = new Set([...Object.keys(perUserDailyCount), ...Object.keys(active)]);

    return {
      globalActive,
      maxGlobalConcurrent: config.maxGlobalConcurrent,
      perUserActive: active,
      perUserDailyCount,
      userCount: users.size,
    };
  }

  return {
    tryReserve,
    release,
    releaseExcept,
    dailyCount,
    activeReservations,
    stats,
  };
}

export type QuotaTracker = ReturnType<typeof createQuotaTracker>;
