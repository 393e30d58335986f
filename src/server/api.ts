/**
 * REST API for the download service.
 *
 * Endpoints:
 * - POST   /api/jobs                  - Submit a download { userId, url }
 * - GET    /api/jobs                  - List jobs (?userId=, ?state=)
 * - GET    /api/jobs/:id              - Get job details
 * - DELETE /api/jobs/:id              - Cancel a job
 * - GET    /api/users/:userId/messages - User inbox (?since=)
 * - GET    /api/users/:userId/events   - Live notifications (SSE)
 * - GET    /api/files/:token          - Download a delivered file
 * - GET    /api/admin/stats           - Quota, storage and sweeper state
 * - POST   /api/admin/cleanup         - Delete every tracked file
 * - POST   /api/admin/sweep           - Run a sweep cycle now
 */

import { Hono } from "hono";
import { streamSSE } from "hono/streaming";

import type { FileStore } from "../services/file-store.ts";
import type { JobManager, SubmitError } from "../services/job-manager.ts";
import type { JobState } from "../services/job-types.ts";
import type { QuotaTracker } from "../services/quota-tracker.ts";
import type { Sweeper } from "../services/sweeper.ts";
import type { FileHandler } from "./file-handler.ts";
import type { HubMessage, NotificationHub } from "./notification-hub.ts";

// ============================================================================
// Types
// ============================================================================

/**
 * API dependencies.
 */
export interface ApiDependencies {
  jobs: JobManager;
  quota: QuotaTracker;
  files: FileStore;
  hub: NotificationHub;
  fileHandler: FileHandler;
  sweeper?: Sweeper;
  auth: { enabled: boolean; adminUsers: number[] };
}

const JOB_STATES: readonly JobState[] = [
  "queued",
  "validating",
  "downloading",
  "uploading",
  "completed",
  "failed",
  "cancelled",
];

// ============================================================================
// Request Parsing
// ============================================================================

/**
 * Parse a user id from a path segment, header or JSON value.
 */
export function parseUserId(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isSafeInteger(value) && value >= 0 ? value : null;
  }
  if (typeof value === "string" && /^\d+$/.test(value.trim())) {
    const parsed = parseInt(value.trim(), 10);
    return Number.isSafeInteger(parsed) ? parsed : null;
  }
  return null;
}

export type SubmitBody = { userId: number; url: string };

export function parseSubmitBody(body: unknown): { ok: true; value: SubmitBody } | { ok: false; error: string } {
  if (typeof body !== "object" || body === null) {
    return { ok: false, error: "Request body must be a JSON object" };
  }
  const userId = "userId" in body ? parseUserId(body.userId) : null;
  if (userId === null) {
    return { ok: false, error: "userId must be a non-negative integer" };
  }
  const url = "url" in body ? body.url : undefined;
  if (typeof url !== "string" || url.trim() === "") {
    return { ok: false, error: "url is required" };
  }
  return { ok: true, value: { userId, url } };
}

function isJobState(value: string): value is JobState {
  return JOB_STATES.some((state) => state === value);
}

/**
 * HTTP status for a rejected submission.
 */
export function submitErrorStatus(error: SubmitError): 400 | 429 | 503 | 507 {
  switch (error.type) {
    case "validation_error":
      return 400;
    case "quota_denied":
      return 429;
    case "storage_full":
      return 507;
    case "unavailable":
      return 503;
  }
}

// ============================================================================
// API Factory
// ============================================================================

/**
 * Create the API router.
 */
export function createApiRouter(deps: ApiDependencies) {
  const { jobs, quota, files, hub, fileHandler, sweeper, auth } = deps;

  const api = new Hono();

  // ==========================================================================
  // Jobs
  // ==========================================================================

  api.post("/jobs", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: "Invalid JSON body" }, 400);
    }

    const parsed = parseSubmitBody(body);
    if (!parsed.ok) {
      return c.json({ error: parsed.error }, 400);
    }

    const result = await jobs.submit(parsed.value.userId, parsed.value.url);
    if (!result.ok) {
      return c.json({ error: result.error }, submitErrorStatus(result.error));
    }

    return c.json(result.job, 202);
  });

  api.get("/jobs", (c) => {
    const userParam = c.req.query("userId");
    const stateParam = c.req.query("state");

    let ownerId: number | undefined;
    if (userParam !== undefined) {
      const parsed = parseUserId(userParam);
      if (parsed === null) {
        return c.json({ error: "Invalid userId" }, 400);
      }
      ownerId = parsed;
    }

    let states: JobState[] | undefined;
    if (stateParam) {
      const requested = stateParam.split(",");
      const unknown = requested.filter((state) => !isJobState(state));
      if (unknown.length > 0) {
        return c.json({ error: `Unknown state: ${unknown.join(", ")}` }, 400);
      }
      states = requested.filter(isJobState);
    }

    const items = jobs.listJobs({ ownerId, states });
    return c.json({ items, count: items.length });
  });

  api.get("/jobs/:id", (c) => {
    const job = jobs.getJob(c.req.param("id"));
    if (!job) {
      return c.json({ error: "Job not found" }, 404);
    }
    return c.json(job);
  });

  api.delete("/jobs/:id", async (c) => {
    const result = await jobs.cancel(c.req.param("id"));
    if (!result.ok) {
      return c.json({ error: "Job not found" }, 404);
    }
    return c.json({ success: true, job: result.job });
  });

  // ==========================================================================
  // User Messages
  // ==========================================================================

  api.get("/users/:userId/messages", (c) => {
    const userId = parseUserId(c.req.param("userId"));
    if (userId === null) {
      return c.json({ error: "Invalid user ID" }, 400);
    }
    const since = parseUserId(c.req.query("since") ?? "0") ?? 0;
    const items = hub.inbox(userId, since);
    return c.json({ items, count: items.length });
  });

  api.get("/users/:userId/events", (c) => {
    const userId = parseUserId(c.req.param("userId"));
    if (userId === null) {
      return c.json({ error: "Invalid user ID" }, 400);
    }
    const since = parseUserId(c.req.query("since") ?? "") ?? null;

    return streamSSE(c, async (stream) => {
      const pending: HubMessage[] = since === null ? [] : hub.inbox(userId, since);
      let closed = false;
      let wake: (() => void) | null = null;

      const unsubscribe = hub.subscribe(userId, {
        send: (message) => {
          pending.push(message);
          wake?.();
        },
        close: () => {
          closed = true;
          wake?.();
        },
      });
      stream.onAbort(() => {
        closed = true;
        wake?.();
      });

      try {
        while (!closed) {
          let message = pending.shift();
          while (message) {
            await stream.writeSSE({ event: message.type, id: String(message.id), data: JSON.stringify(message) });
            message = pending.shift();
          }
          if (closed) break;
          await new Promise<void>((resolve) => {
            wake = resolve;
          });
          wake = null;
        }
      } finally {
        unsubscribe();
      }
    });
  });

  // ==========================================================================
  // Files
  // ==========================================================================

  api.get("/files/:token", async (c) => {
    const link = hub.resolveLink(c.req.param("token"));
    if (!link) {
      return c.json({ error: "Link not found or expired" }, 404);
    }

    const result = await fileHandler.serveFile(link.path, link.name, c.req.header("Range") ?? null);
    if (!result.ok) {
      if (result.error.type === "not_found") {
        return c.json({ error: result.error.message }, 404);
      }
      if (result.error.type === "invalid_range") {
        return c.json({ error: result.error.message }, 416);
      }
      console.error(`[api] Failed to serve ${link.path}:`, result.error.message);
      return c.json({ error: result.error.message }, 500);
    }

    return result.response;
  });

  // ==========================================================================
  // Admin
  // ==========================================================================

  api.use("/admin/*", async (c, next) => {
    if (auth.enabled) {
      const userId = parseUserId(c.req.header("X-User-Id"));
      if (userId === null || !auth.adminUsers.includes(userId)) {
        return c.json({ error: "Admin access required" }, 403);
      }
    }
    await next();
  });

  api.get("/admin/stats", (c) => {
    return c.json({
      quota: quota.stats(),
      storage: files.usage(),
      activeJobs: jobs.activeCount(),
      subscribers: hub.subscriberCount(),
      sweeper: sweeper?.getState() ?? null,
    });
  });

  api.post("/admin/cleanup", async (c) => {
    const removed = await files.forceCleanup();
    return c.json({ removed });
  });

  api.post("/admin/sweep", async (c) => {
    if (!sweeper) {
      return c.json({ error: "Sweeper is not running" }, 503);
    }
    const result = await sweeper.triggerSweep();
    return c.json(result);
  });

  return api;
}
