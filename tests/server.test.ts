/**
 * Tests for server components.
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { Config } from "../src/config.ts";
import { parseSubmitBody, parseUserId, submitErrorStatus } from "../src/server/api.ts";
import type { MediaFetcher } from "../src/services/job-types.ts";
import type { MetricsSource } from "../src/services/system-metrics.ts";
import {
  controlledFetcher,
  createTestConfig,
  createTestService,
  fakeMetricsSource,
  fileFetcher,
  isFinished,
  waitForJob,
} from "./helpers.ts";

const GB = 1024 ** 3;

// ============================================================================
// Helpers
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

async function readBody(res: Response): Promise<Record<string, unknown>> {
  const value: unknown = await res.json();
  if (!isRecord(value)) throw new Error("expected a JSON object");
  return value;
}

function asString(value: unknown): string {
  if (typeof value !== "string") throw new Error(`expected a string, got ${typeof value}`);
  return value;
}

function postJob(body: unknown, raw?: string): RequestInit {
  return {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: raw ?? JSON.stringify(body),
  };
}

// ============================================================================
// Request Parsing Tests
// ============================================================================

describe("parseUserId", () => {
  it("should accept non-negative integers", () => {
    expect(parseUserId(42)).toBe(42);
    expect(parseUserId("42")).toBe(42);
    expect(parseUserId(" 7 ")).toBe(7);
    expect(parseUserId(0)).toBe(0);
  });

  it("should reject everything else", () => {
    expect(parseUserId(-1)).toBeNull();
    expect(parseUserId(1.5)).toBeNull();
    expect(parseUserId("abc")).toBeNull();
    expect(parseUserId("-3")).toBeNull();
    expect(parseUserId(undefined)).toBeNull();
    expect(parseUserId(null)).toBeNull();
  });
});

describe("parseSubmitBody", () => {
  it("should accept a user id and URL", () => {
    expect(parseSubmitBody({ userId: 1, url: "https://example.com/a.mp4" })).toEqual({
      ok: true,
      value: { userId: 1, url: "https://example.com/a.mp4" },
    });
  });

  it("should reject missing fields", () => {
    expect(parseSubmitBody(null)).toEqual({ ok: false, error: "Request body must be a JSON object" });
    expect(parseSubmitBody({ url: "https://example.com" })).toEqual({
      ok: false,
      error: "userId must be a non-negative integer",
    });
    expect(parseSubmitBody({ userId: 1, url: "  " })).toEqual({ ok: false, error: "url is required" });
  });
});

describe("submitErrorStatus", () => {
  it("should map each error type to a status", () => {
    expect(submitErrorStatus({ type: "validation_error", reason: "invalid-url", message: "" })).toBe(400);
    expect(submitErrorStatus({ type: "quota_denied", reason: "user-busy", message: "" })).toBe(429);
    expect(submitErrorStatus({ type: "storage_full", message: "" })).toBe(507);
    expect(submitErrorStatus({ type: "unavailable", message: "" })).toBe(503);
  });
});

// ============================================================================
// HTTP Tests
// ============================================================================

describe("createServer", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "server-test-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  function setup(
    options: { fetcher?: MediaFetcher; config?: Partial<Config>; metricsSource?: MetricsSource } = {},
  ) {
    const fetcher = options.fetcher ?? fileFetcher(100).fetcher;
    return createTestService(createTestConfig(dir, options.config), fetcher, {
      metricsSource: options.metricsSource,
    });
  }

  describe("status", () => {
    it("should serve the status snapshot", async () => {
      const { app } = setup();

      for (const path of ["/", "/status"]) {
        const res = await app.request(path);
        expect(res.status).toBe(200);
        expect(await readBody(res)).toMatchObject({
          status: "ok",
          activeDownloads: 0,
          userCount: 0,
          fileCount: 0,
          memoryPercent: 50,
          disk: { totalGB: 100, usedGB: 90, freeGB: 10, percent: 90 },
        });
      }
    });

    it("should report errors as JSON", async () => {
      const { app } = setup({
        metricsSource: {
          ...fakeMetricsSource,
          memory: () => {
            throw new Error("meminfo unavailable");
          },
        },
      });

      const res = await app.request("/status");

      expect(res.status).toBe(500);
      expect(await readBody(res)).toEqual({ status: "error", error: "meminfo unavailable" });
    });

    it("should answer health checks", async () => {
      const { app } = setup();

      const res = await app.request("/health");

      expect(res.status).toBe(200);
      expect((await readBody(res)).status).toBe("ok");
    });

    it("should return JSON for unknown routes", async () => {
      const { app } = setup();

      const res = await app.request("/nope");

      expect(res.status).toBe(404);
      expect(await readBody(res)).toEqual({ error: "Not found" });
    });
  });

  describe("POST /api/jobs", () => {
    it("should accept a job and run it", async () => {
      const { app, jobs } = setup();

      const res = await app.request("/api/jobs", postJob({ userId: 1, url: "https://example.com/clip.mp4" }));

      expect(res.status).toBe(202);
      const body = await readBody(res);
      expect(body).toMatchObject({ ownerId: 1, url: "https://example.com/clip.mp4", state: "queued" });

      const job = await waitForJob(jobs, asString(body.id), isFinished);
      expect(job.state).toBe("completed");

      const detail = await app.request(`/api/jobs/${job.id}`);
      expect(detail.status).toBe(200);
      expect(await readBody(detail)).toMatchObject({ id: job.id, state: "completed", sizeBytes: 100 });
    });

    it("should reject malformed requests", async () => {
      const { app } = setup();

      const invalidJson = await app.request("/api/jobs", postJob(null, "{not json"));
      expect(invalidJson.status).toBe(400);
      expect(await readBody(invalidJson)).toEqual({ error: "Invalid JSON body" });

      const missingUrl = await app.request("/api/jobs", postJob({ userId: 1 }));
      expect(missingUrl.status).toBe(400);
      expect(await readBody(missingUrl)).toEqual({ error: "url is required" });
    });

    it("should return validation errors as 400", async () => {
      const { app } = setup();

      const res = await app.request("/api/jobs", postJob({ userId: 1, url: "https://malware.com/a.mp4" }));

      expect(res.status).toBe(400);
      expect(await readBody(res)).toEqual({
        error: { type: "validation_error", reason: "blocked-domain", message: "Blocked domain: malware.com" },
      });
    });

    it("should return quota denials as 429", async () => {
      const { app, jobs } = setup({ fetcher: controlledFetcher().fetcher, config: { maxGlobalConcurrent: 1 } });

      const first = await app.request("/api/jobs", postJob({ userId: 1, url: "https://example.com/a.mp4" }));
      const second = await app.request("/api/jobs", postJob({ userId: 2, url: "https://example.com/b.mp4" }));

      expect(first.status).toBe(202);
      expect(second.status).toBe(429);
      expect(await readBody(second)).toEqual({
        error: { type: "quota_denied", reason: "global-busy", message: "Server is busy, try again shortly" },
      });
      await jobs.shutdown(1000);
    });

    it("should return storage errors as 507", async () => {
      const { app } = setup({ config: { minFreeDiskBytes: 20 * GB } });

      const res = await app.request("/api/jobs", postJob({ userId: 1, url: "https://example.com/a.mp4" }));

      expect(res.status).toBe(507);
      expect(await readBody(res)).toEqual({
        error: { type: "storage_full", message: "Server is low on disk space, try again later" },
      });
    });

    it("should return 503 after shutdown", async () => {
      const { app, jobs } = setup();
      await jobs.shutdown(0);

      const res = await app.request("/api/jobs", postJob({ userId: 1, url: "https://example.com/a.mp4" }));

      expect(res.status).toBe(503);
    });
  });

  describe("job queries", () => {
    it("should list and filter jobs", async () => {
      const { app, jobs } = setup({ fetcher: controlledFetcher().fetcher });
      await jobs.submit(1, "https://example.com/a.mp4");
      await jobs.submit(2, "https://example.com/b.mp4");

      const all = await readBody(await app.request("/api/jobs"));
      expect(all.count).toBe(2);

      const mine = await readBody(await app.request("/api/jobs?userId=2"));
      expect(mine.count).toBe(1);

      const done = await readBody(await app.request("/api/jobs?state=completed,failed"));
      expect(done).toEqual({ items: [], count: 0 });

      await jobs.shutdown(1000);
    });

    it("should reject invalid filters", async () => {
      const { app } = setup();

      const badUser = await app.request("/api/jobs?userId=abc");
      expect(badUser.status).toBe(400);
      expect(await readBody(badUser)).toEqual({ error: "Invalid userId" });

      const badState = await app.request("/api/jobs?state=running");
      expect(badState.status).toBe(400);
      expect(await readBody(badState)).toEqual({ error: "Unknown state: running" });
    });

    it("should return 404 for unknown jobs", async () => {
      const { app } = setup();

      const get = await app.request("/api/jobs/missing");
      expect(get.status).toBe(404);
      expect(await readBody(get)).toEqual({ error: "Job not found" });

      const del = await app.request("/api/jobs/missing", { method: "DELETE" });
      expect(del.status).toBe(404);
    });

    it("should cancel a running job", async () => {
      const { app, jobs, quota } = setup({ fetcher: controlledFetcher().fetcher });
      const submitted = await jobs.submit(1, "https://example.com/a.mp4");
      if (!submitted.ok) throw new Error("expected submit to succeed");

      const res = await app.request(`/api/jobs/${submitted.job.id}`, { method: "DELETE" });

      expect(res.status).toBe(200);
      expect(await readBody(res)).toMatchObject({ success: true, job: { id: submitted.job.id, state: "cancelled" } });
      expect(quota.stats().globalActive).toBe(0);
    });
  });

  describe("messages and files", () => {
    async function completeJob(service: ReturnType<typeof setup>) {
      const submitted = await service.jobs.submit(1, "https://example.com/clip.mp4");
      if (!submitted.ok) throw new Error("expected submit to succeed");
      await waitForJob(service.jobs, submitted.job.id, isFinished);
      const fileMessage = service.hub.inbox(1).find((message) => message.type === "file");
      if (!fileMessage?.file) throw new Error("expected a file message");
      return fileMessage.file;
    }

    it("should return a user's messages", async () => {
      const service = setup();
      await completeJob(service);

      const res = await service.app.request("/api/users/1/messages");
      expect(res.status).toBe(200);
      const body = await readBody(res);
      const items = service.hub.inbox(1);
      expect(body.count).toBe(items.length);
      expect(items[0].text).toBe("Checking URL...");

      const later = await readBody(await service.app.request(`/api/users/1/messages?since=${items[0].id}`));
      expect(later.count).toBe(items.length - 1);

      const other = await readBody(await service.app.request("/api/users/2/messages"));
      expect(other).toEqual({ items: [], count: 0 });
    });

    it("should reject invalid user ids", async () => {
      const { app } = setup();

      const res = await app.request("/api/users/abc/messages");

      expect(res.status).toBe(400);
      expect(await readBody(res)).toEqual({ error: "Invalid user ID" });
    });

    it("should serve delivered files", async () => {
      const service = setup();
      const file = await completeJob(service);

      const res = await service.app.request(`/api/files/${file.token}`);

      expect(res.status).toBe(200);
      expect(res.headers.get("Content-Type")).toBe("video/mp4");
      expect(res.headers.get("Content-Length")).toBe("100");
      expect((await res.arrayBuffer()).byteLength).toBe(100);
    });

    it("should serve byte ranges", async () => {
      const service = setup();
      const file = await completeJob(service);

      const partial = await service.app.request(`/api/files/${file.token}`, { headers: { Range: "bytes=0-9" } });
      expect(partial.status).toBe(206);
      expect(partial.headers.get("Content-Range")).toBe("bytes 0-9/100");
      expect((await partial.arrayBuffer()).byteLength).toBe(10);

      const unsatisfiable = await service.app.request(`/api/files/${file.token}`, {
        headers: { Range: "bytes=500-" },
      });
      expect(unsatisfiable.status).toBe(416);
    });

    it("should return 404 for unknown links and deleted files", async () => {
      const service = setup();
      const file = await completeJob(service);

      const unknown = await service.app.request("/api/files/not-a-token");
      expect(unknown.status).toBe(404);
      expect(await readBody(unknown)).toEqual({ error: "Link not found or expired" });

      await service.files.forceCleanup();
      const gone = await service.app.request(`/api/files/${file.token}`);
      expect(gone.status).toBe(404);
      expect(await readBody(gone)).toEqual({ error: `File ${file.name} is no longer available` });
    });

    it("should stream notifications as server-sent events", async () => {
      const { app, hub } = setup();
      await hub.notify(1, "queued earlier");

      const res = await app.request("/api/users/1/events?since=0");
      expect(res.status).toBe(200);
      expect(res.headers.get("Content-Type")).toBe("text/event-stream");
      if (!res.body) throw new Error("expected a body");
      const reader = res.body.getReader();
      const decoder = new TextDecoder();

      async function readEvent(): Promise<string> {
        let text = "";
        while (!text.endsWith("\n\n")) {
          const { value, done } = await reader.read();
          if (done) break;
          text += decoder.decode(value, { stream: true });
        }
        return text;
      }

      const backlog = await readEvent();
      expect(backlog).toContain("event: text\n");
      expect(backlog).toContain("id: 1\n");
      expect(backlog).toContain('"text":"queued earlier"');

      await hub.notify(1, "live update");
      const live = await readEvent();
      expect(live).toContain("id: 2\n");
      expect(live).toContain('"text":"live update"');

      hub.closeAll();
      await reader.cancel();
    });
  });

  describe("admin", () => {
    it("should require an admin when auth is enabled", async () => {
      const { app } = setup({ config: { authEnabled: true, adminUsers: [9] } });

      const anonymous = await app.request("/api/admin/stats");
      expect(anonymous.status).toBe(403);
      expect(await readBody(anonymous)).toEqual({ error: "Admin access required" });

      const user = await app.request("/api/admin/stats", { headers: { "X-User-Id": "1" } });
      expect(user.status).toBe(403);

      const admin = await app.request("/api/admin/stats", { headers: { "X-User-Id": "9" } });
      expect(admin.status).toBe(200);
    });

    it("should report stats", async () => {
      const { app } = setup();

      const res = await app.request("/api/admin/stats");

      expect(res.status).toBe(200);
      expect(await readBody(res)).toMatchObject({
        quota: { globalActive: 0, maxGlobalConcurrent: 3, userCount: 0 },
        storage: { totalBytes: 0, fileCount: 0 },
        activeJobs: 0,
        subscribers: 0,
        sweeper: { isRunning: false, runsCompleted: 0 },
      });
    });

    it("should delete every stored file on cleanup", async () => {
      const { app, jobs, files } = setup();
      const submitted = await jobs.submit(1, "https://example.com/clip.mp4");
      if (!submitted.ok) throw new Error("expected submit to succeed");
      await waitForJob(jobs, submitted.job.id, isFinished);

      const res = await app.request("/api/admin/cleanup", { method: "POST" });

      expect(await readBody(res)).toEqual({ removed: 1 });
      expect(files.list()).toEqual([]);
    });

    it("should run a sweep on demand", async () => {
      const { app } = setup();

      const res = await app.request("/api/admin/sweep", { method: "POST" });

      expect(res.status).toBe(200);
      expect(await readBody(res)).toMatchObject({ ok: true, skipped: false, filesDeleted: 0 });
    });
  });
});
