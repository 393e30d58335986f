/**
 * Main HTTP server for the download service.
 *
 * Routes:
 * - / and /status - Status snapshot
 * - /health       - Liveness check
 * - /api/*        - REST API (jobs, user messages, files, admin)
 */

import { Hono, type Context } from "hono";
import { cors } from "hono/cors";
import { logger } from "hono/logger";

import type { StatusReporter } from "../services/status-reporter.ts";
import { createApiRouter, type ApiDependencies } from "./api.ts";

// ============================================================================
// Types
// ============================================================================

/**
 * Server dependencies.
 */
export interface ServerDependencies extends ApiDependencies {
  status: StatusReporter;
  /** Disable request logging (tests) */
  quiet?: boolean;
}

// ============================================================================
// Server Factory
// ============================================================================

/**
 * Create the HTTP app.
 */
export function createServer(deps: ServerDependencies) {
  const app = new Hono();

  // Middleware
  if (!deps.quiet) {
    app.use("*", logger());
  }
  app.use("*", cors({
    origin: "*",
    allowMethods: ["GET", "POST", "DELETE", "OPTIONS"],
    allowHeaders: ["Content-Type", "Range", "X-User-Id"],
    exposeHeaders: ["Content-Range", "Content-Length", "Accept-Ranges"],
  }));

  // ==========================================================================
  // Status
  // ==========================================================================

  async function handleStatus(c: Context) {
    try {
      return c.json(await deps.status.snapshot());
    } catch (error) {
      console.error("[status] Failed to build status snapshot:", error);
      return c.json({ status: "error", error: error instanceof Error ? error.message : String(error) }, 500);
    }
  }

  app.get("/", handleStatus);
  app.get("/status", handleStatus);

  app.get("/health", (c) => {
    return c.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  // ==========================================================================
  // API Routes
  // ==========================================================================

  app.route("/api", createApiRouter(deps));

  app.notFound((c) => c.json({ error: "Not found" }, 404));

  app.onError((error, c) => {
    console.error(`[server] Unhandled error on ${c.req.method} ${c.req.path}:`, error);
    return c.json({ error: "Internal server error" }, 500);
  });

  return { app };
}

export type Server = ReturnType<typeof createServer>;
