/**
 * Configuration types and parsing for the media fetch bot.
 * All functions except loadConfigFromEnv are pure and easily testable.
 */

export interface Config {
  downloadDir: string;
  port: number;
  publicBaseUrl: string;

  // Limits
  maxGlobalConcurrent: number;
  maxUserConcurrent: number;
  maxUserDaily: number;
  maxFileSizeBytes: number;
  maxDeliveryBytes: number;
  maxStorageBytes: number; // 0 = unlimited
  minFreeDiskBytes: number;
  downloadRateLimit: number; // bytes per second, 0 = unlimited

  // Timing (milliseconds)
  fileRetentionMs: number;
  sweepIntervalMs: number;
  jobRetentionMs: number;
  stallTimeoutMs: number;
  downloadTimeoutMs: number;
  shutdownGraceMs: number;
  duplicateCooldownMs: number;
  progressIntervalMs: number;

  // Access control
  authEnabled: boolean;
  allowedUsers: number[];
  adminUsers: number[];
  blockedDomains: string[];
}

export interface ConfigInput {
  DOWNLOAD_DIR?: string;
  PORT?: string;
  PUBLIC_BASE_URL?: string;
  MAX_CONCURRENT_DOWNLOADS?: string;
  MAX_USER_CONCURRENT?: string;
  MAX_DOWNLOADS_PER_USER?: string;
  MAX_FILE_SIZE?: string;
  MAX_DELIVERY_SIZE?: string;
  MAX_STORAGE_BYTES?: string;
  MIN_FREE_DISK_MB?: string;
  DOWNLOAD_RATE_LIMIT?: string;
  FILE_RETENTION_HOURS?: string;
  SWEEP_INTERVAL_MINUTES?: string;
  JOB_RETENTION_MINUTES?: string;
  STALL_TIMEOUT_SECONDS?: string;
  DOWNLOAD_TIMEOUT?: string;
  SHUTDOWN_GRACE_SECONDS?: string;
  DUPLICATE_COOLDOWN_SECONDS?: string;
  PROGRESS_UPDATE_INTERVAL_SECONDS?: string;
  AUTH_ENABLED?: string;
  ALLOWED_USERS?: string;
  ADMIN_USERS?: string;
  BLOCKED_DOMAINS?: string;
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export type ConfigResult =
  | { ok: true; config: Config }
  | { ok: false; errors: ConfigError[] };

export const DEFAULT_BLOCKED_DOMAINS = ["malware.com", "phishing.com", "virus.com"];

const GIB = 1024 * 1024 * 1024;
const MIB = 1024 * 1024;

// Largest delay setTimeout accepts; longer ones fire immediately
const MAX_TIMER_MS = 2 ** 31 - 1;
const MAX_TIMER_SECONDS = Math.floor(MAX_TIMER_MS / 1000);
const MAX_TIMER_MINUTES = Math.floor(MAX_TIMER_MS / 60_000);

/**
 * Parse and validate configuration from environment variables.
 * Pure function - no I/O, only transforms input to output.
 */
export function parseConfig(input: ConfigInput): ConfigResult {
  const errors: ConfigError[] = [];

  const downloadDir = input.DOWNLOAD_DIR?.trim() || "./downloads";

  const port = collect(parsePort(input.PORT), errors, 0);

  const maxGlobalConcurrent = collect(
    parsePositiveInt(input.MAX_CONCURRENT_DOWNLOADS, "MAX_CONCURRENT_DOWNLOADS", 3),
    errors,
    0,
  );
  const maxUserConcurrent = collect(
    parsePositiveInt(input.MAX_USER_CONCURRENT, "MAX_USER_CONCURRENT", 2),
    errors,
    0,
  );
  const maxUserDaily = collect(
    parsePositiveInt(input.MAX_DOWNLOADS_PER_USER, "MAX_DOWNLOADS_PER_USER", 10),
    errors,
    0,
  );
  const maxFileSizeBytes = collect(
    parsePositiveInt(input.MAX_FILE_SIZE, "MAX_FILE_SIZE", Math.floor(1.8 * GIB)),
    errors,
    0,
  );
  const maxDeliveryBytes = collect(
    parsePositiveInt(input.MAX_DELIVERY_SIZE, "MAX_DELIVERY_SIZE", 2 * GIB),
    errors,
    0,
  );
  const maxStorageBytes = collect(
    parseNonNegativeInt(input.MAX_STORAGE_BYTES, "MAX_STORAGE_BYTES", 0),
    errors,
    0,
  );
  const minFreeDiskMb = collect(
    parseNonNegativeInt(input.MIN_FREE_DISK_MB, "MIN_FREE_DISK_MB", 1024),
    errors,
    0,
  );
  const downloadRateLimit = collect(
    parseNonNegativeInt(input.DOWNLOAD_RATE_LIMIT, "DOWNLOAD_RATE_LIMIT", 0),
    errors,
    0,
  );
  const fileRetentionHours = collect(
    parsePositiveInt(input.FILE_RETENTION_HOURS, "FILE_RETENTION_HOURS", 24),
    errors,
    0,
  );
  const sweepIntervalMinutes = collect(
    parsePositiveInt(input.SWEEP_INTERVAL_MINUTES, "SWEEP_INTERVAL_MINUTES", 5, MAX_TIMER_MINUTES),
    errors,
    0,
  );
  const jobRetentionMinutes = collect(
    parsePositiveInt(input.JOB_RETENTION_MINUTES, "JOB_RETENTION_MINUTES", 60),
    errors,
    0,
  );
  const stallTimeoutSeconds = collect(
    parsePositiveInt(input.STALL_TIMEOUT_SECONDS, "STALL_TIMEOUT_SECONDS", 120, MAX_TIMER_SECONDS),
    errors,
    0,
  );
  const downloadTimeoutSeconds = collect(
    parsePositiveInt(input.DOWNLOAD_TIMEOUT, "DOWNLOAD_TIMEOUT", 3600, MAX_TIMER_SECONDS),
    errors,
    0,
  );
  const shutdownGraceSeconds = collect(
    parseNonNegativeInt(input.SHUTDOWN_GRACE_SECONDS, "SHUTDOWN_GRACE_SECONDS", 30, MAX_TIMER_SECONDS),
    errors,
    0,
  );
  const duplicateCooldownSeconds = collect(
    parseNonNegativeInt(input.DUPLICATE_COOLDOWN_SECONDS, "DUPLICATE_COOLDOWN_SECONDS", 30),
    errors,
    0,
  );
  const progressIntervalSeconds = collect(
    parseNonNegativeInt(
      input.PROGRESS_UPDATE_INTERVAL_SECONDS,
      "PROGRESS_UPDATE_INTERVAL_SECONDS",
      3,
    ),
    errors,
    0,
  );

  const authEnabled = collect(parseBoolean(input.AUTH_ENABLED, "AUTH_ENABLED", false), errors, false);
  const allowedUsers = collect(parseUserList(input.ALLOWED_USERS, "ALLOWED_USERS"), errors, []);
  const adminUsers = collect(parseUserList(input.ADMIN_USERS, "ADMIN_USERS"), errors, []);

  const blockedDomains = input.BLOCKED_DOMAINS !== undefined
    ? splitList(input.BLOCKED_DOMAINS).map((d) => d.toLowerCase())
    : DEFAULT_BLOCKED_DOMAINS;

  const publicBaseUrlInput = input.PUBLIC_BASE_URL?.trim();
  if (publicBaseUrlInput && !isValidUrl(publicBaseUrlInput)) {
    errors.push(
      new ConfigError(
        `PUBLIC_BASE_URL must be a valid URL, got: ${publicBaseUrlInput}`,
        "PUBLIC_BASE_URL",
      ),
    );
  }
  const publicBaseUrl = normalizeUrl(publicBaseUrlInput || `http://localhost:${port}`);

  if (errors.length > 0) {
    return { ok: false, errors };
  }

  return {
    ok: true,
    config: {
      downloadDir,
      port,
      publicBaseUrl,
      maxGlobalConcurrent,
      maxUserConcurrent,
      maxUserDaily,
      maxFileSizeBytes,
      maxDeliveryBytes,
      maxStorageBytes,
      minFreeDiskBytes: minFreeDiskMb * MIB,
      downloadRateLimit,
      fileRetentionMs: fileRetentionHours * 60 * 60 * 1000,
      sweepIntervalMs: sweepIntervalMinutes * 60 * 1000,
      jobRetentionMs: jobRetentionMinutes * 60 * 1000,
      stallTimeoutMs: stallTimeoutSeconds * 1000,
      downloadTimeoutMs: downloadTimeoutSeconds * 1000,
      shutdownGraceMs: shutdownGraceSeconds * 1000,
      duplicateCooldownMs: duplicateCooldownSeconds * 1000,
      progressIntervalMs: progressIntervalSeconds * 1000,
      authEnabled,
      allowedUsers,
      adminUsers,
      blockedDomains,
    },
  };
}

/**
 * Load config from process.env (convenience wrapper).
 * This is the only impure function - it reads from environment.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigResult {
  return parseConfig({
    DOWNLOAD_DIR: env.DOWNLOAD_DIR,
    PORT: env.PORT ?? env.STATUS_PORT,
    PUBLIC_BASE_URL: env.PUBLIC_BASE_URL,
    MAX_CONCURRENT_DOWNLOADS: env.MAX_CONCURRENT_DOWNLOADS,
    MAX_USER_CONCURRENT: env.MAX_USER_CONCURRENT,
    MAX_DOWNLOADS_PER_USER: env.MAX_DOWNLOADS_PER_USER,
    MAX_FILE_SIZE: env.MAX_FILE_SIZE,
    MAX_DELIVERY_SIZE: env.MAX_DELIVERY_SIZE,
    MAX_STORAGE_BYTES: env.MAX_STORAGE_BYTES,
    MIN_FREE_DISK_MB: env.MIN_FREE_DISK_MB,
    DOWNLOAD_RATE_LIMIT: env.DOWNLOAD_RATE_LIMIT,
    FILE_RETENTION_HOURS: env.FILE_RETENTION_HOURS,
    SWEEP_INTERVAL_MINUTES: env.SWEEP_INTERVAL_MINUTES,
    JOB_RETENTION_MINUTES: env.JOB_RETENTION_MINUTES,
    STALL_TIMEOUT_SECONDS: env.STALL_TIMEOUT_SECONDS,
    DOWNLOAD_TIMEOUT: env.DOWNLOAD_TIMEOUT,
    SHUTDOWN_GRACE_SECONDS: env.SHUTDOWN_GRACE_SECONDS,
    DUPLICATE_COOLDOWN_SECONDS: env.DUPLICATE_COOLDOWN_SECONDS,
    PROGRESS_UPDATE_INTERVAL_SECONDS: env.PROGRESS_UPDATE_INTERVAL_SECONDS,
    AUTH_ENABLED: env.AUTH_ENABLED,
    ALLOWED_USERS: env.ALLOWED_USERS,
    ADMIN_USERS: env.ADMIN_USERS,
    BLOCKED_DOMAINS: env.BLOCKED_DOMAINS,
  });
}

// Helper functions (pure)

type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ConfigError };

function collect<T>(result: ParseResult<T>, errors: ConfigError[], fallback: T): T {
  if (result.ok) return result.value;
  errors.push(result.error);
  return fallback;
}

function parsePort(value: string | undefined): ParseResult<number> {
  if (!value || value.trim() === "") {
    return { ok: true, value: 8080 };
  }

  const num = parseInt(value.trim(), 10);
  if (isNaN(num) || num < 1 || num > 65535) {
    return {
      ok: false,
      error: new ConfigError(
        `PORT must be a valid port number (1-65535), got: ${value}`,
        "PORT",
      ),
    };
  }

  return { ok: true, value: num };
}

function parseNonNegativeInt(
  value: string | undefined,
  field: string,
  defaultValue: number,
  max = Number.MAX_SAFE_INTEGER,
): ParseResult<number> {
  if (!value || value.trim() === "") {
    return { ok: true, value: defaultValue };
  }

  const num = parseInt(value.trim(), 10);
  if (isNaN(num) || num < 0) {
    return {
      ok: false,
      error: new ConfigError(
        `${field} must be a non-negative integer, got: ${value}`,
        field,
      ),
    };
  }
  if (num > max) {
    return {
      ok: false,
      error: new ConfigError(`${field} must be at most ${max}, got: ${value}`, field),
    };
  }

  return { ok: true, value: num };
}

function parsePositiveInt(
  value: string | undefined,
  field: string,
  defaultValue: number,
  max = Number.MAX_SAFE_INTEGER,
): ParseResult<number> {
  if (!value || value.trim() === "") {
    return { ok: true, value: defaultValue };
  }

  const num = parseInt(value.trim(), 10);
  if (isNaN(num) || num < 1) {
    return {
      ok: false,
      error: new ConfigError(
        `${field} must be a positive integer, got: ${value}`,
        field,
      ),
    };
  }
  if (num > max) {
    return {
      ok: false,
      error: new ConfigError(`${field} must be at most ${max}, got: ${value}`, field),
    };
  }

  return { ok: true, value: num };
}

function parseBoolean(
  value: string | undefined,
  field: string,
  defaultValue: boolean,
): ParseResult<boolean> {
  if (!value || value.trim() === "") {
    return { ok: true, value: defaultValue };
  }

  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") return { ok: true, value: true };
  if (normalized === "false" || normalized === "0") return { ok: true, value: false };

  return {
    ok: false,
    error: new ConfigError(`${field} must be true or false, got: ${value}`, field),
  };
}

function parseUserList(value: string | undefined, field: string): ParseResult<number[]> {
  if (!value) {
    return { ok: true, value: [] };
  }

  const ids: number[] = [];
  for (const part of splitList(value)) {
    if (!/^\d+$/.test(part)) {
      return {
        ok: false,
        error: new ConfigError(
          `${field} must be a comma-separated list of numeric user IDs, got: ${value}`,
          field,
        ),
      };
    }
    ids.push(parseInt(part, 10));
  }

  return { ok: true, value: ids };
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

/**
 * Validate a URL string.
 */
export function isValidUrl(url: string): boolean {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
}

/**
 * Normalize URL by removing trailing slash.
 */
export function normalizeUrl(url: string): string {
  return url.replace(/\/+$/, "");
}
