/**
 * Notification hub.
 *
 * In-process Transport: keeps a bounded inbox per user, pushes every new
 * message to that user's live subscribers (SSE streams) and turns delivered
 * files into download links served by the HTTP layer.
 */

import { randomUUID } from "node:crypto";
import { stat } from "node:fs/promises";
import { basename } from "node:path";

import type { DeliverOptions, DeliveryResult, Transport } from "../services/job-types.ts";
import { formatBytes } from "../utils/format.ts";

// ============================================================================
// Types
// ============================================================================

export interface HubFile {
  token: string;
  name: string;
  sizeBytes: number;
  url: string;
}

export interface HubMessage {
  id: number;
  userId: number;
  type: "text" | "file";
  text: string;
  createdAt: string;
  file?: HubFile;
}

export interface HubSubscriber {
  send(message: HubMessage): void;
  close(): void;
}

export interface HubConfig {
  /** Largest file the hub will hand out */
  maxDeliveryBytes: number;
  /** Base URL used to build download links */
  publicBaseUrl: string;
  /** How long a download link stays valid */
  linkTtlMs: number;
  /** Messages kept per user */
  inboxSize?: number;
}

export interface HubDependencies {
  statFile?: (path: string) => Promise<{ size: number }>;
  now?: () => number;
}

interface DownloadLink {
  path: string;
  name: string;
  userId: number;
  expiresAt: number;
}

// ============================================================================
// Notification Hub
// ============================================================================

export function createNotificationHub(config: HubConfig, deps: HubDependencies = {}) {
  const statFile: (path: string) => Promise<{ size: number }> = deps.statFile ?? ((path) => stat(path));
  const now = deps.now ?? Date.now;
  const inboxSize = config.inboxSize ?? 50;

  const inboxes = new Map<number, HubMessage[]>();
  const subscribers = new Map<number, Set<HubSubscriber>>();
  const links = new Map<string, DownloadLink>();
  let nextMessageId = 1;

  function publish(userId: number, message: Omit<HubMessage, "id" | "userId" | "createdAt">): HubMessage {
    const full: HubMessage = {
      ...message,
      id: nextMessageId++,
      userId,
      createdAt: new Date(now()).toISOString(),
    };

    const inbox = inboxes.get(userId) ?? [];
    inbox.push(full);
    if (inbox.length > inboxSize) {
      inbox.splice(0, inbox.length - inboxSize);
    }
    inboxes.set(userId, inbox);

    for (const subscriber of subscribers.get(userId) ?? []) {
      try {
        subscriber.send(full);
      } catch (e) {
        console.error(`[hub] Failed to send to subscriber of user ${userId}:`, e);
        removeSubscriber(userId, subscriber);
      }
    }

    return full;
  }

  /**
   * Register a live subscriber. Returns the function that removes it.
   */
  function subscribe(userId: number, subscriber: HubSubscriber): () => void {
    const set = subscribers.get(userId) ?? new Set<HubSubscriber>();
    set.add(subscriber);
    subscribers.set(userId, set);
    console.log(`[hub] Subscriber connected for user ${userId}. Total subscribers: ${subscriberCount()}`);
    return () => removeSubscriber(userId, subscriber);
  }

  function removeSubscriber(userId: number, subscriber: HubSubscriber): void {
    const set = subscribers.get(userId);
    if (!set || !set.delete(subscriber)) return;
    if (set.size === 0) subscribers.delete(userId);
    console.log(`[hub] Subscriber disconnected for user ${userId}. Total subscribers: ${subscriberCount()}`);
  }

  function subscriberCount(): number {
    let count = 0;
    for (const set of subscribers.values()) count += set.size;
    return count;
  }

  function inbox(userId: number, since = 0): HubMessage[] {
    return (inboxes.get(userId) ?? []).filter((message) => message.id > since).map((message) => ({ ...message }));
  }

  async function notify(userId: number, message: string): Promise<void> {
    publish(userId, { type: "text", text: message });
  }

  async function deliver(userId: number, filePath: string, options: DeliverOptions): Promise<DeliveryResult> {
    if (options.signal.aborted) {
      return { ok: false, error: { kind: "send-failure", message: "Delivery cancelled" } };
    }

    let sizeBytes: number;
    try {
      sizeBytes = (await statFile(filePath)).size;
    } catch (e) {
      return {
        ok: false,
        error: { kind: "send-failure", message: `Cannot read file: ${e instanceof Error ? e.message : String(e)}` },
      };
    }

    if (sizeBytes > config.maxDeliveryBytes) {
      return {
        ok: false,
        error: {
          kind: "too-large-for-transport",
          message: `File too large to send: ${formatBytes(sizeBytes)} (maximum: ${formatBytes(config.maxDeliveryBytes)})`,
        },
      };
    }

    pruneLinks(now());
    const token = randomUUID();
    const name = basename(filePath);
    links.set(token, { path: filePath, name, userId, expiresAt: now() + config.linkTtlMs });

    publish(userId, {
      type: "file",
      text: options.caption,
      file: { token, name, sizeBytes, url: `${config.publicBaseUrl}/api/files/${token}` },
    });
    options.onProgress?.(sizeBytes, sizeBytes);

    return { ok: true };
  }

  /**
   * Look up a download link. Expired links are dropped.
   */
  function resolveLink(token: string): { path: string; name: string; userId: number } | null {
    const link = links.get(token);
    if (!link) return null;
    if (link.expiresAt <= now()) {
      links.delete(token);
      return null;
    }
    return { path: link.path, name: link.name, userId: link.userId };
  }

  function pruneLinks(at: number = now()): number {
    let pruned = 0;
    for (const [token, link] of links) {
      if (link.expiresAt <= at) {
        links.delete(token);
        pruned++;
      }
    }
    return pruned;
  }

  /**
   * Close every subscriber.
   */
  function closeAll(): void {
    for (const [userId, set] of subscribers) {
      for (const subscriber of set) {
        try {
          subscriber.close();
        } catch (e) {
          console.warn(`[hub] Failed to close subscriber of user ${userId}:`, e);
        }
      }
    }
    subscribers.clear();
  }

  const transport: Transport = { deliver, notify };

  return {
    transport,
    notify,
    deliver,
    subscribe,
    subscriberCount,
    inbox,
    resolveLink,
    closeAll,
  };
}

export type NotificationHub = ReturnType<typeof createNotificationHub>;
