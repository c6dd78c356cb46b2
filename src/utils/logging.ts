import type { IncomingHttpHeaders } from "http";
import { maskDigitRuns } from "./mask";

export type LogTag =
  | "INCOMING"
  | "SCAMMER"
  | "HONEYPOT"
  | "TURN"
  | "OUTGOING"
  | "CALLBACK"
  | "SESSIONS"
  | "ERROR";

const SECRET_HEADERS = new Set(["x-api-key", "authorization", "cookie"]);
const DEFAULT_MAX_LEN = 2000;

export function maskSecret(value: string | undefined, visible: number = 4): string {
  if (!value) return "missing";
  if (value.length <= visible) return "*".repeat(value.length);
  const hidden = value.length - visible;
  return "*".repeat(hidden) + value.slice(hidden);
}

export function sanitizeHeaders(headers: IncomingHttpHeaders): Record<string, string> {
  return Object.fromEntries(
    Object.entries(headers)
      .filter((entry): entry is [string, string | string[]] => entry[1] !== undefined)
      .map(([key, value]): [string, string] => {
        const name = key.toLowerCase();
        const flat = Array.isArray(value) ? value.join(",") : value;
        return [name, SECRET_HEADERS.has(name) ? maskSecret(flat) : flat];
      })
  );
}

export function formatPayload(value: unknown, maxLen: number = DEFAULT_MAX_LEN): string {
  let text: string;
  try {
    text = typeof value === "string" ? value : JSON.stringify(value) ?? String(value);
  } catch {
    text = "[unserializable]";
  }
  const masked = maskDigitRuns(text);
  return masked.length > maxLen ? `${masked.slice(0, maxLen)}...(truncated)` : masked;
}

function linePrefix(tag: LogTag, sessionId?: string): string {
  return sessionId ? `[${tag}] session=${sessionId}` : `[${tag}]`;
}

export function safeLog(tag: LogTag, message: string, sessionId?: string): void {
  try {
    console.info(`${linePrefix(tag, sessionId)} ${message}`);
  } catch {
    // logging must never break a turn
  }
}

export function safeError(tag: LogTag, err: unknown, sessionId?: string): void {
  const detail = err instanceof Error ? `${err.name}: ${err.message}` : formatPayload(err, 500);
  try {
    console.error(`${linePrefix(tag, sessionId)} ${maskDigitRuns(detail)}`);
  } catch {
    // logging must never break a turn
  }
}

export function logEvent(tag: LogTag, payload: unknown, sessionId?: string, maxLen?: number): void {
  safeLog(tag, formatPayload(payload, maxLen), sessionId);
}
