import type { HoneypotResult } from "../core/honeypot";
import type { ConversationMessage, HoneypotRequest, MessageMetadata } from "./types";

export type HoneypotResponse = { status: "success" } & HoneypotResult;

export type ErrorResponse = { status: "error"; error: string };

export type ParsedRequest = { ok: true; request: HoneypotRequest } | { ok: false; error: string };

const DEFAULT_SENDER = "scammer";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function readMessage(value: unknown, fallbackText: unknown): ConversationMessage {
  if (typeof value === "string") return { sender: DEFAULT_SENDER, text: value };
  if (!isRecord(value)) {
    return { sender: DEFAULT_SENDER, text: typeof fallbackText === "string" ? fallbackText : "" };
  }
  const sender = optionalString(value.sender)?.trim();
  return {
    sender: sender || DEFAULT_SENDER,
    text: optionalString(value.text) ?? "",
    timestamp: optionalString(value.timestamp)
  };
}

function readHistory(value: unknown): ConversationMessage[] {
  if (!Array.isArray(value)) return [];
  const history: ConversationMessage[] = [];
  for (const entry of value) {
    if (!isRecord(entry) || typeof entry.text !== "string") continue;
    history.push(readMessage(entry, ""));
  }
  return history;
}

function readMetadata(value: unknown): MessageMetadata | undefined {
  if (!isRecord(value)) return undefined;
  return {
    channel: optionalString(value.channel),
    language: optionalString(value.language),
    locale: optionalString(value.locale)
  };
}

export function parseHoneypotRequest(body: unknown): ParsedRequest {
  if (!isRecord(body)) return { ok: false, error: "request body must be a JSON object" };
  const sessionId = typeof body.sessionId === "string" ? body.sessionId.trim() : "";
  if (!sessionId) return { ok: false, error: "sessionId is required" };

  return {
    ok: true,
    request: {
      sessionId,
      message: readMessage(body.message, body.text),
      conversationHistory: readHistory(body.conversationHistory),
      metadata: readMetadata(body.metadata)
    }
  };
}

export function toResponseBody(result: HoneypotResult): HoneypotResponse {
  return { status: "success", ...result };
}

export function errorBody(error: string): ErrorResponse {
  return { status: "error", error };
}
