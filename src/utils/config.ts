import type { DetectionPolicy } from "../core/classifier";
import type { ProbeWindow } from "../core/planner";

export type AppConfig = {
  port: number;
  apiKey: string;
  sessionTtlMs: number;
  detection: DetectionPolicy;
  probeWindow: ProbeWindow;
  reportCallbackUrl: string;
  reportAfterTurns: number;
};

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (["1", "true", "yes", "on"].includes(raw)) return true;
  if (["0", "false", "no", "off"].includes(raw)) return false;
  return fallback;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const ttlMinutes = Math.max(0, readNumber(env, "SESSION_TTL_MINUTES", 60));
  const probeStart = Math.max(1, Math.floor(readNumber(env, "PROBE_WINDOW_START", 2)));
  const probeEnd = Math.max(probeStart, Math.floor(readNumber(env, "PROBE_WINDOW_END", 8)));

  return {
    port: readNumber(env, "PORT", 3000),
    apiKey: env.API_KEY?.trim() || "",
    sessionTtlMs: ttlMinutes * 60 * 1000,
    detection: {
      minConfidence: readNumber(env, "SCAM_MIN_CONFIDENCE", 0.15),
      assumeScam: readBoolean(env, "ASSUME_SCAM", true)
    },
    probeWindow: { start: probeStart, end: probeEnd },
    reportCallbackUrl: env.REPORT_CALLBACK_URL?.trim() || "",
    reportAfterTurns: Math.max(1, Math.floor(readNumber(env, "REPORT_AFTER_TURNS", 10)))
  };
}
