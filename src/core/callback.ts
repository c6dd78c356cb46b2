import axios from "axios";
import type { IntelligenceBundle } from "./extractor";
import type { ScamCategory } from "./classifier";
import type { EngagementMetrics, HoneypotResult } from "./honeypot";
import { safeError, safeLog } from "../utils/logging";

export type FinalReport = {
  sessionId: string;
  scamDetected: boolean;
  scamType: ScamCategory;
  totalMessagesExchanged: number;
  extractedIntelligence: IntelligenceBundle;
  engagementMetrics: EngagementMetrics;
  agentNotes: string;
};

export type ReportOptions = {
  attempts?: number;
  timeoutMs?: number;
};

export type ReportOutcome = {
  ok: boolean;
  attempts: number;
  status?: number;
};

export function buildFinalReport(result: HoneypotResult): FinalReport {
  return {
    sessionId: result.sessionId,
    scamDetected: result.scamDetected,
    scamType: result.scamType,
    totalMessagesExchanged: result.engagementMetrics.totalMessagesExchanged,
    extractedIntelligence: result.extractedIntelligence,
    engagementMetrics: result.engagementMetrics,
    agentNotes: result.agentNotes
  };
}

export function shouldSendReport(result: HoneypotResult, afterTurns: number): boolean {
  return result.strategy !== "fallback" && result.engagementMetrics.totalMessagesExchanged === afterTurns;
}

export async function sendFinalReport(
  url: string,
  payload: FinalReport,
  options: ReportOptions = {}
): Promise<ReportOutcome> {
  const attempts = Math.max(1, options.attempts ?? 3);
  const timeout = options.timeoutMs ?? 5000;
  let lastStatus: number | undefined;

  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      const response = await axios.post(url, payload, { timeout });
      safeLog("CALLBACK", `status=${response.status} attempt=${attempt}`, payload.sessionId);
      return { ok: true, attempts: attempt, status: response.status };
    } catch (err) {
      lastStatus = axios.isAxiosError(err) ? err.response?.status : undefined;
      safeError("CALLBACK", err, payload.sessionId);
    }
  }

  return { ok: false, attempts, status: lastStatus };
}
