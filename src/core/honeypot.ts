import {
  INTEL_KINDS,
  emptyIntelligence,
  extractCumulative,
  mergeIntelligence
} from "./extractor";
import type { IntelligenceBundle, IntelligenceKind } from "./extractor";
import { applyDetectionPolicy, classify, compileSignalTable } from "./classifier";
import type {
  ClassificationVerdict,
  CompiledTable,
  DetectionPolicy,
  ScamCategory,
  SignalTable
} from "./classifier";
import { fallbackPlan, planReply } from "./planner";
import type { EngagementPlan, ProbeWindow, ReplyStrategy, ReplyTable } from "./planner";
import { emptyReferences, extractReferences } from "./references";
import type { ReferenceIds } from "./references";
import { unknownVerdict } from "./sessionStore";
import type { SessionRecord, SessionStore } from "./sessionStore";
import type { HoneypotRequest } from "../utils/types";

export type EngagementMetrics = {
  totalMessagesExchanged: number;
  engagementDurationSeconds: number;
};

export type HoneypotResult = {
  sessionId: string;
  scamDetected: boolean;
  scamType: ScamCategory;
  confidence: number;
  urgent: boolean;
  reply: string;
  extractedIntelligence: IntelligenceBundle;
  referenceIds: ReferenceIds;
  engagementMetrics: EngagementMetrics;
  missingIntelligence: IntelligenceKind[];
  strategy: ReplyStrategy;
  agentNotes: string;
};

export type HoneypotAgentOptions = {
  policy?: DetectionPolicy;
  probeWindow?: ProbeWindow;
  replies?: ReplyTable;
  signals?: SignalTable;
};

const PERSONA_SENDERS = new Set(["user", "honeypot", "agent", "assistant"]);

function isPersona(sender: string): boolean {
  return PERSONA_SENDERS.has(sender.trim().toLowerCase());
}

export function engagementMetrics(record: SessionRecord | undefined): EngagementMetrics {
  if (!record) return { totalMessagesExchanged: 0, engagementDurationSeconds: 0 };
  const elapsedMs = Date.parse(record.lastSeenAt) - Date.parse(record.firstSeenAt);
  return {
    totalMessagesExchanged: record.turn,
    engagementDurationSeconds: Math.max(0, Math.round(elapsedMs / 1000))
  };
}

function describeExtracted(bundle: IntelligenceBundle): string {
  const parts = INTEL_KINDS.filter((kind) => bundle[kind].length > 0).map(
    (kind) => `${kind}=${bundle[kind].length}`
  );
  return parts.length > 0 ? parts.join(", ") : "none";
}

export function buildAgentNotes(
  verdict: ClassificationVerdict,
  record: SessionRecord,
  plan: EngagementPlan
): string {
  const strategy = plan.probedKind ? `${plan.strategy}(${plan.probedKind})` : plan.strategy;
  const parts = [
    `Scam type: ${verdict.category} (confidence ${verdict.confidence.toFixed(2)})`,
    `Urgency: ${verdict.urgent ? `yes (level ${verdict.urgencyLevel})` : "no"}`,
    `Messages: ${record.turn}`,
    `Extracted: ${describeExtracted(record.intelligence)}`,
    `Missing: ${plan.missing.length > 0 ? plan.missing.join(", ") : "none"}`
  ];
  if (verdict.signals.length > 0) parts.push(`Signals: ${verdict.signals.slice(0, 5).join(", ")}`);
  parts.push(`Strategy: ${strategy}`);
  return parts.join(". ");
}

export class HoneypotAgent {
  private signals: CompiledTable | undefined;

  constructor(
    private store: SessionStore,
    private options: HoneypotAgentOptions = {}
  ) {
    this.signals = options.signals ? compileSignalTable(options.signals) : undefined;
  }

  async handle(input: HoneypotRequest): Promise<HoneypotResult> {
    const text = typeof input.message?.text === "string" ? input.message.text.trim() : "";
    if (!text) return this.fallback(input.sessionId);

    const history = Array.isArray(input.conversationHistory) ? input.conversationHistory : [];
    const historyTexts = history.map((m) => m.text).filter((t) => typeof t === "string" && t.length > 0);
    const counterpartyTexts = history.filter((m) => !isPersona(m.sender)).map((m) => m.text);

    const bundle = extractCumulative(text, historyTexts);
    const references = extractReferences([...historyTexts, text].join("\n"));
    const { verdict, scamDetected } = applyDetectionPolicy(
      classify([...counterpartyTexts, text].join("\n"), this.signals),
      this.options.policy
    );

    return this.store.transact(input.sessionId, (record, commit) => {
      const plan = planReply(
        {
          turn: record.turn,
          category: verdict.category,
          intelligence: mergeIntelligence(record.intelligence, bundle),
          probeWindow: this.options.probeWindow
        },
        this.options.replies
      );
      const updated = commit({ intelligence: bundle, verdict, references });
      return {
        sessionId: updated.sessionId,
        scamDetected,
        scamType: verdict.category,
        confidence: verdict.confidence,
        urgent: verdict.urgent,
        reply: plan.reply,
        extractedIntelligence: updated.intelligence,
        referenceIds: updated.references,
        engagementMetrics: engagementMetrics(updated),
        missingIntelligence: plan.missing,
        strategy: plan.strategy,
        agentNotes: buildAgentNotes(verdict, updated, plan)
      };
    });
  }

  fallback(sessionId: string): HoneypotResult {
    const record = sessionId ? this.store.get(sessionId) : undefined;
    const plan = fallbackPlan(record?.turn ?? 0, this.options.replies);
    const { scamDetected } = applyDetectionPolicy(unknownVerdict(), this.options.policy);
    return {
      sessionId,
      scamDetected,
      scamType: "unknown",
      confidence: 0,
      urgent: false,
      reply: plan.reply,
      extractedIntelligence: emptyIntelligence(),
      referenceIds: emptyReferences(),
      engagementMetrics: engagementMetrics(record),
      missingIntelligence: plan.missing,
      strategy: plan.strategy,
      agentNotes: "No message text received. Strategy: fallback"
    };
  }
}
