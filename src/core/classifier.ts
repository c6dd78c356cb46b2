import fs from "fs";
import path from "path";
import { clamp01, round2 } from "../utils/mask";

export const SCAM_CATEGORIES = [
  "bank_fraud",
  "upi_fraud",
  "phishing",
  "investment_scam",
  "lottery_scam"
] as const;

export type DetectedCategory = (typeof SCAM_CATEGORIES)[number];

export type ScamCategory = DetectedCategory | "unknown";

export type ClassificationVerdict = {
  category: ScamCategory;
  confidence: number;
  urgent: boolean;
  urgencyLevel: number;
  signals: string[];
};

export type DetectionPolicy = {
  minConfidence: number;
  assumeScam: boolean;
};

export const DEFAULT_DETECTION_POLICY: DetectionPolicy = {
  minConfidence: 0.15,
  assumeScam: true
};

type WeightedSignal = { signal: string; weight: number };

export type SignalTable = {
  saturation: number;
  tieEpsilon: number;
  categories: Record<DetectedCategory, WeightedSignal[]>;
  urgency: string[];
};

type CompiledSignal = { label: string; weight: number; pattern: RegExp };

export type CompiledTable = {
  saturation: number;
  tieEpsilon: number;
  categories: Array<{ category: DetectedCategory; signals: CompiledSignal[] }>;
  urgency: CompiledSignal[];
};

const DEFAULT_TABLE_PATH = path.join(__dirname, "../../data/signals.json");
const MAX_URGENCY_LEVEL = 5;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isWeightedSignal(value: unknown): value is WeightedSignal {
  return (
    isRecord(value) &&
    typeof value.signal === "string" &&
    value.signal.trim().length > 0 &&
    typeof value.weight === "number" &&
    value.weight > 0
  );
}

export function parseSignalTable(raw: unknown): SignalTable {
  if (!isRecord(raw)) throw new Error("signal table must be an object");
  const { saturation, tieEpsilon, categories, urgency } = raw;
  if (typeof saturation !== "number" || saturation <= 0) {
    throw new Error("signal table: saturation must be a positive number");
  }
  if (typeof tieEpsilon !== "number" || tieEpsilon < 0) {
    throw new Error("signal table: tieEpsilon must be a non-negative number");
  }
  if (!isRecord(categories)) throw new Error("signal table: categories must be an object");
  if (!Array.isArray(urgency) || !urgency.every((u) => typeof u === "string")) {
    throw new Error("signal table: urgency must be a list of strings");
  }

  const readCategory = (category: DetectedCategory): WeightedSignal[] => {
    const signals: unknown = categories[category];
    if (!Array.isArray(signals) || signals.length === 0 || !signals.every(isWeightedSignal)) {
      throw new Error(`signal table: category ${category} needs a non-empty list of {signal, weight}`);
    }
    return signals;
  };

  return {
    saturation,
    tieEpsilon,
    categories: {
      bank_fraud: readCategory("bank_fraud"),
      upi_fraud: readCategory("upi_fraud"),
      phishing: readCategory("phishing"),
      investment_scam: readCategory("investment_scam"),
      lottery_scam: readCategory("lottery_scam")
    },
    urgency
  };
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function compileSignal(signal: string, weight: number): CompiledSignal {
  const trimmed = signal.trim().toLowerCase();
  const prefix = trimmed.endsWith("*");
  const label = prefix ? trimmed.slice(0, -1) : trimmed;
  const tail = prefix ? "" : "(?![a-z0-9])";
  return { label, weight, pattern: new RegExp(`(?<![a-z0-9])${escapeRegex(label)}${tail}`) };
}

export function compileSignalTable(table: SignalTable): CompiledTable {
  return {
    saturation: table.saturation,
    tieEpsilon: table.tieEpsilon,
    categories: SCAM_CATEGORIES.map((category) => ({
      category,
      signals: table.categories[category].map((s) => compileSignal(s.signal, s.weight))
    })),
    urgency: table.urgency.map((u) => compileSignal(u, 1))
  };
}

let defaultTable: CompiledTable | null = null;

export function loadSignalTable(filePath: string = DEFAULT_TABLE_PATH): CompiledTable {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  return compileSignalTable(parseSignalTable(raw));
}

function getDefaultTable(): CompiledTable {
  if (!defaultTable) defaultTable = loadSignalTable();
  return defaultTable;
}

export function normalizeText(text: string): string {
  return text.toLowerCase().replace(/\s+/g, " ").trim();
}

type CategoryScore = {
  category: DetectedCategory;
  score: number;
  firstIndex: number;
  order: number;
  matched: Array<{ label: string; index: number }>;
};

function scoreCategory(
  text: string,
  category: DetectedCategory,
  signals: CompiledSignal[],
  order: number
): CategoryScore {
  let score = 0;
  const matched: Array<{ label: string; index: number }> = [];
  for (const signal of signals) {
    const hit = signal.pattern.exec(text);
    if (!hit) continue;
    score += signal.weight;
    matched.push({ label: signal.label, index: hit.index });
  }
  matched.sort((a, b) => a.index - b.index);
  const firstIndex = matched.length > 0 ? matched[0].index : Number.POSITIVE_INFINITY;
  return { category, score, firstIndex, order, matched };
}

function pickWinner(scores: CategoryScore[], tieEpsilon: number): CategoryScore | null {
  const best = Math.max(...scores.map((s) => s.score));
  if (best <= 0) return null;
  const contenders = scores.filter((s) => best - s.score <= tieEpsilon);
  contenders.sort((a, b) => a.firstIndex - b.firstIndex || a.order - b.order);
  return contenders[0];
}

export function classify(text: string, table: CompiledTable = getDefaultTable()): ClassificationVerdict {
  const normalized = normalizeText(typeof text === "string" ? text : "");
  const urgencyHits = table.urgency.filter((u) => u.pattern.test(normalized)).length;
  const urgent = urgencyHits > 0;
  const urgencyLevel = Math.min(urgencyHits, MAX_URGENCY_LEVEL);

  const scores = table.categories.map((entry, order) =>
    scoreCategory(normalized, entry.category, entry.signals, order)
  );
  const winner = pickWinner(scores, table.tieEpsilon);
  if (!winner) {
    return { category: "unknown", confidence: 0, urgent, urgencyLevel, signals: [] };
  }

  return {
    category: winner.category,
    confidence: round2(clamp01(winner.score / table.saturation)),
    urgent,
    urgencyLevel,
    signals: winner.matched.map((m) => m.label)
  };
}

export function applyDetectionPolicy(
  verdict: ClassificationVerdict,
  policy: DetectionPolicy = DEFAULT_DETECTION_POLICY
): { verdict: ClassificationVerdict; scamDetected: boolean } {
  const belowFloor = verdict.confidence < policy.minConfidence;
  return {
    verdict: belowFloor ? { ...verdict, category: "unknown" } : verdict,
    scamDetected: policy.assumeScam || !belowFloor
  };
}
