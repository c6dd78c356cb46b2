import fs from "fs";
import path from "path";
import { emptyIntelligence, missingKinds } from "./extractor";
import type { IntelligenceBundle, IntelligenceKind } from "./extractor";
import type { ScamCategory } from "./classifier";

export const SCRIPT_LENGTH = 10;

export type ProbeWindow = { start: number; end: number };

export const DEFAULT_PROBE_WINDOW: ProbeWindow = { start: 2, end: 8 };

export type ReplyStrategy = "opening" | "probe" | "script" | "fallback";

export type EngagementPlan = {
  turn: number;
  reply: string;
  strategy: ReplyStrategy;
  missing: IntelligenceKind[];
  probedKind?: IntelligenceKind;
};

export type PlannerInput = {
  turn: number;
  category: ScamCategory;
  intelligence: IntelligenceBundle;
  probeWindow?: ProbeWindow;
};

export type ReplyTable = {
  fallback: string;
  openings: Record<ScamCategory, string>;
  scripts: Record<ScamCategory, string[]>;
  probes: Record<ScamCategory, Record<IntelligenceKind, string[]>>;
};

const DEFAULT_TABLE_PATH = path.join(__dirname, "../../data/replies.json");

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function byCategory<T>(read: (category: ScamCategory) => T): Record<ScamCategory, T> {
  return {
    bank_fraud: read("bank_fraud"),
    upi_fraud: read("upi_fraud"),
    phishing: read("phishing"),
    investment_scam: read("investment_scam"),
    lottery_scam: read("lottery_scam"),
    unknown: read("unknown")
  };
}

function byKind<T>(read: (kind: IntelligenceKind) => T): Record<IntelligenceKind, T> {
  return {
    phoneNumbers: read("phoneNumbers"),
    bankAccounts: read("bankAccounts"),
    upiIds: read("upiIds"),
    phishingLinks: read("phishingLinks"),
    emailAddresses: read("emailAddresses")
  };
}

export function parseReplyTable(raw: unknown): ReplyTable {
  if (!isRecord(raw)) throw new Error("reply table must be an object");
  const { fallback, openings, scripts, probes } = raw;
  if (!isNonEmptyString(fallback)) throw new Error("reply table: fallback must be a string");
  if (!isRecord(openings) || !isRecord(scripts) || !isRecord(probes)) {
    throw new Error("reply table: openings, scripts and probes must be objects");
  }

  return {
    fallback,
    openings: byCategory((category) => {
      const opening = openings[category];
      if (!isNonEmptyString(opening)) throw new Error(`reply table: missing opening for ${category}`);
      return opening;
    }),
    scripts: byCategory((category) => {
      const script = scripts[category];
      if (!Array.isArray(script) || script.length !== SCRIPT_LENGTH || !script.every(isNonEmptyString)) {
        throw new Error(`reply table: script for ${category} needs exactly ${SCRIPT_LENGTH} lines`);
      }
      return script;
    }),
    probes: byCategory((category) => {
      const perKind = probes[category];
      if (!isRecord(perKind)) throw new Error(`reply table: missing probes for ${category}`);
      return byKind((kind) => {
        const variants = perKind[kind];
        if (!Array.isArray(variants) || variants.length === 0 || !variants.every(isNonEmptyString)) {
          throw new Error(`reply table: missing ${kind} probes for ${category}`);
        }
        return variants;
      });
    })
  };
}

let defaultTable: ReplyTable | null = null;

export function loadReplyTable(filePath: string = DEFAULT_TABLE_PATH): ReplyTable {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  return parseReplyTable(raw);
}

function getDefaultTable(): ReplyTable {
  if (!defaultTable) defaultTable = loadReplyTable();
  return defaultTable;
}

export function scriptIndex(turn: number): number {
  return Math.min(Math.max(0, Math.floor(turn)), SCRIPT_LENGTH - 1);
}

function inProbeWindow(turn: number, window: ProbeWindow): boolean {
  return turn >= window.start && turn <= window.end;
}

export function planReply(input: PlannerInput, table: ReplyTable = getDefaultTable()): EngagementPlan {
  const turn = Math.max(0, Math.floor(input.turn));
  const { category } = input;
  const missing = missingKinds(input.intelligence);

  if (turn === 0) {
    return { turn, reply: table.openings[category], strategy: "opening", missing };
  }

  if (missing.length > 0 && inProbeWindow(turn, input.probeWindow ?? DEFAULT_PROBE_WINDOW)) {
    const probedKind = missing[0];
    const variants = table.probes[category][probedKind];
    return {
      turn,
      reply: variants[turn % variants.length],
      strategy: "probe",
      missing,
      probedKind
    };
  }

  return { turn, reply: table.scripts[category][scriptIndex(turn)], strategy: "script", missing };
}

export function fallbackReply(table: ReplyTable = getDefaultTable()): string {
  return table.fallback;
}

export function fallbackPlan(turn: number, table: ReplyTable = getDefaultTable()): EngagementPlan {
  return {
    turn,
    reply: fallbackReply(table),
    strategy: "fallback",
    missing: missingKinds(emptyIntelligence())
  };
}
