import { KeyedLock } from "../utils/keyedLock";
import { emptyIntelligence, mergeIntelligence } from "./extractor";
import type { IntelligenceBundle } from "./extractor";
import { emptyReferences, mergeReferences } from "./references";
import type { ReferenceIds } from "./references";
import type { ClassificationVerdict, ScamCategory } from "./classifier";

export type SessionRecord = {
  sessionId: string;
  turn: number;
  intelligence: IntelligenceBundle;
  references: ReferenceIds;
  verdict: ClassificationVerdict;
  categoryHistory: ScamCategory[];
  firstSeenAt: string;
  lastSeenAt: string;
};

export type SessionChange = {
  intelligence: IntelligenceBundle;
  verdict: ClassificationVerdict;
  references?: ReferenceIds;
};

export type CommitFn = (change: SessionChange) => SessionRecord;

export type SessionStoreOptions = {
  ttlMs?: number;
  now?: () => Date;
};

export function unknownVerdict(): ClassificationVerdict {
  return { category: "unknown", confidence: 0, urgent: false, urgencyLevel: 0, signals: [] };
}

export class SessionStore {
  private sessions = new Map<string, SessionRecord>();
  private locks = new KeyedLock();
  private ttlMs: number;
  private now: () => Date;

  constructor(options: SessionStoreOptions = {}) {
    this.ttlMs = Math.max(0, options.ttlMs ?? 0);
    this.now = options.now ?? (() => new Date());
  }

  private create(sessionId: string): SessionRecord {
    const timestamp = this.now().toISOString();
    const fresh: SessionRecord = {
      sessionId,
      turn: 0,
      intelligence: emptyIntelligence(),
      references: emptyReferences(),
      verdict: unknownVerdict(),
      categoryHistory: [],
      firstSeenAt: timestamp,
      lastSeenAt: timestamp
    };
    this.sessions.set(sessionId, fresh);
    return fresh;
  }

  getOrCreate(sessionId: string): SessionRecord {
    const record = this.sessions.get(sessionId) ?? this.create(sessionId);
    return structuredClone(record);
  }

  get(sessionId: string): SessionRecord | undefined {
    const record = this.sessions.get(sessionId);
    return record ? structuredClone(record) : undefined;
  }

  get size(): number {
    return this.sessions.size;
  }

  async update(
    sessionId: string,
    intelligence: IntelligenceBundle,
    verdict: ClassificationVerdict,
    references?: ReferenceIds
  ): Promise<SessionRecord> {
    return this.transact(sessionId, (_record, commit) => commit({ intelligence, verdict, references }));
  }

  async transact<T>(
    sessionId: string,
    work: (record: SessionRecord, commit: CommitFn) => T | Promise<T>
  ): Promise<T> {
    return this.locks.run(sessionId, async () => {
      let open = true;
      let committed = false;
      const commit: CommitFn = (change) => {
        if (!open) throw new Error(`session ${sessionId}: commit called outside its transaction`);
        if (committed) throw new Error(`session ${sessionId}: already committed in this transaction`);
        committed = true;
        return this.apply(sessionId, change);
      };
      try {
        return await work(this.getOrCreate(sessionId), commit);
      } finally {
        open = false;
      }
    });
  }

  private apply(sessionId: string, change: SessionChange): SessionRecord {
    const current = this.sessions.get(sessionId) ?? this.create(sessionId);
    const next: SessionRecord = {
      ...current,
      turn: current.turn + 1,
      intelligence: mergeIntelligence(current.intelligence, change.intelligence),
      references: change.references
        ? mergeReferences(current.references, change.references)
        : current.references,
      verdict: structuredClone(change.verdict),
      categoryHistory: [...current.categoryHistory, change.verdict.category],
      lastSeenAt: this.now().toISOString()
    };
    this.sessions.set(sessionId, next);
    return structuredClone(next);
  }

  prune(): number {
    if (this.ttlMs <= 0) return 0;
    const cutoff = this.now().getTime() - this.ttlMs;
    let removed = 0;
    for (const [sessionId, record] of this.sessions) {
      if (this.locks.isLocked(sessionId)) continue;
      if (Date.parse(record.lastSeenAt) < cutoff) {
        this.sessions.delete(sessionId);
        removed += 1;
      }
    }
    return removed;
  }
}
