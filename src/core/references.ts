export type ReferenceIds = {
  caseIds: string[];
  policyNumbers: string[];
  orderNumbers: string[];
};

type ReferenceKind = keyof ReferenceIds;

const REFERENCE_KINDS: readonly ReferenceKind[] = ["caseIds", "policyNumbers", "orderNumbers"];

const keywordSuffix = String.raw`(?:\s*(?:no\.?|number|id|#))?[\s.:#_-]*([A-Z0-9][A-Z0-9-]{4,19})\b`;

const referencePatterns: Record<ReferenceKind, RegExp> = {
  caseIds: new RegExp(String.raw`\b(?:case|reference|ref|ticket)(?![a-z])` + keywordSuffix, "gi"),
  policyNumbers: new RegExp(String.raw`\bpolicy(?![a-z])` + keywordSuffix, "gi"),
  orderNumbers: new RegExp(String.raw`\border(?![a-z])` + keywordSuffix, "gi")
};

export function emptyReferences(): ReferenceIds {
  return { caseIds: [], policyNumbers: [], orderNumbers: [] };
}

function uniqueMerge(base: string[], next: string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const value of [...base, ...next]) {
    const key = value.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(value);
  }
  return out;
}

export function extractReferences(text: string): ReferenceIds {
  const found = emptyReferences();
  if (!text) return found;
  for (const kind of REFERENCE_KINDS) {
    const values = Array.from(text.matchAll(referencePatterns[kind]))
      .map((match) => match[1] ?? "")
      .filter((value) => /\d/.test(value));
    found[kind] = uniqueMerge([], values);
  }
  return found;
}

export function mergeReferences(existing: ReferenceIds, incoming: ReferenceIds): ReferenceIds {
  return {
    caseIds: uniqueMerge(existing.caseIds, incoming.caseIds),
    policyNumbers: uniqueMerge(existing.policyNumbers, incoming.policyNumbers),
    orderNumbers: uniqueMerge(existing.orderNumbers, incoming.orderNumbers)
  };
}
