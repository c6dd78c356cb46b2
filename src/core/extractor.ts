export const INTEL_KINDS = [
  "phoneNumbers",
  "bankAccounts",
  "upiIds",
  "phishingLinks",
  "emailAddresses"
] as const;

export type IntelligenceKind = (typeof INTEL_KINDS)[number];

export type IntelligenceBundle = Record<IntelligenceKind, string[]>;

export const PROBE_PRIORITY: readonly IntelligenceKind[] = [
  "phoneNumbers",
  "emailAddresses",
  "phishingLinks",
  "upiIds",
  "bankAccounts"
];

export const PAYMENT_SUFFIXES: ReadonlySet<string> = new Set([
  "upi",
  "ybl",
  "ibl",
  "axl",
  "apl",
  "yapl",
  "paytm",
  "ptyes",
  "ptaxis",
  "pthdfc",
  "ptsbi",
  "oksbi",
  "okicici",
  "okaxis",
  "okhdfcbank",
  "okbizaxis",
  "sbi",
  "icici",
  "hdfc",
  "hdfcbank",
  "axis",
  "axisbank",
  "kotak",
  "kbl",
  "pnb",
  "boi",
  "cnrb",
  "barodampay",
  "unionbank",
  "idbi",
  "indus",
  "rbl",
  "yesbank",
  "federal",
  "citi",
  "dbs",
  "freecharge",
  "mobikwik",
  "jio",
  "airtel",
  "fbl",
  "waicici"
]);

const ACCOUNT_CONTEXT_WINDOW = 4;

const linkRegex = /\bhttps?:\/\/[^\s,)"'<>\]]+/gi;
const linkAuthority = /^https?:\/\/[^/?#]+/i;
const trailingPunctuation = /[.,;:!?)\]}'"]+$/;
const atTokenRegex = /[a-z0-9][a-z0-9._%+-]*@[a-z0-9](?:[a-z0-9.-]*[a-z0-9])?/gi;
const emailDomainRegex = /^(?:[a-z0-9-]+\.)+[a-z]{2,}$/i;
const phonePatterns: RegExp[] = [
  /(?<![\d+])\+\d{1,3}[\s.-]?\(\d{1,5}\)(?:[\s.-]?\d){6,10}(?!\d)/g,
  /(?<![\d+])\+\d{1,3}(?:[\s.-]?\d){10}(?!\d)/g,
  /(?<![\d+])91[\s-][6-9]\d{4}[\s-]?\d{5}(?!\d)/g,
  /(?<!\d)[6-9]\d{4}[\s-]?\d{5}(?!\d)/g
];
const digitRunRegex = /(?<!\d)\d{10,18}(?!\d)/g;
const accountKeyword = /^[^a-z]*(?:account\w*|acct|acc|a\/c)(?![a-z])/;

export function emptyIntelligence(): IntelligenceBundle {
  return {
    phoneNumbers: [],
    bankAccounts: [],
    upiIds: [],
    phishingLinks: [],
    emailAddresses: []
  };
}

function digitsOf(value: string): string {
  return value.replace(/\D/g, "");
}

export function intelKey(kind: IntelligenceKind, value: string): string {
  switch (kind) {
    case "phoneNumbers": {
      const digits = digitsOf(value);
      return digits.length > 10 ? digits.slice(-10) : digits;
    }
    case "bankAccounts":
      return digitsOf(value);
    default:
      return value.trim().toLowerCase();
  }
}

function uniqueMerge(kind: IntelligenceKind, base: string[], next: string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const raw of [...base, ...next]) {
    const value = raw.trim();
    if (!value) continue;
    const key = intelKey(kind, value);
    if (!key || seen.has(key)) continue;
    seen.add(key);
    out.push(value);
  }
  return out;
}

function withoutPhoneCollisions(bundle: IntelligenceBundle): IntelligenceBundle {
  const phoneKeys = new Set(bundle.phoneNumbers.map((p) => intelKey("phoneNumbers", p)));
  return {
    ...bundle,
    bankAccounts: bundle.bankAccounts.filter((a) => !phoneKeys.has(intelKey("bankAccounts", a)))
  };
}

class ClaimBuffer {
  constructor(public text: string) {}

  claim(index: number, length: number): void {
    this.text = this.text.slice(0, index) + " ".repeat(length) + this.text.slice(index + length);
  }
}

function claimLinks(buffer: ClaimBuffer): string[] {
  const links: string[] = [];
  for (const match of Array.from(buffer.text.matchAll(linkRegex))) {
    const cleaned = match[0].replace(trailingPunctuation, "");
    if (!linkAuthority.test(cleaned) || match.index === undefined) continue;
    links.push(cleaned);
    buffer.claim(match.index, cleaned.length);
  }
  return links;
}

function claimAtTokens(buffer: ClaimBuffer): { upiIds: string[]; emailAddresses: string[] } {
  const upiIds: string[] = [];
  const emailAddresses: string[] = [];
  for (const match of Array.from(buffer.text.matchAll(atTokenRegex))) {
    if (match.index === undefined) continue;
    const token = match[0];
    const domain = token.slice(token.indexOf("@") + 1).toLowerCase();
    if (PAYMENT_SUFFIXES.has(domain)) {
      upiIds.push(token);
    } else if (emailDomainRegex.test(domain)) {
      emailAddresses.push(token);
    } else {
      continue;
    }
    buffer.claim(match.index, token.length);
  }
  return { upiIds, emailAddresses };
}

function claimPhones(buffer: ClaimBuffer): string[] {
  const phones: string[] = [];
  for (const pattern of phonePatterns) {
    for (const match of Array.from(buffer.text.matchAll(pattern))) {
      if (match.index === undefined) continue;
      phones.push(match[0].replace(/\s+/g, " ").trim());
      buffer.claim(match.index, match[0].length);
    }
  }
  return phones;
}

function hasAccountContext(text: string, index: number): boolean {
  const tokens = text
    .slice(0, index)
    .toLowerCase()
    .split(/\s+/)
    .filter(Boolean)
    .slice(-ACCOUNT_CONTEXT_WINDOW);
  return tokens.some((token) => accountKeyword.test(token));
}

function claimAccounts(buffer: ClaimBuffer): string[] {
  const accounts: string[] = [];
  const snapshot = buffer.text;
  for (const match of Array.from(snapshot.matchAll(digitRunRegex))) {
    if (match.index === undefined) continue;
    const digits = match[0];
    if (digits.length >= 12 || hasAccountContext(snapshot, match.index)) {
      accounts.push(digits);
      buffer.claim(match.index, digits.length);
    }
  }
  return accounts;
}

export function extract(text: string): IntelligenceBundle {
  if (!text || typeof text !== "string") return emptyIntelligence();

  const buffer = new ClaimBuffer(text);
  const phishingLinks = claimLinks(buffer);
  const { upiIds, emailAddresses } = claimAtTokens(buffer);
  const phoneNumbers = claimPhones(buffer);
  const bankAccounts = claimAccounts(buffer);

  return withoutPhoneCollisions({
    phoneNumbers: uniqueMerge("phoneNumbers", [], phoneNumbers),
    bankAccounts: uniqueMerge("bankAccounts", [], bankAccounts),
    upiIds: uniqueMerge("upiIds", [], upiIds),
    phishingLinks: uniqueMerge("phishingLinks", [], phishingLinks),
    emailAddresses: uniqueMerge("emailAddresses", [], emailAddresses)
  });
}

export function extractCumulative(currentMessage: string, priorMessages: string[]): IntelligenceBundle {
  const texts = [...priorMessages, currentMessage].filter(
    (t): t is string => typeof t === "string" && t.length > 0
  );
  return extract(texts.join("\n"));
}

export function mergeIntelligence(
  existing: IntelligenceBundle,
  incoming: IntelligenceBundle
): IntelligenceBundle {
  return withoutPhoneCollisions({
    phoneNumbers: uniqueMerge("phoneNumbers", existing.phoneNumbers, incoming.phoneNumbers),
    bankAccounts: uniqueMerge("bankAccounts", existing.bankAccounts, incoming.bankAccounts),
    upiIds: uniqueMerge("upiIds", existing.upiIds, incoming.upiIds),
    phishingLinks: uniqueMerge("phishingLinks", existing.phishingLinks, incoming.phishingLinks),
    emailAddresses: uniqueMerge("emailAddresses", existing.emailAddresses, incoming.emailAddresses)
  });
}

export function missingKinds(bundle: IntelligenceBundle): IntelligenceKind[] {
  return PROBE_PRIORITY.filter((kind) => bundle[kind].length === 0);
}

export function countIntelligence(bundle: IntelligenceBundle): number {
  return INTEL_KINDS.reduce((total, kind) => total + bundle[kind].length, 0);
}
