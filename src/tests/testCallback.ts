import { afterEach, beforeEach, mock, test } from "node:test";
import assert from "node:assert/strict";
import axios from "axios";
import { buildFinalReport, sendFinalReport, shouldSendReport } from "../core/callback";
import type { HoneypotResult } from "../core/honeypot";

const REPORT_URL = "http://callback.test/final";

const result: HoneypotResult = {
  sessionId: "cb-1",
  scamDetected: true,
  scamType: "upi_fraud",
  confidence: 0.75,
  urgent: false,
  reply: "What is the exact UPI ID I should use? Please spell it out for me.",
  extractedIntelligence: {
    phoneNumbers: [],
    bankAccounts: [],
    upiIds: ["fraud@ybl"],
    phishingLinks: [],
    emailAddresses: []
  },
  referenceIds: { caseIds: [], policyNumbers: [], orderNumbers: [] },
  engagementMetrics: { totalMessagesExchanged: 10, engagementDurationSeconds: 95 },
  missingIntelligence: ["phoneNumbers", "emailAddresses", "phishingLinks", "bankAccounts"],
  strategy: "script",
  agentNotes: "Scam type: upi_fraud"
};

beforeEach(() => {
  mock.method(console, "info", () => undefined);
  mock.method(console, "error", () => undefined);
});

afterEach(() => {
  mock.restoreAll();
});

test("final report carries the session outcome", () => {
  assert.deepEqual(buildFinalReport(result), {
    sessionId: "cb-1",
    scamDetected: true,
    scamType: "upi_fraud",
    totalMessagesExchanged: 10,
    extractedIntelligence: result.extractedIntelligence,
    engagementMetrics: { totalMessagesExchanged: 10, engagementDurationSeconds: 95 },
    agentNotes: "Scam type: upi_fraud"
  });
});

test("report is due only on the threshold turn", () => {
  assert.equal(shouldSendReport(result, 10), true);
  assert.equal(shouldSendReport(result, 9), false);
  assert.equal(shouldSendReport({ ...result, strategy: "fallback" }, 10), false);
});

test("successful post returns on the first attempt", async () => {
  const post = mock.method(axios, "post", async (..._args: unknown[]) => ({ status: 200 }));
  const outcome = await sendFinalReport(REPORT_URL, buildFinalReport(result));

  assert.deepEqual(outcome, { ok: true, attempts: 1, status: 200 });
  assert.equal(post.mock.callCount(), 1);
  assert.equal(post.mock.calls[0].arguments[0], REPORT_URL);
  assert.deepEqual(post.mock.calls[0].arguments[2], { timeout: 5000 });
});

test("transient failure is retried", async () => {
  let calls = 0;
  const post = mock.method(axios, "post", async () => {
    calls += 1;
    if (calls === 1) throw new Error("socket hang up");
    return { status: 202 };
  });
  const outcome = await sendFinalReport(REPORT_URL, buildFinalReport(result));

  assert.deepEqual(outcome, { ok: true, attempts: 2, status: 202 });
  assert.equal(post.mock.callCount(), 2);
});

test("persistent failure gives up after three attempts without throwing", async () => {
  const post = mock.method(axios, "post", async () => {
    throw new Error("network down");
  });
  const outcome = await sendFinalReport(REPORT_URL, buildFinalReport(result));

  assert.deepEqual(outcome, { ok: false, attempts: 3, status: undefined });
  assert.equal(post.mock.callCount(), 3);
});
