import { afterEach, beforeEach, mock, test } from "node:test";
import assert from "node:assert/strict";
import axios from "axios";
import request from "supertest";
import { createApp } from "../server";
import { HoneypotAgent } from "../core/honeypot";
import type { HoneypotResult } from "../core/honeypot";
import { SessionStore } from "../core/sessionStore";
import { loadConfig } from "../utils/config";

const API_KEY = "test-secret";
const OTP_DEMAND = "Your account has been BLOCKED, send OTP to 9876543210 urgently";

class FailingAgent extends HoneypotAgent {
  async handle(): Promise<HoneypotResult> {
    throw new Error("boom");
  }
}

beforeEach(() => {
  mock.method(console, "info", () => undefined);
  mock.method(console, "error", () => undefined);
});

afterEach(() => {
  mock.restoreAll();
});

test("health check", async () => {
  const res = await request(createApp({ config: loadConfig({}) })).get("/health");
  assert.equal(res.status, 200);
  assert.deepEqual(res.body, { status: "ok" });
});

test("wrong api key is refused", async () => {
  const app = createApp({ config: loadConfig({ API_KEY }) });
  const res = await request(app)
    .post("/api/honeypot")
    .set("x-api-key", "wrong-key")
    .send({ sessionId: "r-1", message: { sender: "scammer", text: OTP_DEMAND } });
  assert.equal(res.status, 401);
  assert.deepEqual(res.body, { status: "error", error: "Invalid API key" });
});

test("missing session id is a bad request", async () => {
  const app = createApp({ config: loadConfig({ API_KEY }) });
  const res = await request(app)
    .post("/api/honeypot")
    .set("x-api-key", API_KEY)
    .send({ message: { sender: "scammer", text: OTP_DEMAND } });
  assert.equal(res.status, 400);
  assert.deepEqual(res.body, { status: "error", error: "sessionId is required" });
});

test("malformed json is a bad request", async () => {
  const app = createApp({ config: loadConfig({}) });
  const res = await request(app).post("/api/honeypot").set("Content-Type", "application/json").send("{bad");
  assert.equal(res.status, 400);
  assert.deepEqual(res.body, { status: "error", error: "request body must be valid JSON" });
});

test("scam message gets a persona reply and the extracted intelligence", async () => {
  const app = createApp({ config: loadConfig({ API_KEY }) });
  const res = await request(app)
    .post("/api/honeypot")
    .set("x-api-key", API_KEY)
    .send({
      sessionId: "r-2",
      message: { sender: "scammer", text: OTP_DEMAND, timestamp: "2026-01-01T10:00:00.000Z" },
      conversationHistory: [],
      metadata: { channel: "SMS", language: "English", locale: "IN" }
    });

  assert.equal(res.status, 200);
  assert.equal(res.body.status, "success");
  assert.equal(res.body.sessionId, "r-2");
  assert.equal(res.body.scamType, "bank_fraud");
  assert.equal(res.body.strategy, "opening");
  assert.deepEqual(res.body.extractedIntelligence.phoneNumbers, ["9876543210"]);
  assert.equal(res.body.engagementMetrics.totalMessagesExchanged, 1);
});

test("probe endpoint answers an idle payload", async () => {
  const res = await request(createApp({ config: loadConfig({}) })).get("/api/honeypot");
  assert.equal(res.status, 200);
  assert.equal(res.body.sessionId, "probe-session");
  assert.equal(res.body.strategy, "fallback");
  assert.equal(res.body.engagementMetrics.totalMessagesExchanged, 0);
});

test("internal failure still answers with the fallback reply", async () => {
  const app = createApp({ config: loadConfig({}), agent: new FailingAgent(new SessionStore()) });
  const res = await request(app)
    .post("/api/honeypot")
    .send({ sessionId: "r-3", message: { sender: "scammer", text: OTP_DEMAND } });

  assert.equal(res.status, 200);
  assert.equal(res.body.status, "success");
  assert.equal(res.body.strategy, "fallback");
  assert.equal(res.body.reply, "Sorry beta, I didn't get your message properly. Can you send it again?");
});

test("final report goes out on the threshold turn", async () => {
  const post = mock.method(axios, "post", async (..._args: unknown[]) => ({ status: 200 }));
  const app = createApp({
    config: loadConfig({ REPORT_CALLBACK_URL: "http://callback.test/final", REPORT_AFTER_TURNS: "2" })
  });
  const send = () =>
    request(app)
      .post("/api/honeypot")
      .send({ sessionId: "r-4", message: { sender: "scammer", text: OTP_DEMAND } });

  await send();
  assert.equal(post.mock.callCount(), 0);

  await send();
  assert.equal(post.mock.callCount(), 1);
  assert.equal(post.mock.calls[0].arguments[0], "http://callback.test/final");
});
