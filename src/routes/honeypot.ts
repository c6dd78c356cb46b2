import { Router, Request, Response } from "express";
import type { HoneypotAgent } from "../core/honeypot";
import { buildFinalReport, sendFinalReport, shouldSendReport } from "../core/callback";
import type { AppConfig } from "../utils/config";
import { formatPayload, logEvent, safeError, safeLog, sanitizeHeaders } from "../utils/logging";
import { maskDigits } from "../utils/mask";
import { errorBody, parseHoneypotRequest, toResponseBody } from "../utils/requestSchema";

export type HoneypotRouterDeps = {
  agent: HoneypotAgent;
  config: AppConfig;
};

const PROBE_SESSION_ID = "probe-session";

function logIncoming(req: Request, body: unknown) {
  safeLog("INCOMING", `headers: ${formatPayload(sanitizeHeaders(req.headers))}`);
  safeLog("INCOMING", `body: ${formatPayload(body)}`);
}

function logOutgoing(status: number, responseJson: unknown, sessionId?: string) {
  safeLog("OUTGOING", `status=${status} response_json: ${formatPayload(responseJson, 5000)}`, sessionId);
}

export function createHoneypotRouter({ agent, config }: HoneypotRouterDeps): Router {
  const router = Router();

  router.get("/honeypot", async (req: Request, res: Response) => {
    const requested = req.query.sessionId;
    const sessionId = typeof requested === "string" && requested.trim() ? requested.trim() : PROBE_SESSION_ID;
    const result = await agent.handle({
      sessionId,
      message: { sender: "scammer", text: "" },
      conversationHistory: []
    });
    return res.status(200).json(toResponseBody(result));
  });

  router.post("/honeypot", async (req: Request, res: Response) => {
    const body: unknown = req.body ?? {};
    logIncoming(req, body);

    const apiKey = req.header("x-api-key");
    if (config.apiKey && apiKey !== config.apiKey) {
      const responseJson = errorBody("Invalid API key");
      logOutgoing(401, responseJson);
      return res.status(401).json(responseJson);
    }

    const parsed = parseHoneypotRequest(body);
    if (!parsed.ok) {
      const responseJson = errorBody(parsed.error);
      logOutgoing(400, responseJson);
      return res.status(400).json(responseJson);
    }

    const { request } = parsed;
    if (request.message.text.trim()) safeLog("SCAMMER", maskDigits(request.message.text), request.sessionId);

    try {
      const result = await agent.handle(request);
      safeLog("HONEYPOT", maskDigits(result.reply), result.sessionId);
      logEvent(
        "TURN",
        {
          totalMessagesExchanged: result.engagementMetrics.totalMessagesExchanged,
          scamType: result.scamType,
          confidence: result.confidence,
          strategy: result.strategy,
          channel: request.metadata?.channel
        },
        result.sessionId
      );

      if (config.reportCallbackUrl && shouldSendReport(result, config.reportAfterTurns)) {
        void sendFinalReport(config.reportCallbackUrl, buildFinalReport(result));
      }

      const responseJson = toResponseBody(result);
      logOutgoing(200, responseJson, result.sessionId);
      return res.status(200).json(responseJson);
    } catch (err) {
      safeError("ERROR", err, request.sessionId);
      const responseJson = toResponseBody(agent.fallback(request.sessionId));
      logOutgoing(200, responseJson, request.sessionId);
      return res.status(200).json(responseJson);
    }
  });

  return router;
}
