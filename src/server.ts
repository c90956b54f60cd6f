/**
 * HTTP application: health, GitHub webhooks and the tool API.
 */

import { timingSafeEqual } from "crypto";
import express, { Express, NextFunction, Request, Response } from "express";
import bodyParser from "body-parser";
import rateLimit from "express-rate-limit";
import { config } from "./env";
import { emitterEventNames } from "@octokit/webhooks";
import { webhooks } from "./integrations/github/webhooks";
import { errorMessage, logger } from "./logger";
import { TOOLS, ToolContext, hasTool, invokeTool } from "./tools/registry";

// Request timeout (30 seconds for most, 10 minutes for tool calls that run a full review)
const DEFAULT_TIMEOUT_MS = 30_000;
const TOOL_TIMEOUT_MS = 600_000;

export interface AppState {
  isShuttingDown: boolean;
}

export interface ServerOptions {
  toolTimeoutMs?: number;
}

type ReceivableEventName = Parameters<typeof webhooks.verifyAndReceive>[0]["name"];

// Emitter names also cover "event.action" pairs, which are not delivery names
function isEventName(name: string): name is ReceivableEventName {
  return !name.includes(".") && emitterEventNames.some((known) => known === name);
}

function headerValue(req: Request, name: string): string {
  const value = req.headers[name];
  return Array.isArray(value) ? value[0] ?? "" : value ?? "";
}

function tokenMatches(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

function requireToolsToken(token: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    const match = /^Bearer\s+(.+)$/i.exec(headerValue(req, "authorization"));
    if (!match || !tokenMatches(match[1].trim(), token)) {
      res.status(401).json({ error: "Unauthorized" });
      return;
    }
    next();
  };
}

export function createApp(
  ctx: ToolContext,
  state: AppState = { isShuttingDown: false },
  options: ServerOptions = {}
): Express {
  const app = express();
  const toolTimeoutMs = options.toolTimeoutMs ?? TOOL_TIMEOUT_MS;

  // Trust proxy - enables correct client IP detection for rate limiting behind load balancers
  app.set("trust proxy", 1);

  const generalLimiter = rateLimit({
    windowMs: 60 * 1000,
    max: 100,
    message: { error: "Too many requests, please try again later" },
    standardHeaders: true,
    legacyHeaders: false,
    skip: (req) => req.path === "/health",
  });

  const webhookLimiter = rateLimit({
    windowMs: 60 * 1000,
    max: 60,
    message: { error: "Too many webhook requests" },
    standardHeaders: true,
    legacyHeaders: false,
  });

  app.use(generalLimiter);
  app.use("/webhook", webhookLimiter);

  // Reject requests during shutdown
  app.use((_req: Request, res: Response, next: NextFunction) => {
    if (state.isShuttingDown) {
      res.status(503).json({ error: "Server is shutting down" });
      return;
    }
    next();
  });

  app.use((req: Request, res: Response, next: NextFunction) => {
    const timeout = req.path.startsWith("/api/tools") ? toolTimeoutMs : DEFAULT_TIMEOUT_MS;
    res.setTimeout(timeout, () => {
      if (!res.headersSent) {
        res.status(408).json({ error: "Request timeout" });
      }
    });
    next();
  });

  // JSON parsing for all routes except /webhook
  app.use((req: Request, res: Response, next: NextFunction) => {
    if (req.path === "/webhook") {
      next();
    } else {
      bodyParser.json({ limit: "5mb" })(req, res, next);
    }
  });

  app.get("/health", (_req: Request, res: Response) => {
    const github =
      config.GITHUB_APP_ID && config.GITHUB_PRIVATE_KEY && config.GITHUB_WEBHOOK_SECRET ? "ok" : "misconfigured";
    const agent = ctx.agent ? "ok" : "not_configured";
    const status = github === "ok" ? (agent === "ok" ? "healthy" : "degraded") : "unhealthy";

    res.status(status === "unhealthy" ? 503 : 200).json({
      status,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      checks: { github: { status: github }, agent: { status: agent } },
    });
  });

  app.get("/", (_req: Request, res: Response) => {
    res.status(200).json({
      status: "ok",
      message: "diffwarden backend is running",
      version: process.env.npm_package_version || "1.0.0",
    });
  });

  // Webhook endpoint - verifies, responds immediately, processes async
  app.post("/webhook", bodyParser.raw({ type: "*/*" }), async (req: Request, res: Response) => {
    const payload: unknown = req.body;
    const body = Buffer.isBuffer(payload) ? payload.toString("utf8") : "";
    const signature = headerValue(req, "x-hub-signature-256");
    const id = headerValue(req, "x-github-delivery");
    const name = headerValue(req, "x-github-event");

    try {
      if (!(await webhooks.verify(body, signature))) {
        throw new Error("signature does not match");
      }
    } catch (err) {
      logger.error("Webhook signature verification failed", { deliveryId: id, event: name, error: errorMessage(err) });
      res.status(401).json({ error: "Invalid signature" });
      return;
    }

    // GitHub expects a response within 10 seconds
    res.status(200).json({ ok: true });
    logger.info("Processing webhook", { deliveryId: id, event: name });

    if (!isEventName(name)) {
      logger.warn("Ignoring unknown webhook event", { deliveryId: id, event: name });
      return;
    }
    webhooks.verifyAndReceive({ id, name, signature, payload: body }).catch((err: unknown) => {
      logger.error("Webhook handler error", { deliveryId: id, event: name, error: errorMessage(err) });
    });
  });

  // Tool routes exist only when a bearer token is configured
  const toolsToken = config.TOOLS_API_TOKEN;
  if (!toolsToken) {
    logger.warn("TOOLS_API_TOKEN not set, tool API disabled");
    return app;
  }

  app.use("/api/tools", requireToolsToken(toolsToken));

  app.get("/api/tools", (_req: Request, res: Response) => {
    res.status(200).json({
      tools: TOOLS.map((tool) => ({ name: tool.name, description: tool.description })),
    });
  });

  app.post("/api/tools/:name", async (req: Request, res: Response) => {
    const { name } = req.params;
    if (!hasTool(name)) {
      res.status(404).json({ error: `Unknown tool: ${name}` });
      return;
    }
    const result = await invokeTool(name, req.body, ctx);
    if (res.headersSent) {
      logger.warn(`Tool ${name} finished after its request timed out`);
      return;
    }
    res.status(200).json({ result });
  });

  return app;
}
