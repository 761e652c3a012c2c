// Child Affect Analyzer - Express Server and WebSocket progress feed
//
// REST:
//   GET    /health
//   POST   /api/sessions        start an analysis, 202 { sessionId }
//   GET    /api/sessions/:id    { status, result? }
//   DELETE /api/sessions/:id    cancel a running analysis
// WebSocket: every connected client receives pipeline_progress and
// session_complete messages for all sessions.
// A finished session stays queryable for SESSION_RETENTION_MS, then is purged.

import express, { type Express, type Request, type Response } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { WebSocketServer, WebSocket } from "ws";
import { v4 as uuidv4 } from "uuid";
import {
  EMOTION_LABELS,
  type AnalysisRequest,
  type EmotionLabel,
  type Logger,
  type ServerMessage,
  type SessionConfigOverrides,
  type SessionOutcome,
  type UserContext,
} from "./types.js";
import type { RunOptions } from "./stage-orchestrator.js";
import { errorMessage } from "./errors.js";
import { createConsoleLogger } from "./utils.js";

// ─── Session registry ───────────────────────────────────────────────────────────

export interface SessionRunner {
  run(request: AnalysisRequest, options?: RunOptions): Promise<SessionOutcome>;
}

export type SessionStatus = "running" | "completed" | "failed" | "error";

export const SESSION_RETENTION_MS = 10 * 60 * 1000;

interface SessionEntry {
  status: SessionStatus;
  controller: AbortController;
  result: SessionOutcome | null;
  error: string | null;
  done: Promise<void>;
  purgeTimer: ReturnType<typeof setTimeout> | null;
}

// ─── Request parsing ────────────────────────────────────────────────────────────

export type ParseResult = { ok: true; request: AnalysisRequest } | { ok: false; error: string };

function isPlainObject(value: unknown): value is object {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function field(obj: object, key: string): unknown {
  return Reflect.get(obj, key);
}

function isEmotionLabel(value: unknown): value is EmotionLabel {
  return EMOTION_LABELS.some((label) => label === value);
}

function parseEmotionList(value: unknown, key: string): EmotionLabel[] | string {
  if (!Array.isArray(value) || !value.every(isEmotionLabel)) {
    return `${key} must be an array of emotion labels (${EMOTION_LABELS.join(", ")})`;
  }
  return [...value];
}

function parseOverrides(value: unknown): SessionConfigOverrides | string {
  if (!isPlainObject(value)) return "overrides must be an object";
  const overrides: SessionConfigOverrides = {};

  const interval = field(value, "frameIntervalMs");
  if (interval !== undefined) {
    if (typeof interval !== "number" || !(interval > 0)) return "frameIntervalMs must be a positive number";
    overrides.frameIntervalMs = interval;
  }
  const threshold = field(value, "confidenceThreshold");
  if (threshold !== undefined) {
    if (typeof threshold !== "number" || threshold < 0 || threshold > 1) {
      return "confidenceThreshold must be a number between 0 and 1";
    }
    overrides.confidenceThreshold = threshold;
  }
  const maxFrames = field(value, "maxFrames");
  if (maxFrames !== undefined) {
    if (maxFrames === null) {
      overrides.maxFrames = null;
    } else if (typeof maxFrames === "number" && Number.isInteger(maxFrames) && maxFrames >= 1) {
      overrides.maxFrames = maxFrames;
    } else {
      return "maxFrames must be a positive integer or null";
    }
  }
  for (const key of ["priorityEmotions", "alertEmotions"] as const) {
    const list = field(value, key);
    if (list === undefined) continue;
    const parsed = parseEmotionList(list, key);
    if (typeof parsed === "string") return parsed;
    overrides[key] = parsed;
  }
  return overrides;
}

function parseUserContext(value: unknown): UserContext | string {
  if (!isPlainObject(value)) return "userContext must be an object";
  const context: UserContext = {};
  const age = field(value, "ageYears");
  if (age !== undefined) {
    if (typeof age !== "number" || age < 0) return "userContext.ageYears must be a non-negative number";
    context.ageYears = age;
  }
  for (const key of ["setting", "notes"] as const) {
    const text = field(value, key);
    if (text === undefined) continue;
    if (typeof text !== "string") return `userContext.${key} must be a string`;
    context[key] = text;
  }
  return context;
}

export function parseAnalysisRequest(body: unknown): ParseResult {
  if (!isPlainObject(body)) return { ok: false, error: "Request body must be a JSON object" };

  const videoPath = field(body, "videoPath");
  if (typeof videoPath !== "string" || videoPath.trim().length === 0) {
    return { ok: false, error: "videoPath is required" };
  }
  const request: AnalysisRequest = { videoPath };

  const diagnosis = field(body, "diagnosis");
  if (diagnosis !== undefined && diagnosis !== null) {
    if (typeof diagnosis !== "string") return { ok: false, error: "diagnosis must be a string" };
    request.diagnosis = diagnosis;
  }

  const userContext = field(body, "userContext");
  if (userContext !== undefined) {
    const parsed = parseUserContext(userContext);
    if (typeof parsed === "string") return { ok: false, error: parsed };
    request.userContext = parsed;
  }

  const overrides = field(body, "overrides");
  if (overrides !== undefined) {
    const parsed = parseOverrides(overrides);
    if (typeof parsed === "string") return { ok: false, error: parsed };
    request.overrides = parsed;
  }

  return { ok: true, request };
}

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  runner: SessionRunner;
  /** Custom logger. Defaults to console-based logger. */
  logger?: Logger;
  /** How long a finished session stays queryable. Defaults to SESSION_RETENTION_MS. */
  sessionRetentionMs?: number;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  /** Start listening on the given port. Returns a promise that resolves when listening. */
  listen(port: number): Promise<void>;
  /** Resolves once every session started so far has settled. */
  idle(): Promise<void>;
  /** Gracefully shut down the server. Running sessions are cancelled. */
  close(): Promise<void>;
}

/**
 * Sends a JSON message to a WebSocket client.
 * Silently skips if the socket is not open.
 */
export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const { runner, logger = createConsoleLogger("Server"), sessionRetentionMs = SESSION_RETENTION_MS } = options;

  const app = express();
  const httpServer = createServer(app);
  const wss = new WebSocketServer({ server: httpServer });
  const sessions = new Map<string, SessionEntry>();

  const schedulePurge = (sessionId: string, entry: SessionEntry): void => {
    entry.purgeTimer = setTimeout(() => {
      entry.purgeTimer = null;
      sessions.delete(sessionId);
      logger.info(`Session ${sessionId} purged`);
    }, sessionRetentionMs);
  };

  const broadcast = (message: ServerMessage): void => {
    for (const client of wss.clients) {
      sendMessage(client, message);
    }
  };

  wss.on("connection", (ws: WebSocket) => {
    logger.info(`WebSocket client connected (${wss.clients.size} total)`);
    ws.on("error", (err) => {
      logger.error(`WebSocket error: ${err.message}`);
    });
  });

  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.post("/api/sessions", (req: Request, res: Response) => {
    const parsed = parseAnalysisRequest(req.body);
    if (!parsed.ok) {
      res.status(400).json({ error: parsed.error });
      return;
    }

    const sessionId = uuidv4();
    const controller = new AbortController();
    const entry: SessionEntry = {
      status: "running",
      controller,
      result: null,
      error: null,
      done: Promise.resolve(),
      purgeTimer: null,
    };
    sessions.set(sessionId, entry);

    entry.done = runner
      .run(parsed.request, {
        sessionId,
        signal: controller.signal,
        onProgress: (event) => broadcast({ type: "pipeline_progress", ...event }),
      })
      .then(
        (outcome) => {
          entry.status = outcome.status;
          entry.result = outcome;
          broadcast({
            type: "session_complete",
            sessionId,
            status: outcome.status,
            ...(outcome.status === "completed" ? { priority: outcome.priority } : {}),
          });
          schedulePurge(sessionId, entry);
        },
        (err: unknown) => {
          entry.status = "error";
          entry.error = errorMessage(err);
          logger.error(`Session ${sessionId} aborted: ${entry.error}`);
          broadcast({ type: "session_complete", sessionId, status: "failed" });
          schedulePurge(sessionId, entry);
        },
      );
    logger.info(`Session ${sessionId} accepted for ${parsed.request.videoPath}`);
    res.status(202).json({ sessionId });
  });

  app.get("/api/sessions/:id", (req: Request, res: Response) => {
    const entry = sessions.get(req.params.id);
    if (!entry) {
      res.status(404).json({ error: "Session not found" });
      return;
    }
    res.json({
      status: entry.status,
      ...(entry.result ? { result: entry.result } : {}),
      ...(entry.error ? { error: entry.error } : {}),
    });
  });

  app.delete("/api/sessions/:id", (req: Request, res: Response) => {
    const entry = sessions.get(req.params.id);
    if (!entry) {
      res.status(404).json({ error: "Session not found" });
      return;
    }
    if (entry.status !== "running") {
      res.status(409).json({ error: "Session already finished", status: entry.status });
      return;
    }
    entry.controller.abort();
    logger.info(`Session ${req.params.id} cancellation requested`);
    res.status(202).json({ status: "cancelling" });
  });

  const idle = async (): Promise<void> => {
    await Promise.all([...sessions.values()].map((entry) => entry.done));
  };

  return {
    app,
    httpServer,
    wss,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.listen(port, () => {
          logger.info(`Server listening on port ${port}`);
          resolve();
        });
        httpServer.on("error", reject);
      });
    },
    idle,
    async close(): Promise<void> {
      for (const entry of sessions.values()) {
        if (entry.status === "running") entry.controller.abort();
      }
      await idle();
      for (const entry of sessions.values()) {
        if (entry.purgeTimer) clearTimeout(entry.purgeTimer);
        entry.purgeTimer = null;
      }
      await new Promise<void>((resolve, reject) => {
        // Close all WebSocket connections
        for (const client of wss.clients) {
          client.close();
        }
        wss.close(() => {
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}
