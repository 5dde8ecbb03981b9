// Body Measurement Pipeline - WebSocket Handler and Express Server
// The UI collaborator connects over WebSocket, pushes keypoint frames and
// drives review; accepted records are readable over HTTP from the store.
//
// Each WebSocket connection works on one capture session at a time; a retake
// moves the connection to the follow-up session.

import express, { type Express } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { WebSocketServer, WebSocket } from "ws";
import { SessionManager } from "./session-manager.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { assertStorableId, type MeasurementStore } from "./file-persistence.js";
import type {
  CaptureView,
  ClientMessage,
  Keypoint,
  KeypointFrame,
  KeypointFramePayload,
  ServerMessage,
  SessionEvent,
} from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** Largest accepted WebSocket message; a frame of a few dozen joints is far smaller. */
const MAX_MESSAGE_BYTES = 256 * 1024;

// ─── Per-Connection State ───────────────────────────────────────────────────────

interface ConnectionState {
  /** Session the connection is currently working on. */
  sessionId: string | null;
  /** Every session opened on this connection, closed on disconnect. */
  openedSessions: Set<string>;
}

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  sessionManager: SessionManager;
  /** Store the HTTP read endpoint serves from. */
  store?: MeasurementStore;
  /** Custom logger. Defaults to console-based logger. */
  logger?: Logger;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  sessionManager: SessionManager;
  /** Start listening on the given port. Returns a promise that resolves when listening. */
  listen(port: number): Promise<void>;
  /** Gracefully shut down the server. */
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening. Call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const { sessionManager, store, logger = createConsoleLogger("Server") } = options;

  const app = express();
  const httpServer = createServer(app);

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/api/measurements/:userId/:sessionId", (req, res) => {
    const { userId, sessionId } = req.params;

    if (!store) {
      res.status(503).json({ error: "No measurement store configured" });
      return;
    }

    try {
      assertStorableId(userId, "user id");
      assertStorableId(sessionId, "capture session id");
    } catch (err) {
      res.status(400).json({ error: err instanceof Error ? err.message : String(err) });
      return;
    }

    store
      .load(userId, sessionId)
      .then((record) => {
        if (!record) {
          res.status(404).json({ error: `No accepted measurements for session ${sessionId}` });
          return;
        }
        res.json(record);
      })
      .catch((err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        logger.error(`Failed to load measurements for ${userId}/${sessionId}: ${message}`);
        res.status(500).json({ error: "Failed to load measurements" });
      });
  });

  const wss = new WebSocketServer({ server: httpServer, maxPayload: MAX_MESSAGE_BYTES });

  wss.on("connection", (ws: WebSocket) => {
    handleConnection(ws, sessionManager, logger);
  });

  return {
    app,
    httpServer,
    wss,
    sessionManager,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          logger.info(`Server listening on port ${port}`);
          resolve();
        });
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
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

// ─── WebSocket Connection Handler ───────────────────────────────────────────────

function handleConnection(ws: WebSocket, sessionManager: SessionManager, logger: Logger): void {
  const connState: ConnectionState = { sessionId: null, openedSessions: new Set() };

  logger.info("New WebSocket connection");

  ws.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
    try {
      if (isBinary) {
        throw new Error("Binary frames are not supported; send JSON messages.");
      }
      const message = parseClientMessage(JSON.parse(rawDataToString(data)));
      handleClientMessage(ws, message, connState, sessionManager, logger);
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : String(err);
      logger.error(`Error handling message for session ${connState.sessionId ?? "(none)"}: ${errorMessage}`);
      sendMessage(ws, { type: "error", message: errorMessage, recoverable: true });
    }
  });

  ws.on("close", () => {
    logger.info(`WebSocket closed, session ${connState.sessionId ?? "(none)"}`);
    cleanupConnection(connState, sessionManager);
  });

  ws.on("error", (err) => {
    logger.error(`WebSocket error for session ${connState.sessionId ?? "(none)"}: ${err.message}`);
    cleanupConnection(connState, sessionManager);
  });
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
  if (Buffer.isBuffer(data)) return data.toString("utf-8");
  return Buffer.from(data).toString("utf-8");
}

// ─── JSON Client Message Handler ────────────────────────────────────────────────

function handleClientMessage(
  ws: WebSocket,
  message: ClientMessage,
  connState: ConnectionState,
  sessionManager: SessionManager,
  logger: Logger,
): void {
  // Helper to catch errors from async handlers and send them to the client
  const catchAsync = (promise: Promise<void>) => {
    promise.catch((err: unknown) => {
      const errorMessage = err instanceof Error ? err.message : String(err);
      logger.error(`Async error for session ${connState.sessionId ?? "(none)"}: ${errorMessage}`);
      sendMessage(ws, { type: "error", message: errorMessage, recoverable: true });
    });
  };

  if (message.type === "start_session") {
    handleStartSession(ws, message, connState, sessionManager, logger);
    return;
  }

  const sessionId = connState.sessionId;
  if (sessionId === null) {
    throw new Error(`"${message.type}" requires an active session; send start_session first.`);
  }

  switch (message.type) {
    case "submit_frame":
      catchAsync(sessionManager.submitFrame(sessionId, toKeypointFrame(message.frame)).then(() => undefined));
      break;

    case "process_capture":
      catchAsync(sessionManager.processCapture(sessionId).then(() => undefined));
      break;

    case "confirm":
      catchAsync(sessionManager.confirm(sessionId).then(() => undefined));
      break;

    case "reject":
      catchAsync(sessionManager.reject(sessionId));
      break;

    case "acknowledge_retake":
      catchAsync(sessionManager.acknowledgeRetake(sessionId));
      break;

    case "start_retake":
      catchAsync(handleStartRetake(ws, sessionId, connState, sessionManager, logger));
      break;

    case "abandon":
      catchAsync(sessionManager.abandon(sessionId));
      break;

    default: {
      const exhaustiveCheck: never = message;
      throw new Error(`Unhandled message: ${JSON.stringify(exhaustiveCheck)}`);
    }
  }
}

// ─── Session Start / Retake ─────────────────────────────────────────────────────

function handleStartSession(
  ws: WebSocket,
  message: Extract<ClientMessage, { type: "start_session" }>,
  connState: ConnectionState,
  sessionManager: SessionManager,
  logger: Logger,
): void {
  const session = sessionManager.createSession(message.userId, message.heightCm);
  sessionManager.registerEventListener(session.id, (event) => forwardEvent(ws, event));

  connState.sessionId = session.id;
  connState.openedSessions.add(session.id);
  logger.info(`Session ${session.id} started for user ${message.userId}`);

  sendMessage(ws, { type: "session_started", sessionId: session.id, retakeCount: session.retakeCount });
  sendMessage(ws, { type: "state_change", state: session.state });
}

async function handleStartRetake(
  ws: WebSocket,
  sessionId: string,
  connState: ConnectionState,
  sessionManager: SessionManager,
  logger: Logger,
): Promise<void> {
  const next = await sessionManager.startRetake(sessionId);
  if (!next) {
    // capture_failed has already been forwarded through the session listener
    return;
  }

  connState.sessionId = next.id;
  connState.openedSessions.add(next.id);
  logger.info(`Session ${sessionId} retaken as ${next.id}`);

  sendMessage(ws, { type: "session_started", sessionId: next.id, retakeCount: next.retakeCount });
  sendMessage(ws, { type: "state_change", state: next.state });
}

// ─── Event Forwarding ───────────────────────────────────────────────────────────

/** Translates a SessionManager event into the wire message for the UI. */
export function toServerMessage(event: SessionEvent): ServerMessage {
  switch (event.type) {
    case "state_change":
      return { type: "state_change", state: event.to };
    case "frame_accepted":
      return { type: "frame_accepted", frameId: event.frameId, view: event.view, scaleFactor: event.scaleFactor };
    case "frame_rejected":
      return {
        type: "frame_rejected",
        frameId: event.frameId,
        reason: event.reason,
        joint: event.joint,
        message: event.message,
      };
    case "review_ready":
      return { type: "review_ready", measurements: event.measurements };
    case "retake_proposed":
      return { type: "retake_proposed", conflicts: event.conflicts };
    case "measurements_accepted":
      return { type: "measurements_accepted", measurements: event.measurements };
    case "mesh_ready":
      return { type: "mesh_ready", parameters: event.parameters };
    case "capture_failed":
      return { type: "capture_failed", retakeCount: event.retakeCount, message: event.message };
  }
}

function forwardEvent(ws: WebSocket, event: SessionEvent): void {
  sendMessage(ws, toServerMessage(event));
}

// ─── Message Parsing ────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isCaptureView(value: unknown): value is CaptureView {
  return value === "front" || value === "side";
}

function parseKeypoint(joint: string, raw: unknown): Keypoint {
  if (!isRecord(raw) || typeof raw.x !== "number" || typeof raw.y !== "number" || typeof raw.confidence !== "number") {
    throw new Error(`Keypoint "${joint}" must have numeric x, y and confidence`);
  }
  if (raw.z !== undefined && typeof raw.z !== "number") {
    throw new Error(`Keypoint "${joint}" has a non-numeric z`);
  }
  return typeof raw.z === "number"
    ? { x: raw.x, y: raw.y, z: raw.z, confidence: raw.confidence }
    : { x: raw.x, y: raw.y, confidence: raw.confidence };
}

function parseFrame(raw: unknown): KeypointFramePayload {
  if (!isRecord(raw)) {
    throw new Error("submit_frame requires a frame object");
  }
  const { frameId, view, width, height, capturedAt, keypoints } = raw;
  if (typeof frameId !== "string" || frameId.length === 0) throw new Error("frame.frameId must be a non-empty string");
  if (!isCaptureView(view)) throw new Error('frame.view must be "front" or "side"');
  if (typeof width !== "number" || !(width > 0) || typeof height !== "number" || !(height > 0)) {
    throw new Error("frame.width and frame.height must be positive numbers");
  }
  if (typeof capturedAt !== "string" || Number.isNaN(Date.parse(capturedAt))) {
    throw new Error("frame.capturedAt must be an ISO timestamp");
  }
  if (!isRecord(keypoints)) throw new Error("frame.keypoints must be an object");

  const parsed: Record<string, Keypoint> = {};
  for (const [joint, point] of Object.entries(keypoints)) {
    parsed[joint] = parseKeypoint(joint, point);
  }

  return { frameId, view, width, height, capturedAt, keypoints: parsed };
}

/**
 * Validates a decoded JSON value as a ClientMessage.
 * @throws Error describing the first problem found.
 */
export function parseClientMessage(raw: unknown): ClientMessage {
  if (!isRecord(raw) || typeof raw.type !== "string") {
    throw new Error("Messages must be JSON objects with a string type");
  }

  switch (raw.type) {
    case "start_session": {
      const { userId, heightCm } = raw;
      if (typeof userId !== "string" || typeof heightCm !== "number") {
        throw new Error("start_session requires a string userId and a numeric heightCm");
      }
      return { type: "start_session", userId, heightCm };
    }
    case "submit_frame":
      return { type: "submit_frame", frame: parseFrame(raw.frame) };
    case "process_capture":
    case "confirm":
    case "reject":
    case "acknowledge_retake":
    case "start_retake":
    case "abandon":
      return { type: raw.type };
    default:
      throw new Error(`Unknown message type: ${raw.type}`);
  }
}

/** Turns the wire form of a frame into an immutable KeypointFrame. */
export function toKeypointFrame(payload: KeypointFramePayload): KeypointFrame {
  const keypoints: Record<string, Keypoint> = {};
  for (const [joint, point] of Object.entries(payload.keypoints)) {
    keypoints[joint] = Object.freeze({ ...point });
  }
  return Object.freeze({
    frameId: payload.frameId,
    view: payload.view,
    width: payload.width,
    height: payload.height,
    capturedAt: new Date(payload.capturedAt),
    keypoints: Object.freeze(keypoints),
  });
}

// ─── Message Sending ────────────────────────────────────────────────────────────

/**
 * Sends a ServerMessage to the client as JSON text.
 * Silently ignores if the WebSocket is not in OPEN state.
 */
export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

// ─── Connection Cleanup ─────────────────────────────────────────────────────────

function cleanupConnection(connState: ConnectionState, sessionManager: SessionManager): void {
  for (const sessionId of connState.openedSessions) {
    sessionManager.closeSession(sessionId);
  }
  connState.openedSessions.clear();
  connState.sessionId = null;
}
