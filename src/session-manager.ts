// Body Measurement Pipeline - Session Manager
// Owns capture sessions and drives the verification state machine:
//
//   CAPTURED → PENDING_REVIEW → ACCEPTED
//                             → RETAKING → (new session) CAPTURED
//                                        → FAILED (retake limit reached)
//
// Sessions live in a Map keyed by session id; nothing is shared between
// sessions, so different users are processed independently. Transitions for
// one session are serialized through SessionLock.

import { v4 as uuidv4 } from "uuid";
import { VerificationState } from "./types.js";
import type {
  CaptureSession,
  KeypointFrame,
  MeasurementPlan,
  MeasurementSet,
  MeshParameters,
  ReconciledField,
  ReconciledMeasurementSet,
  ReferenceMeshMetadata,
  SessionEvent,
  SessionEventListener,
} from "./types.js";
import { validateFrame, DEFAULT_MIN_CONFIDENCE } from "./frame-validator.js";
import { CalibrationEngine, referenceFromHeight } from "./calibration-engine.js";
import { MeasurementEngine } from "./measurement-engine.js";
import { aggregateViews, DEFAULT_CONFLICT_TOLERANCE } from "./multi-view-aggregator.js";
import { parametrizeMesh } from "./mesh-parametrizer.js";
import { requiredJointsFor, validateMeasurementSet } from "./measurement-plan.js";
import { SessionLock } from "./utils/session-lock.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { isPositiveFinite } from "./utils.js";
import { assertStorableId, type MeasurementStore } from "./file-persistence.js";

export const DEFAULT_GRACE_PERIOD_MS = 30_000;
export const DEFAULT_MAX_RETAKES = 3;

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface SessionManagerDeps {
  plan: MeasurementPlan;
  /** Enables mesh parametrization on acceptance. */
  meshMetadata?: ReferenceMeshMetadata;
  /** Where accepted records go. Without one, acceptance stays in memory. */
  store?: MeasurementStore;
  calibrationEngine?: CalibrationEngine;
  measurementEngine?: MeasurementEngine;
  logger?: Logger;
  minConfidence?: number;
  conflictTolerance?: number;
  gracePeriodMs?: number;
  maxRetakes?: number;
}

/**
 * Valid state transitions for the verification state machine.
 *
 * CAPTURED → PENDING_REVIEW:  processCapture()
 * PENDING_REVIEW → ACCEPTED:  confirm()
 * PENDING_REVIEW → RETAKING:  reject() or acknowledgeRetake()
 * RETAKING → FAILED:          startRetake() past the retake limit
 *
 * RETAKING → CAPTURED never happens in place: startRetake() opens a new session.
 */
const VALID_TRANSITIONS: ReadonlyMap<VerificationState, readonly VerificationState[]> =
  new Map<VerificationState, readonly VerificationState[]>([
    [VerificationState.CAPTURED, [VerificationState.PENDING_REVIEW]],
    [VerificationState.PENDING_REVIEW, [VerificationState.ACCEPTED, VerificationState.RETAKING]],
    [VerificationState.ACCEPTED, []],
    [VerificationState.RETAKING, [VerificationState.FAILED]],
    [VerificationState.FAILED, []],
  ]);

/**
 * Freezes an accepted record all the way down. Date objects stay mutable even
 * when frozen, so the timestamps become getters that hand out copies.
 */
function freezeRecord(record: ReconciledMeasurementSet): ReconciledMeasurementSet {
  for (const field of Object.values(record.fields)) {
    freezeField(field);
  }
  Object.freeze(record.fields);
  Object.freeze(record.conflicts);
  Object.freeze(record.sourceFrameIds);
  freezeTimestamp(record, "createdAt");
  freezeTimestamp(record, "updatedAt");
  return Object.freeze(record);
}

function freezeField(field: ReconciledField): void {
  field.candidates.forEach((c) => Object.freeze(c));
  Object.freeze(field.candidates);
  Object.freeze(field.sources);
  Object.freeze(field);
}

function freezeTimestamp(record: ReconciledMeasurementSet, key: "createdAt" | "updatedAt"): void {
  const time = record[key].getTime();
  Object.defineProperty(record, key, { get: () => new Date(time), enumerable: true });
}

function freezeMesh(mesh: MeshParameters): MeshParameters {
  mesh.warnings.forEach((w) => Object.freeze(w));
  Object.freeze(mesh.warnings);
  Object.freeze(mesh.values);
  Object.freeze(mesh.origins);
  return Object.freeze(mesh);
}

/** A detached, frozen copy of a session for callers outside the manager. */
function snapshot(session: CaptureSession): Readonly<CaptureSession> {
  return Object.freeze({
    ...session,
    frames: { ...session.frames },
    viewSets: [...session.viewSets],
    createdAt: new Date(session.createdAt.getTime()),
  });
}

export class SessionManager {
  private sessions: Map<string, CaptureSession> = new Map();
  private listeners: Map<string, SessionEventListener> = new Map();
  private graceTimers: Map<string, ReturnType<typeof setTimeout>> = new Map();
  private readonly lock = new SessionLock();

  private readonly plan: MeasurementPlan;
  private readonly meshMetadata: ReferenceMeshMetadata | null;
  private readonly store: MeasurementStore | null;
  private readonly calibrationEngine: CalibrationEngine;
  private readonly measurementEngine: MeasurementEngine;
  private readonly logger: Logger;
  private readonly minConfidence: number;
  private readonly conflictTolerance: number;
  private readonly gracePeriodMs: number;
  private readonly maxRetakes: number;

  constructor(deps: SessionManagerDeps) {
    this.plan = deps.plan;
    this.meshMetadata = deps.meshMetadata ?? null;
    this.store = deps.store ?? null;
    this.calibrationEngine = deps.calibrationEngine ?? new CalibrationEngine();
    this.measurementEngine = deps.measurementEngine ?? new MeasurementEngine();
    this.logger = deps.logger ?? createConsoleLogger("SessionManager");
    this.minConfidence = deps.minConfidence ?? DEFAULT_MIN_CONFIDENCE;
    this.conflictTolerance = deps.conflictTolerance ?? DEFAULT_CONFLICT_TOLERANCE;
    this.gracePeriodMs = deps.gracePeriodMs ?? DEFAULT_GRACE_PERIOD_MS;
    this.maxRetakes = deps.maxRetakes ?? DEFAULT_MAX_RETAKES;

    this.logger.info(
      `Plan "${this.plan.name}" with ${Object.keys(this.plan.measurements).length} measurements; ` +
      `mesh: ${this.meshMetadata ? this.meshMetadata.meshId : "disabled"}; ` +
      `store: ${this.store ? "enabled" : "disabled"}`,
    );
  }

  // ─── Session lifecycle ──────────────────────────────────────────────────────

  /**
   * Creates a new capture session in the CAPTURED state.
   * @throws Error if userId is empty or heightCm is not a positive number.
   */
  createSession(userId: string, heightCm: number): Readonly<CaptureSession> {
    return snapshot(this.openSession(userId, heightCm, null, 0));
  }

  private openSession(userId: string, heightCm: number, retakeOf: string | null, retakeCount: number): CaptureSession {
    if (userId.trim().length === 0) {
      throw new Error("Cannot create a capture session without a user id");
    }
    assertStorableId(userId, "user id");
    if (!isPositiveFinite(heightCm)) {
      throw new Error(`Invalid height: ${heightCm}. Must be a positive number of centimetres.`);
    }

    const session: CaptureSession = {
      id: uuidv4(),
      userId,
      heightCm,
      state: VerificationState.CAPTURED,
      frames: {},
      viewSets: [],
      reconciled: null,
      meshParameters: null,
      retakeOf,
      retakeCount,
      retakeProposed: false,
      supersededBy: null,
      abandoned: false,
      createdAt: new Date(),
    };

    this.sessions.set(session.id, session);
    this.logger.info(
      `Session ${session.id} created for user ${userId}` +
      (retakeOf ? ` (retake ${retakeCount} of ${retakeOf})` : ""),
    );
    return session;
  }

  /**
   * A read-only copy of the session as it is now.
   * @throws Error if the session does not exist.
   */
  getSession(sessionId: string): Readonly<CaptureSession> {
    return snapshot(this.requireSession(sessionId));
  }

  private requireSession(sessionId: string): CaptureSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new Error(`Session not found: ${sessionId}`);
    }
    return session;
  }

  /**
   * Registers the listener that receives this session's events.
   * A retake session inherits its predecessor's listener.
   */
  registerEventListener(sessionId: string, listener: SessionEventListener): void {
    this.requireSession(sessionId);
    this.listeners.set(sessionId, listener);
  }

  /** Drops a session from memory and cancels its timer. Unknown ids are ignored. */
  closeSession(sessionId: string): void {
    this.cancelGraceTimer(sessionId);
    this.listeners.delete(sessionId);
    if (this.sessions.delete(sessionId)) {
      this.logger.info(`Session ${sessionId} closed`);
    }
  }

  // ─── Capture ────────────────────────────────────────────────────────────────

  /**
   * Validates and calibrates one frame. An accepted frame replaces any earlier
   * frame of the same view. A rejected frame leaves the session in CAPTURED
   * and is reported through a frame_rejected event.
   *
   * @returns true when the frame was accepted
   * @throws Error if the session is not in CAPTURED state
   */
  submitFrame(sessionId: string, frame: KeypointFrame): Promise<boolean> {
    return this.lock.runExclusive(sessionId, () => {
      const session = this.requireSession(sessionId);
      this.requireState(session, VerificationState.CAPTURED, "submit frames");

      const validation = validateFrame(frame, {
        requiredJoints: requiredJointsFor(this.plan, frame.view),
        minConfidence: this.minConfidence,
      });

      if (!validation.valid) {
        const { reason, joint, message } = validation.rejection;
        this.logger.warn(`Frame ${frame.frameId} rejected for session ${sessionId}: ${reason} (${message})`);
        this.emit(sessionId, { type: "frame_rejected", sessionId, frameId: frame.frameId, reason, joint, message });
        return false;
      }

      const calibrated = this.calibrationEngine.calibrate(
        validation.frame,
        referenceFromHeight(session.heightCm, this.plan),
      );

      if (!calibrated.ok) {
        const { kind, message } = calibrated.error;
        this.logger.warn(`Frame ${frame.frameId} rejected for session ${sessionId}: ${kind} (${message})`);
        this.emit(sessionId, { type: "frame_rejected", sessionId, frameId: frame.frameId, reason: kind, joint: null, message });
        return false;
      }

      session.frames[frame.view] = { frame: validation.frame, calibration: calibrated.calibration };
      this.logger.info(
        `Frame ${frame.frameId} (${frame.view}) accepted for session ${sessionId}: ` +
        `${calibrated.calibration.scaleFactor.toFixed(4)} cm/px`,
      );
      this.emit(sessionId, {
        type: "frame_accepted",
        sessionId,
        frameId: frame.frameId,
        view: frame.view,
        scaleFactor: calibrated.calibration.scaleFactor,
      });
      return true;
    });
  }

  /**
   * Computes the per-view measurement sets, reconciles them and moves the
   * session to PENDING_REVIEW. An inaccurate result starts the grace timer.
   *
   * @throws Error if the session is not in CAPTURED state or has no front frame
   */
  processCapture(sessionId: string): Promise<ReconciledMeasurementSet> {
    return this.lock.runExclusive(sessionId, () => {
      const session = this.requireSession(sessionId);
      this.requireState(session, VerificationState.CAPTURED, "process the capture");

      const { front, side } = session.frames;
      if (!front) {
        throw new Error(`Session ${sessionId} needs an accepted front frame before processing`);
      }

      const context = { userId: session.userId, captureSessionId: session.id };
      const viewSets: MeasurementSet[] = [this.measurementEngine.compute({ primary: front }, this.plan, context)];
      if (side) {
        viewSets.push(this.measurementEngine.compute({ primary: side }, this.plan, context));
        viewSets.push(this.measurementEngine.compute({ primary: front, side }, this.plan, context));
      }

      const reconciled = aggregateViews(viewSets, {
        tolerance: this.conflictTolerance,
        accuracyThreshold: this.measurementEngine.threshold,
      });

      session.viewSets = viewSets;
      session.reconciled = reconciled;
      this.transition(session, VerificationState.PENDING_REVIEW);

      if (reconciled.conflicts.length > 0) {
        this.logger.warn(`Session ${sessionId} has conflicting measurements: ${reconciled.conflicts.join(", ")}`);
      }
      this.emit(sessionId, { type: "review_ready", sessionId, measurements: reconciled });

      if (!reconciled.isAccurate) {
        this.scheduleRetakeProposal(session);
      }

      return reconciled;
    });
  }

  // ─── Review ─────────────────────────────────────────────────────────────────

  /**
   * User confirmation: PENDING_REVIEW → ACCEPTED.
   * The record is marked verified, frozen, persisted, and used to compute the
   * mesh parameters. If persistence fails the session stays in PENDING_REVIEW.
   *
   * @throws Error if the session is not in PENDING_REVIEW state
   */
  confirm(sessionId: string): Promise<ReconciledMeasurementSet> {
    return this.lock.runExclusive(sessionId, async () => {
      const session = this.requireSession(sessionId);
      this.requireState(session, VerificationState.PENDING_REVIEW, "confirm measurements");
      this.cancelGraceTimer(sessionId);

      const pending = session.reconciled;
      if (!pending) {
        throw new Error(`Session ${sessionId} has no measurements to confirm`);
      }

      const issues = validateMeasurementSet(pending, this.plan);
      if (issues.length > 0) {
        throw new Error(`Measurements for session ${sessionId} do not match plan "${this.plan.name}": ${issues.join("; ")}`);
      }

      const accepted = freezeRecord({ ...pending, verifiedByUser: true, updatedAt: new Date() });
      const mesh = this.meshMetadata ? freezeMesh(parametrizeMesh(accepted, this.meshMetadata)) : null;

      if (this.store) {
        const paths = await this.store.saveAccepted(accepted, mesh);
        this.logger.info(`Session ${sessionId} measurements saved: ${paths.join(", ")}`);
      }

      session.reconciled = accepted;
      session.meshParameters = mesh;
      this.transition(session, VerificationState.ACCEPTED);
      this.emit(sessionId, { type: "measurements_accepted", sessionId, measurements: accepted });

      if (mesh) {
        for (const warning of mesh.warnings) {
          this.logger.warn(
            `Session ${sessionId}: ${warning.measurement}=${warning.valueCm.toFixed(1)}cm is outside ` +
            `mesh axis "${warning.axis}" range [${warning.minCm}, ${warning.maxCm}]`,
          );
        }
        this.emit(sessionId, { type: "mesh_ready", sessionId, parameters: mesh });
      }

      return accepted;
    });
  }

  /**
   * User rejection: PENDING_REVIEW → RETAKING. The pending measurements are
   * discarded without being persisted.
   */
  reject(sessionId: string): Promise<void> {
    return this.lock.runExclusive(sessionId, () => {
      const session = this.requireSession(sessionId);
      this.requireState(session, VerificationState.PENDING_REVIEW, "reject measurements");
      this.enterRetaking(session, "rejected by user");
    });
  }

  /**
   * Accepts a retake the system proposed after the grace period:
   * PENDING_REVIEW → RETAKING.
   *
   * @throws Error if no retake has been proposed for the session
   */
  acknowledgeRetake(sessionId: string): Promise<void> {
    return this.lock.runExclusive(sessionId, () => {
      const session = this.requireSession(sessionId);
      this.requireState(session, VerificationState.PENDING_REVIEW, "acknowledge a retake");
      if (!session.retakeProposed) {
        throw new Error(`No retake has been proposed for session ${sessionId}; use reject to discard the measurements`);
      }
      this.enterRetaking(session, "proposed retake acknowledged");
    });
  }

  private enterRetaking(session: CaptureSession, reason: string): void {
    this.cancelGraceTimer(session.id);
    session.reconciled = null;
    session.viewSets = [];
    this.transition(session, VerificationState.RETAKING);
    this.logger.info(`Session ${session.id} retaking: ${reason}`);
  }

  // ─── Retake ─────────────────────────────────────────────────────────────────

  /**
   * Opens a fresh capture session for a session in RETAKING.
   * Past the retake limit the old session moves to FAILED, a capture_failed
   * event is emitted, and null is returned.
   *
   * @throws Error if the session is not in RETAKING state, was abandoned or
   *   already has a follow-up session
   */
  startRetake(sessionId: string): Promise<Readonly<CaptureSession> | null> {
    return this.lock.runExclusive(sessionId, () => {
      const previous = this.requireSession(sessionId);
      this.requireState(previous, VerificationState.RETAKING, "start a retake");
      this.requireOpenRetake(previous);

      const retakeCount = previous.retakeCount + 1;
      if (retakeCount > this.maxRetakes) {
        this.transition(previous, VerificationState.FAILED);
        const message =
          `Retake limit of ${this.maxRetakes} reached for user ${previous.userId}; ` +
          `adjust the confidence threshold or measurement plan before trying again`;
        this.logger.error(`Session ${sessionId} failed: ${message}`);
        this.emit(sessionId, { type: "capture_failed", sessionId, retakeCount: previous.retakeCount, message });
        return null;
      }

      const next = this.openSession(previous.userId, previous.heightCm, previous.id, retakeCount);
      previous.supersededBy = next.id;

      const listener = this.listeners.get(previous.id);
      if (listener) this.listeners.set(next.id, listener);

      return snapshot(next);
    });
  }

  /** Ends a RETAKING session without a follow-up capture. Terminal. */
  abandon(sessionId: string): Promise<void> {
    return this.lock.runExclusive(sessionId, () => {
      const session = this.requireSession(sessionId);
      this.requireState(session, VerificationState.RETAKING, "abandon the session");
      this.requireOpenRetake(session);
      session.abandoned = true;
      this.logger.info(`Session ${sessionId} abandoned by user ${session.userId}`);
    });
  }

  private requireOpenRetake(session: CaptureSession): void {
    if (session.abandoned) {
      throw new Error(`Session ${session.id} was abandoned`);
    }
    if (session.supersededBy) {
      throw new Error(`Session ${session.id} was already retaken as ${session.supersededBy}`);
    }
  }

  // ─── Grace timer ────────────────────────────────────────────────────────────

  private scheduleRetakeProposal(session: CaptureSession): void {
    this.cancelGraceTimer(session.id);

    const timer = setTimeout(() => {
      this.graceTimers.delete(session.id);
      const current = this.sessions.get(session.id);
      if (!current || current.state !== VerificationState.PENDING_REVIEW) return;

      current.retakeProposed = true;
      const conflicts = current.reconciled?.conflicts ?? [];
      this.logger.info(`Session ${session.id}: no review after ${this.gracePeriodMs}ms, proposing a retake`);
      this.emit(session.id, { type: "retake_proposed", sessionId: session.id, conflicts: [...conflicts] });
    }, this.gracePeriodMs);

    this.graceTimers.set(session.id, timer);
  }

  private cancelGraceTimer(sessionId: string): void {
    const timer = this.graceTimers.get(sessionId);
    if (timer !== undefined) {
      clearTimeout(timer);
      this.graceTimers.delete(sessionId);
    }
  }

  /** True while a retake proposal is scheduled for the session. */
  hasPendingRetakeProposal(sessionId: string): boolean {
    return this.graceTimers.has(sessionId);
  }

  // ─── State machine helpers ──────────────────────────────────────────────────

  private requireState(session: CaptureSession, expected: VerificationState, action: string): void {
    if (session.state !== expected) {
      throw new Error(
        `Cannot ${action}: session is in "${session.state}" state. ` +
        `This is only possible in "${expected}" state.`,
      );
    }
  }

  private transition(session: CaptureSession, to: VerificationState): void {
    const from = session.state;
    const allowed = VALID_TRANSITIONS.get(from) ?? [];
    if (!allowed.includes(to)) {
      throw new Error(`Invalid transition for session ${session.id}: "${from}" → "${to}"`);
    }
    session.state = to;
    this.emit(session.id, { type: "state_change", sessionId: session.id, from, to });
  }

  private emit(sessionId: string, event: SessionEvent): void {
    const listener = this.listeners.get(sessionId);
    if (!listener) return;
    try {
      listener(event);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`Event listener for session ${sessionId} failed on "${event.type}": ${message}`);
    }
  }
}
