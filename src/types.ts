// Body Measurement Pipeline - Shared TypeScript interfaces and types
// Keypoint frames in, measurement records and mesh parameters out.

// ─── Views & Joints ─────────────────────────────────────────────────────────────

/** Camera view a single frame was captured from. */
export type CaptureView = "front" | "side";

/** View a measurement set describes; "combined" merges front and side. */
export type PoseType = CaptureView | "combined";

/** Named anatomical landmark, e.g. "left_shoulder". */
export type JointName = string;

/** Named body measurement, e.g. "shoulder_width". */
export type MeasurementName = string;

// ─── Keypoint Frame ─────────────────────────────────────────────────────────────

export interface Keypoint {
  x: number; // pixels from the left edge
  y: number; // pixels from the top edge
  z?: number; // detector-relative depth, not in pixels
  confidence: number; // 0-1
}

export interface KeypointFrame {
  readonly frameId: string;
  readonly view: CaptureView;
  readonly width: number;
  readonly height: number;
  readonly capturedAt: Date;
  readonly keypoints: Readonly<Record<JointName, Readonly<Keypoint>>>;
}

// ─── Validation ─────────────────────────────────────────────────────────────────

export type FrameRejectionReason = "MissingJoint" | "LowConfidence" | "OutOfBounds";

export interface FrameRejection {
  reason: FrameRejectionReason;
  joint: JointName;
  message: string;
}

/** A frame that passed validation for a specific required-joint set. */
export interface ValidatedFrame {
  readonly frame: KeypointFrame;
  readonly checkedJoints: readonly JointName[];
}

export type FrameValidationResult =
  | { valid: true; frame: ValidatedFrame }
  | { valid: false; rejection: FrameRejection; issues: FrameRejection[] };

export interface FrameValidatorConfig {
  requiredJoints: readonly JointName[];
  /** Minimum joint confidence. Default: 0.5. */
  minConfidence?: number;
}

// ─── Calibration ────────────────────────────────────────────────────────────────

export interface CalibrationReference {
  physicalLengthCm: number;
  jointA: JointName;
  jointB: JointName;
}

export interface Calibration {
  frameId: string;
  scaleFactor: number; // cm per pixel, always > 0
  pixelDistance: number;
  referenceLengthCm: number;
  confidence: number; // min confidence of the two reference joints
}

export interface CalibrationFailure {
  kind: "InvalidCalibration";
  message: string;
}

export type CalibrationResult =
  | { ok: true; calibration: Calibration }
  | { ok: false; error: CalibrationFailure };

/** A validated frame together with its per-frame calibration. */
export interface CalibratedFrame {
  frame: ValidatedFrame;
  calibration: Calibration;
}

// ─── Measurement Plan ───────────────────────────────────────────────────────────

export interface LinearModel {
  kind: "linear";
  /** Two joints for a straight distance, more for a summed path. */
  path: JointName[];
  /** Views this length is observable from. Default: ["front"]. */
  views: CaptureView[];
}

export interface CircumferenceModel {
  kind: "circumference";
  /** Front-view joints spanning the body width. */
  width: [JointName, JointName];
  /** Side-view joints spanning the body depth. */
  depth: [JointName, JointName];
  /** Converts joint width to surface width (joints sit inside the body). */
  widthScale: number;
  depthScale: number;
}

export type MeasurementModel = LinearModel | CircumferenceModel;

export interface MeasurementPlan {
  name: string;
  calibration: { jointA: JointName; jointB: JointName };
  measurements: Record<MeasurementName, MeasurementModel>;
}

// ─── Measurement Sets ───────────────────────────────────────────────────────────

export interface MeasurementValue {
  valueCm: number;
  confidence: number;
  model: MeasurementModel["kind"];
  estimatedFromFrontOnly: boolean;
}

export interface MeasurementSet {
  userId: string;
  captureSessionId: string;
  poseType: PoseType;
  calibrationRatio: number; // cm per pixel of the primary frame
  fields: Record<MeasurementName, MeasurementValue>;
  isAccurate: boolean;
  verifiedByUser: boolean;
  sourceFrameIds: string[];
  createdAt: Date;
  updatedAt: Date;
}

export interface MeasurementCandidate {
  poseType: PoseType;
  valueCm: number;
  confidence: number;
  estimatedFromFrontOnly: boolean;
}

export interface ReconciledField extends MeasurementValue {
  sources: PoseType[];
  conflicting: boolean;
  candidates: MeasurementCandidate[];
}

export interface ReconciledMeasurementSet extends Omit<MeasurementSet, "fields" | "poseType"> {
  poseType: "combined";
  fields: Record<MeasurementName, ReconciledField>;
  conflicts: MeasurementName[];
}

// ─── Mesh ───────────────────────────────────────────────────────────────────────

export interface MeshAxis {
  measurement: MeasurementName;
  minCm: number;
  maxCm: number;
}

export interface ReferenceMeshMetadata {
  meshId: string;
  axes: Record<string, MeshAxis>;
}

export interface OutOfSupportedRangeWarning {
  kind: "OutOfSupportedRange";
  axis: string;
  measurement: MeasurementName;
  valueCm: number;
  minCm: number;
  maxCm: number;
}

export interface MeshParameters {
  meshId: string;
  values: Record<string, number>; // 0-1 per axis
  origins: Record<string, "measured" | "default">;
  warnings: OutOfSupportedRangeWarning[];
}

// ─── Verification State Machine ─────────────────────────────────────────────────

export enum VerificationState {
  CAPTURED = "captured",
  PENDING_REVIEW = "pending_review",
  ACCEPTED = "accepted",
  RETAKING = "retaking",
  FAILED = "failed",
}

export interface CaptureSession {
  id: string;
  userId: string;
  heightCm: number;
  state: VerificationState;
  frames: Partial<Record<CaptureView, CalibratedFrame>>;
  viewSets: MeasurementSet[];
  reconciled: ReconciledMeasurementSet | null;
  meshParameters: MeshParameters | null;
  retakeOf: string | null; // session this one re-captures
  retakeCount: number; // retakes preceding this session
  retakeProposed: boolean;
  supersededBy: string | null; // session started by startRetake()
  abandoned: boolean;
  createdAt: Date;
}

export type SessionEvent =
  | { type: "state_change"; sessionId: string; from: VerificationState; to: VerificationState }
  | { type: "frame_accepted"; sessionId: string; frameId: string; view: CaptureView; scaleFactor: number }
  | {
      type: "frame_rejected";
      sessionId: string;
      frameId: string;
      reason: FrameRejectionReason | CalibrationFailure["kind"];
      joint: JointName | null;
      message: string;
    }
  | { type: "review_ready"; sessionId: string; measurements: ReconciledMeasurementSet }
  | { type: "retake_proposed"; sessionId: string; conflicts: MeasurementName[] }
  | { type: "measurements_accepted"; sessionId: string; measurements: ReconciledMeasurementSet }
  | { type: "mesh_ready"; sessionId: string; parameters: MeshParameters }
  | { type: "capture_failed"; sessionId: string; retakeCount: number; message: string };

export type SessionEventListener = (event: SessionEvent) => void;

// ─── WebSocket Protocol ─────────────────────────────────────────────────────────

/** Wire form of a keypoint frame; capturedAt travels as an ISO string. */
export interface KeypointFramePayload {
  frameId: string;
  view: CaptureView;
  width: number;
  height: number;
  capturedAt: string;
  keypoints: Record<JointName, Keypoint>;
}

// Client → Server messages
export type ClientMessage =
  | { type: "start_session"; userId: string; heightCm: number }
  | { type: "submit_frame"; frame: KeypointFramePayload }
  | { type: "process_capture" }
  | { type: "confirm" }
  | { type: "reject" }
  | { type: "acknowledge_retake" }
  | { type: "start_retake" }
  | { type: "abandon" };

// Server → Client messages
export type ServerMessage =
  | { type: "session_started"; sessionId: string; retakeCount: number }
  | { type: "state_change"; state: VerificationState }
  | { type: "frame_accepted"; frameId: string; view: CaptureView; scaleFactor: number }
  | { type: "frame_rejected"; frameId: string; reason: string; joint: string | null; message: string }
  | { type: "review_ready"; measurements: ReconciledMeasurementSet }
  | { type: "retake_proposed"; conflicts: MeasurementName[] }
  | { type: "measurements_accepted"; measurements: ReconciledMeasurementSet }
  | { type: "mesh_ready"; parameters: MeshParameters }
  | { type: "capture_failed"; retakeCount: number; message: string }
  | { type: "error"; message: string; recoverable: boolean };
