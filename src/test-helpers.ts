// Shared fixtures for the unit tests: a small measurement plan and a pair of
// front/side keypoint frames whose geometry gives round numbers.
//
// Both frames put head_top and left_ankle 850px apart, so a 170cm user
// calibrates to exactly 0.2 cm/px:
//   front: shoulders 225px → 45cm, torso 300px → 60cm, waist width 160px → 32cm
//   side:  torso 300px → 60cm, waist depth 120px → 24cm

import { vi } from "vitest";
import type {
  CalibratedFrame,
  CaptureView,
  JointName,
  Keypoint,
  KeypointFrame,
  MeasurementPlan,
  ReferenceMeshMetadata,
} from "./types.js";
import type { Logger } from "./logger.js";

export const TEST_HEIGHT_CM = 170;

export const TEST_PLAN: MeasurementPlan = {
  name: "test-plan",
  calibration: { jointA: "head_top", jointB: "left_ankle" },
  measurements: {
    shoulder_width: { kind: "linear", path: ["left_shoulder", "right_shoulder"], views: ["front"] },
    torso_length: { kind: "linear", path: ["left_shoulder", "left_hip"], views: ["front", "side"] },
    waist: {
      kind: "circumference",
      width: ["waist_left", "waist_right"],
      depth: ["waist_front", "waist_back"],
      widthScale: 1,
      depthScale: 1,
    },
  },
};

export const TEST_MESH: ReferenceMeshMetadata = {
  meshId: "test-mesh",
  axes: {
    shoulders: { measurement: "shoulder_width", minCm: 30, maxCm: 55 },
    waist: { measurement: "waist", minCm: 55, maxCm: 135 },
    neck: { measurement: "neck", minCm: 30, maxCm: 50 },
  },
};

const point = (x: number, y: number, confidence = 0.9): Keypoint => ({ x, y, confidence });

export function frontKeypoints(): Record<JointName, Keypoint> {
  return {
    head_top: point(500, 50),
    left_ankle: point(500, 900),
    left_shoulder: point(400, 200),
    right_shoulder: point(625, 200),
    left_hip: point(400, 500),
    waist_left: point(420, 450),
    waist_right: point(580, 450),
  };
}

export function sideKeypoints(): Record<JointName, Keypoint> {
  return {
    head_top: point(500, 100),
    left_ankle: point(500, 950),
    left_shoulder: point(500, 250),
    left_hip: point(500, 550),
    waist_front: point(440, 500),
    waist_back: point(560, 500),
  };
}

export interface FrameOptions {
  frameId?: string;
  keypoints?: Record<JointName, Keypoint>;
  width?: number;
  height?: number;
  capturedAt?: Date;
}

export function makeFrame(view: CaptureView, options: FrameOptions = {}): KeypointFrame {
  return {
    frameId: options.frameId ?? `${view}-1`,
    view,
    width: options.width ?? 1000,
    height: options.height ?? 1000,
    capturedAt: options.capturedAt ?? new Date("2026-03-01T10:00:00.000Z"),
    keypoints: options.keypoints ?? (view === "front" ? frontKeypoints() : sideKeypoints()),
  };
}

/** Wraps a frame as if it had passed validation and calibration. */
export function toCalibrated(frame: KeypointFrame, scaleFactor = 0.2): CalibratedFrame {
  return {
    frame: { frame, checkedJoints: Object.keys(frame.keypoints) },
    calibration: {
      frameId: frame.frameId,
      scaleFactor,
      pixelDistance: TEST_HEIGHT_CM / scaleFactor,
      referenceLengthCm: TEST_HEIGHT_CM,
      confidence: 0.9,
    },
  };
}

/** Silent logger for tests */
export function createSilentLogger(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}
