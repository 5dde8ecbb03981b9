// Body Measurement Pipeline - Measurement Computation Engine
// Converts calibrated keypoint distances into named body measurements.
//
// Two physical models:
//   - linear:        pixel path length × scale factor
//   - circumference: Ramanujan ellipse from a front-view width (semi-axis a)
//                    and a side-view depth (semi-axis b). Without a side view,
//                    b is inferred from a and the field is flagged
//                    estimatedFromFrontOnly with reduced confidence.
//
// compute() is a pure function of (frames, calibrations, plan): identical
// inputs always give an identical MeasurementSet, and frames are never mutated.

import type {
  CalibratedFrame,
  CaptureView,
  CircumferenceModel,
  JointName,
  Keypoint,
  KeypointFrame,
  LinearModel,
  MeasurementPlan,
  MeasurementSet,
  MeasurementValue,
  PoseType,
} from "./types.js";
import { ellipseCircumference, pixelDistance, pixelPathLength } from "./utils.js";

// ─── Defaults ───────────────────────────────────────────────────────────────────

export const DEFAULT_ACCURACY_THRESHOLD = 0.5;
/** Typical torso depth / width ratio used when no side view exists. */
export const DEFAULT_FRONT_ONLY_DEPTH_RATIO = 0.7;
export const DEFAULT_FRONT_ONLY_CONFIDENCE_PENALTY = 0.5;

export interface MeasurementEngineOptions {
  /** A field counts as accurate only when its confidence exceeds this. */
  accuracyThreshold?: number;
  frontOnlyDepthRatio?: number;
  frontOnlyConfidencePenalty?: number;
}

export interface MeasurementInput {
  /** Front frame for front/combined sets; a side frame for side-only sets. */
  primary: CalibratedFrame;
  /** Side frame supplying circumference depth. Requires a front primary. */
  side?: CalibratedFrame;
}

export interface MeasurementContext {
  userId: string;
  captureSessionId: string;
}

// ─── Measurement Engine ─────────────────────────────────────────────────────────

export class MeasurementEngine {
  private readonly accuracyThreshold: number;
  private readonly frontOnlyDepthRatio: number;
  private readonly frontOnlyConfidencePenalty: number;

  constructor(options: MeasurementEngineOptions = {}) {
    this.accuracyThreshold = options.accuracyThreshold ?? DEFAULT_ACCURACY_THRESHOLD;
    this.frontOnlyDepthRatio = options.frontOnlyDepthRatio ?? DEFAULT_FRONT_ONLY_DEPTH_RATIO;
    this.frontOnlyConfidencePenalty =
      options.frontOnlyConfidencePenalty ?? DEFAULT_FRONT_ONLY_CONFIDENCE_PENALTY;
  }

  get threshold(): number {
    return this.accuracyThreshold;
  }

  /**
   * Compute one MeasurementSet from a primary frame and an optional side frame.
   * @throws Error when the views are combined incorrectly or a frame lacks a
   *   joint the plan needs (i.e. it was validated against a different plan).
   */
  compute(input: MeasurementInput, plan: MeasurementPlan, context: MeasurementContext): MeasurementSet {
    const { primary, side } = input;
    const primaryView = primary.frame.frame.view;

    if (side) {
      if (primaryView !== "front") {
        throw new Error(`A side frame can only be combined with a front frame, got a "${primaryView}" primary`);
      }
      if (side.frame.frame.view !== "side") {
        throw new Error(`Expected a side frame, got "${side.frame.frame.view}" (frame ${side.frame.frame.frameId})`);
      }
    }

    const poseType: PoseType = side ? "combined" : primaryView;
    const fields: Record<string, MeasurementValue> = {};

    for (const [name, model] of Object.entries(plan.measurements)) {
      if (model.kind === "linear") {
        const source = this.linearSource(model, primary, side);
        if (source) fields[name] = this.measureLinear(name, model, source);
      } else if (primaryView === "front") {
        fields[name] = this.measureCircumference(name, model, primary, side);
      }
    }

    const values = Object.values(fields);
    const isAccurate =
      values.length > 0 &&
      values.every((v) => v.confidence > this.accuracyThreshold && !v.estimatedFromFrontOnly);

    const frames = side ? [primary, side] : [primary];
    const latest = Math.max(...frames.map((f) => f.frame.frame.capturedAt.getTime()));

    return {
      userId: context.userId,
      captureSessionId: context.captureSessionId,
      poseType,
      calibrationRatio: primary.calibration.scaleFactor,
      fields,
      isAccurate,
      verifiedByUser: false,
      sourceFrameIds: frames.map((f) => f.frame.frame.frameId),
      createdAt: new Date(latest),
      updatedAt: new Date(latest),
    };
  }

  // ── Linear ──────────────────────────────────────────────────────────────────

  /** Front frame wins when the length is observable from both views. */
  private linearSource(
    model: LinearModel,
    primary: CalibratedFrame,
    side: CalibratedFrame | undefined,
  ): CalibratedFrame | null {
    const candidates = side ? [primary, side] : [primary];
    const observable = (view: CaptureView) => model.views.includes(view);
    return candidates.find((c) => observable(c.frame.frame.view)) ?? null;
  }

  private measureLinear(name: string, model: LinearModel, source: CalibratedFrame): MeasurementValue {
    const points = model.path.map((joint) => requireJoint(source.frame.frame, joint, name));
    return {
      valueCm: pixelPathLength(points) * source.calibration.scaleFactor,
      confidence: minConfidence(points),
      model: "linear",
      estimatedFromFrontOnly: false,
    };
  }

  // ── Circumference ───────────────────────────────────────────────────────────

  private measureCircumference(
    name: string,
    model: CircumferenceModel,
    front: CalibratedFrame,
    side: CalibratedFrame | undefined,
  ): MeasurementValue {
    const widthPoints = model.width.map((joint) => requireJoint(front.frame.frame, joint, name));
    const widthCm = pixelDistance(widthPoints[0], widthPoints[1]) * front.calibration.scaleFactor;
    const a = (widthCm / 2) * model.widthScale;

    if (!side) {
      const b = a * this.frontOnlyDepthRatio;
      return {
        valueCm: ellipseCircumference(a, b),
        confidence: minConfidence(widthPoints) * this.frontOnlyConfidencePenalty,
        model: "circumference",
        estimatedFromFrontOnly: true,
      };
    }

    const depthPoints = model.depth.map((joint) => requireJoint(side.frame.frame, joint, name));
    const depthCm = pixelDistance(depthPoints[0], depthPoints[1]) * side.calibration.scaleFactor;
    const b = (depthCm / 2) * model.depthScale;

    return {
      valueCm: ellipseCircumference(a, b),
      confidence: Math.min(minConfidence(widthPoints), minConfidence(depthPoints)),
      model: "circumference",
      estimatedFromFrontOnly: false,
    };
  }
}

// ─── Helpers ────────────────────────────────────────────────────────────────────

function requireJoint(frame: KeypointFrame, joint: JointName, measurement: string): Readonly<Keypoint> {
  const point = frame.keypoints[joint];
  if (!point) {
    throw new Error(
      `Frame ${frame.frameId} has no "${joint}" joint needed for "${measurement}"; ` +
      `validate frames against the same measurement plan`,
    );
  }
  return point;
}

function minConfidence(points: ReadonlyArray<Readonly<Keypoint>>): number {
  return Math.min(...points.map((p) => p.confidence));
}
