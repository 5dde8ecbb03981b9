// Body Measurement Pipeline - Keypoint Frame Validator
// Checks one detection frame before it is used for calibration or measurement.
//
// For every required joint, in order:
//   1. Present in the frame, else MissingJoint.
//   2. confidence ≥ minConfidence, else LowConfidence.
//   3. Finite coordinates inside [0, width] × [0, height], else OutOfBounds.
//
// All issues are collected; the first one is reported as the rejection.
// Nothing is retried here; re-capture is decided by the session workflow.

import type {
  FrameRejection,
  FrameValidationResult,
  FrameValidatorConfig,
  Keypoint,
  KeypointFrame,
} from "./types.js";

export const DEFAULT_MIN_CONFIDENCE = 0.5;

function isInsideFrame(point: Keypoint, frame: KeypointFrame): boolean {
  return (
    Number.isFinite(point.x) &&
    Number.isFinite(point.y) &&
    point.x >= 0 &&
    point.x <= frame.width &&
    point.y >= 0 &&
    point.y <= frame.height
  );
}

export function validateFrame(frame: KeypointFrame, config: FrameValidatorConfig): FrameValidationResult {
  const minConfidence = config.minConfidence ?? DEFAULT_MIN_CONFIDENCE;
  const issues: FrameRejection[] = [];

  for (const joint of config.requiredJoints) {
    const point = Object.prototype.hasOwnProperty.call(frame.keypoints, joint)
      ? frame.keypoints[joint]
      : undefined;

    if (!point) {
      issues.push({
        reason: "MissingJoint",
        joint,
        message: `Joint "${joint}" was not detected in frame ${frame.frameId}`,
      });
      continue;
    }

    if (!(point.confidence >= minConfidence)) {
      issues.push({
        reason: "LowConfidence",
        joint,
        message: `Joint "${joint}" confidence ${point.confidence} is below ${minConfidence}`,
      });
      continue;
    }

    if (!isInsideFrame(point, frame)) {
      issues.push({
        reason: "OutOfBounds",
        joint,
        message: `Joint "${joint}" at (${point.x}, ${point.y}) lies outside the ${frame.width}x${frame.height} frame`,
      });
    }
  }

  if (issues.length > 0) {
    return { valid: false, rejection: issues[0], issues };
  }

  return {
    valid: true,
    frame: { frame, checkedJoints: [...config.requiredJoints] },
  };
}
