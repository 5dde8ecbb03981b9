// Body Measurement Pipeline - Calibration Engine
// Derives the per-frame pixel → centimetre scale factor from a known
// physical length (the user's height) and the two joints spanning it.
//
// The scale factor is never cached: camera distance and zoom change between
// captures, so every frame is calibrated on its own.

import type {
  Calibration,
  CalibrationReference,
  CalibrationResult,
  MeasurementPlan,
  ValidatedFrame,
} from "./types.js";
import { isPositiveFinite, pixelDistance } from "./utils.js";

/** Degenerate detections shorter than this (px) are refused. */
export const DEFAULT_MIN_PIXEL_DISTANCE = 20;

/** Builds the calibration reference for a user of the given height. */
export function referenceFromHeight(heightCm: number, plan: MeasurementPlan): CalibrationReference {
  return {
    physicalLengthCm: heightCm,
    jointA: plan.calibration.jointA,
    jointB: plan.calibration.jointB,
  };
}

export class CalibrationEngine {
  private readonly minPixelDistance: number;

  constructor(minPixelDistance: number = DEFAULT_MIN_PIXEL_DISTANCE) {
    if (!Number.isFinite(minPixelDistance) || minPixelDistance < 0) {
      throw new Error(`Invalid minPixelDistance: ${minPixelDistance}. Must be a non-negative number.`);
    }
    this.minPixelDistance = minPixelDistance;
  }

  calibrate(validated: ValidatedFrame, reference: CalibrationReference): CalibrationResult {
    const { frame } = validated;

    if (!isPositiveFinite(reference.physicalLengthCm)) {
      return this.fail(`Reference length ${reference.physicalLengthCm}cm is not a positive number`);
    }

    const a = frame.keypoints[reference.jointA];
    const b = frame.keypoints[reference.jointB];
    if (!a || !b) {
      const missing = !a ? reference.jointA : reference.jointB;
      return this.fail(`Frame ${frame.frameId} has no "${missing}" joint to calibrate against`);
    }

    const distance = pixelDistance(a, b);
    if (!(distance > 0) || distance < this.minPixelDistance) {
      return this.fail(
        `Reference span ${distance.toFixed(2)}px in frame ${frame.frameId} is below the ` +
        `${this.minPixelDistance}px minimum`,
      );
    }

    const calibration: Calibration = {
      frameId: frame.frameId,
      scaleFactor: reference.physicalLengthCm / distance,
      pixelDistance: distance,
      referenceLengthCm: reference.physicalLengthCm,
      confidence: Math.min(a.confidence, b.confidence),
    };

    return { ok: true, calibration };
  }

  private fail(message: string): CalibrationResult {
    return { ok: false, error: { kind: "InvalidCalibration", message } };
  }
}
