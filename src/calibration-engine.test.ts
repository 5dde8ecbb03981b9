import { describe, it, expect } from "vitest";
import { CalibrationEngine, referenceFromHeight, DEFAULT_MIN_PIXEL_DISTANCE } from "./calibration-engine.js";
import type { CalibrationReference, KeypointFrame, ValidatedFrame } from "./types.js";
import { TEST_PLAN, frontKeypoints, makeFrame } from "./test-helpers.js";

function validated(frame: KeypointFrame): ValidatedFrame {
  return { frame, checkedJoints: Object.keys(frame.keypoints) };
}

const REFERENCE: CalibrationReference = { physicalLengthCm: 170, jointA: "head_top", jointB: "left_ankle" };

describe("referenceFromHeight()", () => {
  it("uses the plan's calibration joints and the user's height", () => {
    expect(referenceFromHeight(182, TEST_PLAN)).toEqual({
      physicalLengthCm: 182,
      jointA: "head_top",
      jointB: "left_ankle",
    });
  });
});

describe("CalibrationEngine", () => {
  const engine = new CalibrationEngine();

  it("derives 0.2 cm/px from a 170cm reference spanning 850px", () => {
    const result = engine.calibrate(validated(makeFrame("front")), REFERENCE);

    expect(result).toEqual({
      ok: true,
      calibration: {
        frameId: "front-1",
        scaleFactor: 0.2,
        pixelDistance: 850,
        referenceLengthCm: 170,
        confidence: 0.9,
      },
    });
  });

  it("reports the lower of the two reference joint confidences", () => {
    const keypoints = { ...frontKeypoints(), left_ankle: { x: 500, y: 900, confidence: 0.6 } };
    const result = engine.calibrate(validated(makeFrame("front", { keypoints })), REFERENCE);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.calibration.confidence).toBe(0.6);
  });

  it("calibrates each frame independently", () => {
    const near = makeFrame("front");
    const farKeypoints = { ...frontKeypoints(), left_ankle: { x: 500, y: 475, confidence: 0.9 } };
    const far = makeFrame("front", { frameId: "front-2", keypoints: farKeypoints });

    const first = engine.calibrate(validated(near), REFERENCE);
    const second = engine.calibrate(validated(far), REFERENCE);

    expect(first.ok && first.calibration.scaleFactor).toBe(0.2);
    expect(second.ok && second.calibration.scaleFactor).toBe(0.4);
  });

  it("fails with InvalidCalibration when the reference joints coincide", () => {
    const keypoints = { ...frontKeypoints(), left_ankle: { x: 500, y: 50, confidence: 0.9 } };
    const result = engine.calibrate(validated(makeFrame("front", { keypoints })), REFERENCE);

    expect(result).toEqual({
      ok: false,
      error: {
        kind: "InvalidCalibration",
        message: "Reference span 0.00px in frame front-1 is below the 20px minimum",
      },
    });
  });

  it("fails when the span is below the minimum pixel distance", () => {
    const keypoints = { ...frontKeypoints(), left_ankle: { x: 500, y: 69, confidence: 0.9 } };
    const result = engine.calibrate(validated(makeFrame("front", { keypoints })), REFERENCE);

    expect(DEFAULT_MIN_PIXEL_DISTANCE).toBe(20);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe("Reference span 19.00px in frame front-1 is below the 20px minimum");
  });

  it("accepts a span exactly at the minimum", () => {
    const keypoints = { ...frontKeypoints(), left_ankle: { x: 500, y: 70, confidence: 0.9 } };
    const result = engine.calibrate(validated(makeFrame("front", { keypoints })), REFERENCE);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.calibration.scaleFactor).toBe(8.5);
  });

  it("still refuses a zero span when the minimum is 0", () => {
    const lenient = new CalibrationEngine(0);
    const keypoints = { ...frontKeypoints(), left_ankle: { x: 500, y: 50, confidence: 0.9 } };
    const result = lenient.calibrate(validated(makeFrame("front", { keypoints })), REFERENCE);

    expect(result.ok).toBe(false);
  });

  it("fails when a reference joint is missing", () => {
    const keypoints = frontKeypoints();
    delete keypoints.head_top;
    const result = engine.calibrate(validated(makeFrame("front", { keypoints })), REFERENCE);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('Frame front-1 has no "head_top" joint to calibrate against');
  });

  it.each([0, -170, Number.NaN])("fails for a reference length of %s", (length) => {
    const result = engine.calibrate(validated(makeFrame("front")), { ...REFERENCE, physicalLengthCm: length });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("InvalidCalibration");
  });

  it("rejects an invalid minimum pixel distance", () => {
    expect(() => new CalibrationEngine(-1)).toThrow(
      "Invalid minPixelDistance: -1. Must be a non-negative number.",
    );
  });
});
