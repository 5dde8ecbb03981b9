import { describe, it, expect } from "vitest";
import { validateFrame, DEFAULT_MIN_CONFIDENCE } from "./frame-validator.js";
import { frontKeypoints, makeFrame } from "./test-helpers.js";

const REQUIRED = ["head_top", "left_ankle", "left_shoulder"];

describe("validateFrame()", () => {
  it("accepts a frame whose required joints are present, confident and in bounds", () => {
    const frame = makeFrame("front");
    const result = validateFrame(frame, { requiredJoints: REQUIRED });

    expect(result.valid).toBe(true);
    if (!result.valid) return;
    expect(result.frame.frame).toBe(frame);
    expect(result.frame.checkedJoints).toEqual(REQUIRED);
  });

  it("ignores joints the config does not require", () => {
    const keypoints = { ...frontKeypoints(), nose: { x: -50, y: 20, confidence: 0.1 } };
    const result = validateFrame(makeFrame("front", { keypoints }), { requiredJoints: REQUIRED });

    expect(result.valid).toBe(true);
  });

  it("rejects a missing joint with MissingJoint", () => {
    const keypoints = frontKeypoints();
    delete keypoints.left_shoulder;
    const result = validateFrame(makeFrame("front", { keypoints }), { requiredJoints: REQUIRED });

    expect(result.valid).toBe(false);
    if (result.valid) return;
    expect(result.rejection).toEqual({
      reason: "MissingJoint",
      joint: "left_shoulder",
      message: 'Joint "left_shoulder" was not detected in frame front-1',
    });
  });

  it("does not treat inherited object keys as detected joints", () => {
    const result = validateFrame(makeFrame("front"), { requiredJoints: ["toString"] });

    expect(result.valid).toBe(false);
    if (result.valid) return;
    expect(result.rejection.reason).toBe("MissingJoint");
  });

  it("rejects confidence below the default threshold of 0.5", () => {
    const keypoints = { ...frontKeypoints(), head_top: { x: 500, y: 50, confidence: 0.49 } };
    const result = validateFrame(makeFrame("front", { keypoints }), { requiredJoints: REQUIRED });

    expect(DEFAULT_MIN_CONFIDENCE).toBe(0.5);
    expect(result.valid).toBe(false);
    if (result.valid) return;
    expect(result.rejection.reason).toBe("LowConfidence");
    expect(result.rejection.joint).toBe("head_top");
    expect(result.rejection.message).toBe('Joint "head_top" confidence 0.49 is below 0.5');
  });

  it("accepts confidence exactly at the threshold", () => {
    const keypoints = { ...frontKeypoints(), head_top: { x: 500, y: 50, confidence: 0.5 } };
    const result = validateFrame(makeFrame("front", { keypoints }), { requiredJoints: REQUIRED });

    expect(result.valid).toBe(true);
  });

  it("honours a custom minConfidence", () => {
    const result = validateFrame(makeFrame("front"), { requiredJoints: REQUIRED, minConfidence: 0.95 });

    expect(result.valid).toBe(false);
    if (result.valid) return;
    expect(result.issues.map((i) => i.reason)).toEqual(["LowConfidence", "LowConfidence", "LowConfidence"]);
  });

  it("rejects NaN confidence", () => {
    const keypoints = { ...frontKeypoints(), left_ankle: { x: 500, y: 900, confidence: Number.NaN } };
    const result = validateFrame(makeFrame("front", { keypoints }), { requiredJoints: REQUIRED });

    expect(result.valid).toBe(false);
    if (result.valid) return;
    expect(result.rejection.reason).toBe("LowConfidence");
  });

  it("rejects coordinates outside the frame with OutOfBounds", () => {
    const keypoints = { ...frontKeypoints(), left_ankle: { x: 500, y: 1001, confidence: 0.9 } };
    const result = validateFrame(makeFrame("front", { keypoints }), { requiredJoints: REQUIRED });

    expect(result.valid).toBe(false);
    if (result.valid) return;
    expect(result.rejection).toEqual({
      reason: "OutOfBounds",
      joint: "left_ankle",
      message: 'Joint "left_ankle" at (500, 1001) lies outside the 1000x1000 frame',
    });
  });

  it("accepts coordinates exactly on the frame edge", () => {
    const keypoints = { ...frontKeypoints(), left_ankle: { x: 1000, y: 0, confidence: 0.9 } };
    const result = validateFrame(makeFrame("front", { keypoints }), { requiredJoints: REQUIRED });

    expect(result.valid).toBe(true);
  });

  it("rejects non-finite coordinates", () => {
    const keypoints = { ...frontKeypoints(), left_shoulder: { x: Number.POSITIVE_INFINITY, y: 200, confidence: 0.9 } };
    const result = validateFrame(makeFrame("front", { keypoints }), { requiredJoints: REQUIRED });

    expect(result.valid).toBe(false);
    if (result.valid) return;
    expect(result.rejection.reason).toBe("OutOfBounds");
  });

  it("collects every issue and reports the first required joint's as the rejection", () => {
    const keypoints = frontKeypoints();
    delete keypoints.left_shoulder;
    keypoints.head_top = { x: -1, y: 50, confidence: 0.9 };
    const result = validateFrame(makeFrame("front", { keypoints }), { requiredJoints: REQUIRED });

    expect(result.valid).toBe(false);
    if (result.valid) return;
    expect(result.issues.map((i) => [i.reason, i.joint])).toEqual([
      ["OutOfBounds", "head_top"],
      ["MissingJoint", "left_shoulder"],
    ]);
    expect(result.rejection).toBe(result.issues[0]);
  });

  it("does not mutate the frame", () => {
    const frame = makeFrame("front");
    const before = JSON.stringify(frame);
    validateFrame(frame, { requiredJoints: [...REQUIRED, "missing_joint"] });

    expect(JSON.stringify(frame)).toBe(before);
  });
});
