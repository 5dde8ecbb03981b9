import { describe, it, expect } from "vitest";
import {
  parseMeasurementPlan,
  parseReferenceMesh,
  requiredJointsFor,
  validateMeasurementSet,
} from "./measurement-plan.js";
import { TEST_PLAN } from "./test-helpers.js";

function rawPlan(): Record<string, unknown> {
  return {
    name: "raw-plan",
    calibration: { jointA: "head_top", jointB: "left_ankle" },
    measurements: {
      inseam: { kind: "linear", path: ["left_hip", "left_knee", "left_ankle"] },
      hip: { kind: "circumference", width: ["left_hip", "right_hip"], depth: ["hip_front", "hip_back"], widthScale: 1.35 },
    },
  };
}

// ─── parseMeasurementPlan ───────────────────────────────────────────────────────

describe("parseMeasurementPlan()", () => {
  it("parses a plan and fills in defaults", () => {
    expect(parseMeasurementPlan(rawPlan())).toEqual({
      name: "raw-plan",
      calibration: { jointA: "head_top", jointB: "left_ankle" },
      measurements: {
        inseam: { kind: "linear", path: ["left_hip", "left_knee", "left_ankle"], views: ["front"] },
        hip: {
          kind: "circumference",
          width: ["left_hip", "right_hip"],
          depth: ["hip_front", "hip_back"],
          widthScale: 1.35,
          depthScale: 1,
        },
      },
    });
  });

  it("deduplicates listed views", () => {
    const raw = rawPlan();
    raw.measurements = { arm: { kind: "linear", path: ["a", "b"], views: ["side", "front", "side"] } };

    const plan = parseMeasurementPlan(raw);
    expect(plan.measurements.arm).toEqual({ kind: "linear", path: ["a", "b"], views: ["side", "front"] });
  });

  it("rejects a non-object document", () => {
    expect(() => parseMeasurementPlan([])).toThrow("Invalid measurement plan: expected a JSON object");
  });

  it("reports every problem in one error", () => {
    const raw = {
      name: "",
      calibration: { jointA: "head_top", jointB: "head_top" },
      measurements: {
        short: { kind: "linear", path: ["only_one"] },
        odd: { kind: "spiral" },
      },
    };

    expect(() => parseMeasurementPlan(raw)).toThrow(
      "Invalid measurement plan: name must be a non-empty string; " +
      "calibration.jointA and calibration.jointB must differ; " +
      "measurements.short.path must list at least two joints; " +
      'measurements.odd.kind must be "linear" or "circumference"',
    );
  });

  it("rejects unknown views", () => {
    const raw = rawPlan();
    raw.measurements = { arm: { kind: "linear", path: ["a", "b"], views: ["back"] } };

    expect(() => parseMeasurementPlan(raw)).toThrow(
      'Invalid measurement plan: measurements.arm.views must be a non-empty list of "front" | "side"',
    );
  });

  it("rejects malformed circumference models", () => {
    const raw = rawPlan();
    raw.measurements = { chest: { kind: "circumference", width: ["a"], depth: ["b", "c"], depthScale: 0 } };

    expect(() => parseMeasurementPlan(raw)).toThrow(
      "Invalid measurement plan: measurements.chest.width must be a joint pair; " +
      "measurements.chest.depthScale must be a positive number",
    );
  });

  it("rejects an empty measurement list", () => {
    const raw = rawPlan();
    raw.measurements = {};

    expect(() => parseMeasurementPlan(raw)).toThrow("Invalid measurement plan: measurements must be a non-empty object");
  });
});

// ─── requiredJointsFor ──────────────────────────────────────────────────────────

describe("requiredJointsFor()", () => {
  it("lists calibration joints first, then front-view joints in plan order", () => {
    expect(requiredJointsFor(TEST_PLAN, "front")).toEqual([
      "head_top",
      "left_ankle",
      "left_shoulder",
      "right_shoulder",
      "left_hip",
      "waist_left",
      "waist_right",
    ]);
  });

  it("asks side frames for side-visible lengths and circumference depth", () => {
    expect(requiredJointsFor(TEST_PLAN, "side")).toEqual([
      "head_top",
      "left_ankle",
      "left_shoulder",
      "left_hip",
      "waist_front",
      "waist_back",
    ]);
  });
});

// ─── validateMeasurementSet ─────────────────────────────────────────────────────

describe("validateMeasurementSet()", () => {
  it("accepts well-formed fields", () => {
    const fields = {
      shoulder_width: { valueCm: 45, confidence: 0.9, model: "linear" as const, estimatedFromFrontOnly: false },
    };

    expect(validateMeasurementSet({ fields }, TEST_PLAN)).toEqual([]);
  });

  it("reports unknown fields, model mismatches and out-of-range values", () => {
    const fields = {
      neck: { valueCm: 38, confidence: 0.9, model: "circumference" as const, estimatedFromFrontOnly: false },
      waist: { valueCm: 0, confidence: 1.2, model: "linear" as const, estimatedFromFrontOnly: false },
    };

    expect(validateMeasurementSet({ fields }, TEST_PLAN)).toEqual([
      '"neck" is not part of plan "test-plan"',
      '"waist" uses model "linear" but the plan defines "circumference"',
      '"waist" has a non-positive value (0)',
      '"waist" has a confidence outside [0, 1] (1.2)',
    ]);
  });
});

// ─── parseReferenceMesh ─────────────────────────────────────────────────────────

describe("parseReferenceMesh()", () => {
  it("parses mesh metadata", () => {
    const raw = { meshId: "mesh-a", axes: { chest: { measurement: "chest", minCm: 70, maxCm: 140 } } };

    expect(parseReferenceMesh(raw)).toEqual(raw);
  });

  it("rejects axes without a usable range", () => {
    const raw = {
      meshId: "mesh-a",
      axes: {
        chest: { measurement: "chest", minCm: 140, maxCm: 70 },
        waist: { minCm: 1, maxCm: 2 },
      },
    };

    expect(() => parseReferenceMesh(raw)).toThrow(
      "Invalid reference mesh: axes.chest needs finite minCm < maxCm; axes.waist.measurement must be a non-empty string",
    );
  });

  it("rejects a missing mesh id", () => {
    expect(() => parseReferenceMesh({ axes: {} })).toThrow("Invalid reference mesh: meshId must be a non-empty string");
  });
});
