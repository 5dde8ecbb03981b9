import { describe, it, expect } from "vitest";
import { parametrizeMesh, NEUTRAL_PARAMETER } from "./mesh-parametrizer.js";
import type { ReconciledField, ReconciledMeasurementSet } from "./types.js";
import { TEST_MESH } from "./test-helpers.js";

function field(valueCm: number): ReconciledField {
  return {
    valueCm,
    confidence: 0.9,
    model: "linear",
    estimatedFromFrontOnly: false,
    sources: ["front"],
    conflicting: false,
    candidates: [{ poseType: "front", valueCm, confidence: 0.9, estimatedFromFrontOnly: false }],
  };
}

function acceptedSet(fields: Record<string, ReconciledField>, verifiedByUser = true): ReconciledMeasurementSet {
  return {
    userId: "user-1",
    captureSessionId: "session-1",
    poseType: "combined",
    calibrationRatio: 0.2,
    fields,
    conflicts: [],
    isAccurate: true,
    verifiedByUser,
    sourceFrameIds: ["front-1"],
    createdAt: new Date("2026-03-01T10:00:00.000Z"),
    updatedAt: new Date("2026-03-01T10:01:00.000Z"),
  };
}

describe("parametrizeMesh()", () => {
  it("normalizes measured values into each axis range", () => {
    const params = parametrizeMesh(acceptedSet({ shoulder_width: field(45), waist: field(95) }), TEST_MESH);

    expect(params.meshId).toBe("test-mesh");
    expect(params.values.shoulders).toBe(0.6);
    expect(params.values.waist).toBe(0.5);
    expect(params.origins.shoulders).toBe("measured");
    expect(params.warnings).toEqual([]);
  });

  it("leaves axes without a measurement at the neutral baseline", () => {
    const params = parametrizeMesh(acceptedSet({ shoulder_width: field(45) }), TEST_MESH);

    expect(NEUTRAL_PARAMETER).toBe(0.5);
    expect(params.values.neck).toBe(0.5);
    expect(params.origins.neck).toBe("default");
    expect(params.values.waist).toBe(0.5);
    expect(params.origins.waist).toBe("default");
  });

  it("clamps values above the range and warns once for the axis", () => {
    const params = parametrizeMesh(acceptedSet({ waist: field(150) }), TEST_MESH);

    expect(params.values.waist).toBe(1);
    expect(params.origins.waist).toBe("measured");
    expect(params.warnings).toEqual([
      { kind: "OutOfSupportedRange", axis: "waist", measurement: "waist", valueCm: 150, minCm: 55, maxCm: 135 },
    ]);
  });

  it("clamps values below the range to 0", () => {
    const params = parametrizeMesh(acceptedSet({ shoulder_width: field(25) }), TEST_MESH);

    expect(params.values.shoulders).toBe(0);
    expect(params.warnings.map((w) => w.axis)).toEqual(["shoulders"]);
  });

  it("treats the range bounds as supported", () => {
    const params = parametrizeMesh(acceptedSet({ shoulder_width: field(30), waist: field(135) }), TEST_MESH);

    expect(params.values.shoulders).toBe(0);
    expect(params.values.waist).toBe(1);
    expect(params.warnings).toEqual([]);
  });

  it("ignores measurements no axis refers to", () => {
    const params = parametrizeMesh(acceptedSet({ inseam: field(80) }), TEST_MESH);

    expect(Object.keys(params.values)).toEqual(["shoulders", "waist", "neck"]);
  });

  it("refuses measurements the user has not verified", () => {
    expect(() => parametrizeMesh(acceptedSet({ shoulder_width: field(45) }, false), TEST_MESH)).toThrow(
      "Measurements for session session-1 have not been accepted; only verified measurements can drive the mesh",
    );
  });

  it("rejects an axis with an empty range", () => {
    const broken = { meshId: "broken", axes: { chest: { measurement: "chest", minCm: 90, maxCm: 90 } } };

    expect(() => parametrizeMesh(acceptedSet({}), broken)).toThrow('Mesh axis "chest" has an empty range [90, 90]');
  });

  it("is deterministic", () => {
    const set = acceptedSet({ shoulder_width: field(41.3), waist: field(77.7) });

    expect(parametrizeMesh(set, TEST_MESH)).toEqual(parametrizeMesh(set, TEST_MESH));
  });
});
