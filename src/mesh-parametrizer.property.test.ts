// Property-Based Tests for the Mesh Parametrization Engine
// Every axis value lies in [0, 1]; a warning exists exactly for the axes whose
// measurement falls outside the supported range.

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { parametrizeMesh } from "./mesh-parametrizer.js";
import type { ReconciledMeasurementSet } from "./types.js";
import { TEST_MESH } from "./test-helpers.js";

function verifiedSet(shoulder: number, waist: number): ReconciledMeasurementSet {
  const value = (valueCm: number) => ({
    valueCm,
    confidence: 0.9,
    model: "linear" as const,
    estimatedFromFrontOnly: false,
    sources: [],
    conflicting: false,
    candidates: [],
  });
  return {
    userId: "user-1",
    captureSessionId: "session-1",
    poseType: "combined",
    calibrationRatio: 0.2,
    fields: { shoulder_width: value(shoulder), waist: value(waist) },
    conflicts: [],
    isAccurate: true,
    verifiedByUser: true,
    sourceFrameIds: [],
    createdAt: new Date(0),
    updatedAt: new Date(0),
  };
}

describe("parametrizeMesh properties", () => {
  it("produces parameters in [0, 1] and warns exactly for out-of-range axes", () => {
    fc.assert(
      fc.property(
        fc.double({ min: 1, max: 100, noNaN: true }),
        fc.double({ min: 1, max: 250, noNaN: true }),
        (shoulder, waist) => {
          const params = parametrizeMesh(verifiedSet(shoulder, waist), TEST_MESH);

          for (const value of Object.values(params.values)) {
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThanOrEqual(1);
          }

          const expectedWarnings = [
            ...(shoulder < 30 || shoulder > 55 ? ["shoulders"] : []),
            ...(waist < 55 || waist > 135 ? ["waist"] : []),
          ];
          expect(params.warnings.map((w) => w.axis)).toEqual(expectedWarnings);
        },
      ),
      { numRuns: 300 },
    );
  });

  it("is monotonic in the measured value", () => {
    fc.assert(
      fc.property(
        fc.double({ min: 1, max: 100, noNaN: true }),
        fc.double({ min: 1, max: 100, noNaN: true }),
        (x, y) => {
          const [lo, hi] = x <= y ? [x, y] : [y, x];
          const low = parametrizeMesh(verifiedSet(lo, 80), TEST_MESH).values.shoulders;
          const high = parametrizeMesh(verifiedSet(hi, 80), TEST_MESH).values.shoulders;

          expect(low).toBeLessThanOrEqual(high);
        },
      ),
      { numRuns: 200 },
    );
  });
});
