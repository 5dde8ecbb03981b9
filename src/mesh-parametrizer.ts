// Body Measurement Pipeline - Mesh Parametrization Engine
// Maps an accepted measurement set onto the normalized deformation axes of
// the reference body mesh:
//
//   param = clamp((measured − minCm) / (maxCm − minCm), 0, 1)
//
// Axes with no matching measurement stay at the neutral baseline (0.5).
// Values outside an axis' supported range are still clamped and used, but
// produce one OutOfSupportedRange warning for that axis.

import type {
  MeasurementSet,
  MeshParameters,
  OutOfSupportedRangeWarning,
  ReconciledMeasurementSet,
  ReferenceMeshMetadata,
} from "./types.js";
import { clamp } from "./utils.js";

export const NEUTRAL_PARAMETER = 0.5;

export function parametrizeMesh(
  set: ReconciledMeasurementSet | MeasurementSet,
  metadata: ReferenceMeshMetadata,
): MeshParameters {
  if (!set.verifiedByUser) {
    throw new Error(
      `Measurements for session ${set.captureSessionId} have not been accepted; ` +
      `only verified measurements can drive the mesh`,
    );
  }

  const values: Record<string, number> = {};
  const origins: MeshParameters["origins"] = {};
  const warnings: OutOfSupportedRangeWarning[] = [];

  for (const [axis, { measurement, minCm, maxCm }] of Object.entries(metadata.axes)) {
    if (!(maxCm > minCm)) {
      throw new Error(`Mesh axis "${axis}" has an empty range [${minCm}, ${maxCm}]`);
    }

    const field = Object.prototype.hasOwnProperty.call(set.fields, measurement)
      ? set.fields[measurement]
      : undefined;
    if (!field) {
      values[axis] = NEUTRAL_PARAMETER;
      origins[axis] = "default";
      continue;
    }

    const measured = field.valueCm;
    if (measured < minCm || measured > maxCm) {
      warnings.push({ kind: "OutOfSupportedRange", axis, measurement, valueCm: measured, minCm, maxCm });
    }

    values[axis] = clamp((measured - minCm) / (maxCm - minCm), 0, 1);
    origins[axis] = "measured";
  }

  return { meshId: metadata.meshId, values, origins, warnings };
}
