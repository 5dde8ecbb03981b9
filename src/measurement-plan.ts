// Body Measurement Pipeline - Measurement Plan & Reference Mesh Schema
//
// Static configuration arrives as untyped JSON. These parsers turn it into the
// typed MeasurementPlan / ReferenceMeshMetadata records, collecting every
// problem before failing so a broken config file is fixed in one pass.

import type {
  CaptureView,
  CircumferenceModel,
  JointName,
  LinearModel,
  MeasurementModel,
  MeasurementPlan,
  MeasurementSet,
  MeshAxis,
  ReferenceMeshMetadata,
} from "./types.js";
import { isPositiveFinite } from "./utils.js";

const CAPTURE_VIEWS: readonly CaptureView[] = ["front", "side"];

// ─── Narrowing helpers ──────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function isJointList(value: unknown): value is JointName[] {
  return Array.isArray(value) && value.every(isNonEmptyString);
}

function isJointPair(value: unknown): value is [JointName, JointName] {
  return isJointList(value) && value.length === 2;
}

function isCaptureView(value: unknown): value is CaptureView {
  return CAPTURE_VIEWS.some((view) => view === value);
}

// ─── Measurement Plan ───────────────────────────────────────────────────────────

function parseModel(name: string, raw: unknown, errors: string[]): MeasurementModel | null {
  if (!isRecord(raw)) {
    errors.push(`measurements.${name} must be an object`);
    return null;
  }

  if (raw.kind === "linear") {
    if (!isJointList(raw.path) || raw.path.length < 2) {
      errors.push(`measurements.${name}.path must list at least two joints`);
      return null;
    }
    let views: CaptureView[] = ["front"];
    const rawViews: unknown = raw.views;
    if (rawViews !== undefined) {
      const listed: CaptureView[] = Array.isArray(rawViews) ? rawViews.filter(isCaptureView) : [];
      if (!Array.isArray(rawViews) || listed.length === 0 || listed.length !== rawViews.length) {
        errors.push(`measurements.${name}.views must be a non-empty list of "front" | "side"`);
        return null;
      }
      views = [...new Set(listed)];
    }
    const model: LinearModel = { kind: "linear", path: [...raw.path], views };
    return model;
  }

  if (raw.kind === "circumference") {
    const { width, depth } = raw;
    const widthScale = raw.widthScale ?? 1;
    const depthScale = raw.depthScale ?? 1;
    if (isJointPair(width) && isJointPair(depth) && isPositiveFinite(widthScale) && isPositiveFinite(depthScale)) {
      const model: CircumferenceModel = {
        kind: "circumference",
        width: [width[0], width[1]],
        depth: [depth[0], depth[1]],
        widthScale,
        depthScale,
      };
      return model;
    }
    if (!isJointPair(width)) errors.push(`measurements.${name}.width must be a joint pair`);
    if (!isJointPair(depth)) errors.push(`measurements.${name}.depth must be a joint pair`);
    if (!isPositiveFinite(widthScale)) errors.push(`measurements.${name}.widthScale must be a positive number`);
    if (!isPositiveFinite(depthScale)) errors.push(`measurements.${name}.depthScale must be a positive number`);
    return null;
  }

  errors.push(`measurements.${name}.kind must be "linear" or "circumference"`);
  return null;
}

/**
 * Parses a measurement plan document.
 * @throws Error listing every schema violation found.
 */
export function parseMeasurementPlan(raw: unknown): MeasurementPlan {
  if (!isRecord(raw)) {
    throw new Error("Invalid measurement plan: expected a JSON object");
  }

  const errors: string[] = [];
  const { name, calibration } = raw;

  if (!isNonEmptyString(name)) errors.push("name must be a non-empty string");

  let jointA: JointName | null = null;
  let jointB: JointName | null = null;
  if (!isRecord(calibration) || !isNonEmptyString(calibration.jointA) || !isNonEmptyString(calibration.jointB)) {
    errors.push("calibration must name jointA and jointB");
  } else if (calibration.jointA === calibration.jointB) {
    errors.push("calibration.jointA and calibration.jointB must differ");
  } else {
    jointA = calibration.jointA;
    jointB = calibration.jointB;
  }

  const measurements: Record<string, MeasurementModel> = {};
  if (!isRecord(raw.measurements) || Object.keys(raw.measurements).length === 0) {
    errors.push("measurements must be a non-empty object");
  } else {
    for (const [measurement, model] of Object.entries(raw.measurements)) {
      const parsed = parseModel(measurement, model, errors);
      if (parsed) measurements[measurement] = parsed;
    }
  }

  if (errors.length > 0 || !isNonEmptyString(name) || jointA === null || jointB === null) {
    throw new Error(`Invalid measurement plan: ${errors.join("; ")}`);
  }

  return { name, calibration: { jointA, jointB }, measurements };
}

/**
 * Joints a frame from `view` must carry for the plan to be computed from it.
 * Order: calibration joints first, then measurements in plan order; no duplicates.
 */
export function requiredJointsFor(plan: MeasurementPlan, view: CaptureView): JointName[] {
  const joints = new Set<JointName>([plan.calibration.jointA, plan.calibration.jointB]);

  for (const model of Object.values(plan.measurements)) {
    if (model.kind === "linear") {
      if (model.views.includes(view)) model.path.forEach((joint) => joints.add(joint));
    } else if (view === "front") {
      model.width.forEach((joint) => joints.add(joint));
    } else {
      model.depth.forEach((joint) => joints.add(joint));
    }
  }

  return [...joints];
}

/**
 * Checks a measurement record against the plan it claims to follow.
 * Returns the list of problems; empty means the record is well formed.
 */
export function validateMeasurementSet(
  set: Pick<MeasurementSet, "fields">,
  plan: MeasurementPlan,
): string[] {
  const issues: string[] = [];

  for (const [name, field] of Object.entries(set.fields)) {
    const model = plan.measurements[name];
    if (!model) {
      issues.push(`"${name}" is not part of plan "${plan.name}"`);
      continue;
    }
    if (field.model !== model.kind) {
      issues.push(`"${name}" uses model "${field.model}" but the plan defines "${model.kind}"`);
    }
    if (!isPositiveFinite(field.valueCm)) {
      issues.push(`"${name}" has a non-positive value (${field.valueCm})`);
    }
    if (!Number.isFinite(field.confidence) || field.confidence < 0 || field.confidence > 1) {
      issues.push(`"${name}" has a confidence outside [0, 1] (${field.confidence})`);
    }
  }

  return issues;
}

// ─── Reference Mesh Metadata ────────────────────────────────────────────────────

/**
 * Parses reference mesh metadata.
 * @throws Error listing every schema violation found.
 */
export function parseReferenceMesh(raw: unknown): ReferenceMeshMetadata {
  if (!isRecord(raw)) {
    throw new Error("Invalid reference mesh: expected a JSON object");
  }

  const errors: string[] = [];
  if (!isNonEmptyString(raw.meshId)) errors.push("meshId must be a non-empty string");

  const axes: Record<string, MeshAxis> = {};
  if (!isRecord(raw.axes)) {
    errors.push("axes must be an object");
  } else {
    for (const [axis, value] of Object.entries(raw.axes)) {
      if (!isRecord(value) || !isNonEmptyString(value.measurement)) {
        errors.push(`axes.${axis}.measurement must be a non-empty string`);
        continue;
      }
      const { minCm, maxCm } = value;
      if (typeof minCm !== "number" || typeof maxCm !== "number"
        || !Number.isFinite(minCm) || !Number.isFinite(maxCm) || maxCm <= minCm) {
        errors.push(`axes.${axis} needs finite minCm < maxCm`);
        continue;
      }
      axes[axis] = { measurement: value.measurement, minCm, maxCm };
    }
  }

  if (errors.length > 0 || !isNonEmptyString(raw.meshId)) {
    throw new Error(`Invalid reference mesh: ${errors.join("; ")}`);
  }

  return { meshId: raw.meshId, axes };
}
