// Body Measurement Pipeline - File Persistence
// Storage collaborator for accepted measurement records.
//
// Only accepted (user-verified) sets are written; a session that ends in a
// retake leaves nothing on disk. Records are keyed by (userId, captureSessionId):
//
//   {baseDir}/{userId}/{captureSessionId}/
//     measurements.json
//     mesh.json        (when mesh parameters were computed)
//     summary.txt

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type {
  MeasurementCandidate,
  MeshParameters,
  PoseType,
  ReconciledField,
  ReconciledMeasurementSet,
} from "./types.js";

export interface MeasurementStore {
  /** Persists an accepted record. Returns the paths (or keys) written. */
  saveAccepted(record: ReconciledMeasurementSet, mesh: MeshParameters | null): Promise<string[]>;
  /** Loads an accepted record, or null when none exists for the key. */
  load(userId: string, captureSessionId: string): Promise<ReconciledMeasurementSet | null>;
}

const MAX_SEGMENT_LENGTH = 255;
const POSE_TYPES: readonly PoseType[] = ["front", "side", "combined"];

function percentEncode(id: string, label: string): string {
  let encoded: string;
  try {
    encoded = encodeURIComponent(id);
  } catch {
    throw new Error(`Invalid ${label} "${id}": contains an unpaired surrogate`);
  }
  // encodeURIComponent leaves these alone; "." would allow "..".
  return encoded.replace(/[!'()*.~]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`);
}

/**
 * Checks that an id can name a directory once percent-encoded.
 * Shared by session creation and the read endpoint.
 */
export function assertStorableId(id: string, label: string): void {
  if (id.trim().length === 0) {
    throw new Error(`Invalid ${label} "${id}": must not be blank`);
  }
  if (percentEncode(id, label).length > MAX_SEGMENT_LENGTH) {
    throw new Error(`Invalid ${label} "${id}": longer than ${MAX_SEGMENT_LENGTH} characters once percent-encoded`);
  }
}

/** The directory name for an id; the raw id stays in the stored record. */
export function toPathSegment(id: string, label: string): string {
  assertStorableId(id, label);
  return percentEncode(id, label);
}

// ─── Formatting ─────────────────────────────────────────────────────────────────

function describeField(name: string, field: ReconciledField): string {
  const notes: string[] = [];
  if (field.conflicting) notes.push("conflicting");
  if (field.estimatedFromFrontOnly) notes.push("estimated from front view");
  const suffix = notes.length > 0 ? ` [${notes.join(", ")}]` : "";
  return (
    `${name}: ${field.valueCm.toFixed(1)} cm ` +
    `(confidence ${field.confidence.toFixed(2)}; from ${field.sources.join("+")})${suffix}`
  );
}

/**
 * Renders the summary.txt content: a metadata header followed by one line
 * per measurement and, when present, the mesh parameters.
 */
export function formatSummary(record: ReconciledMeasurementSet, mesh: MeshParameters | null): string {
  const lines: string[] = [];

  lines.push("=== Body Measurements ===");
  lines.push("");
  lines.push(`Date: ${record.updatedAt.toISOString().split("T")[0]}`);
  lines.push(`User: ${record.userId}`);
  lines.push(`Session ID: ${record.captureSessionId}`);
  lines.push(`Scale: ${record.calibrationRatio.toFixed(4)} cm/px`);
  lines.push(`Accurate: ${record.isAccurate ? "Yes" : "No"}`);
  lines.push(`Verified: ${record.verifiedByUser ? "Yes" : "No"}`);
  lines.push("");
  lines.push("---");
  lines.push("");

  for (const [name, field] of Object.entries(record.fields)) {
    lines.push(describeField(name, field));
  }

  if (mesh) {
    lines.push("");
    lines.push(`Mesh: ${mesh.meshId}`);
    for (const [axis, value] of Object.entries(mesh.values)) {
      lines.push(`  ${axis}: ${value.toFixed(3)} (${mesh.origins[axis]})`);
    }
    for (const warning of mesh.warnings) {
      lines.push(
        `  warning: ${warning.axis} driven by ${warning.measurement} = ${warning.valueCm.toFixed(1)} cm ` +
        `is outside [${warning.minCm}, ${warning.maxCm}]`,
      );
    }
  }

  return lines.join("\n");
}

// ─── Parsing stored records ─────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isPoseType(value: unknown): value is PoseType {
  return POSE_TYPES.some((p) => p === value);
}

function parseDate(value: unknown, label: string): Date {
  const date = typeof value === "string" ? new Date(value) : null;
  if (!date || Number.isNaN(date.getTime())) {
    throw new Error(`Stored measurements have an invalid ${label}`);
  }
  return date;
}

function parseCandidate(raw: unknown): MeasurementCandidate {
  if (
    !isRecord(raw) || !isPoseType(raw.poseType) || typeof raw.valueCm !== "number"
    || typeof raw.confidence !== "number" || typeof raw.estimatedFromFrontOnly !== "boolean"
  ) {
    throw new Error("Stored measurements contain a malformed candidate");
  }
  return {
    poseType: raw.poseType,
    valueCm: raw.valueCm,
    confidence: raw.confidence,
    estimatedFromFrontOnly: raw.estimatedFromFrontOnly,
  };
}

function parseField(name: string, raw: unknown): ReconciledField {
  if (
    !isRecord(raw) || typeof raw.valueCm !== "number" || typeof raw.confidence !== "number"
    || (raw.model !== "linear" && raw.model !== "circumference")
    || typeof raw.estimatedFromFrontOnly !== "boolean" || typeof raw.conflicting !== "boolean"
    || !Array.isArray(raw.sources) || !Array.isArray(raw.candidates)
  ) {
    throw new Error(`Stored measurements contain a malformed field "${name}"`);
  }
  return {
    valueCm: raw.valueCm,
    confidence: raw.confidence,
    model: raw.model,
    estimatedFromFrontOnly: raw.estimatedFromFrontOnly,
    conflicting: raw.conflicting,
    sources: raw.sources.filter(isPoseType),
    candidates: raw.candidates.map(parseCandidate),
  };
}

/**
 * Rebuilds a ReconciledMeasurementSet from its JSON form.
 * @throws Error when the document does not match the record shape.
 */
export function parseStoredMeasurements(raw: unknown): ReconciledMeasurementSet {
  if (
    !isRecord(raw) || typeof raw.userId !== "string" || typeof raw.captureSessionId !== "string"
    || raw.poseType !== "combined" || typeof raw.calibrationRatio !== "number"
    || !isRecord(raw.fields) || !Array.isArray(raw.conflicts)
    || typeof raw.isAccurate !== "boolean" || typeof raw.verifiedByUser !== "boolean"
    || !Array.isArray(raw.sourceFrameIds)
  ) {
    throw new Error("Stored measurements do not match the measurement record shape");
  }

  const fields: Record<string, ReconciledField> = {};
  for (const [name, field] of Object.entries(raw.fields)) {
    fields[name] = parseField(name, field);
  }

  return {
    userId: raw.userId,
    captureSessionId: raw.captureSessionId,
    poseType: "combined",
    calibrationRatio: raw.calibrationRatio,
    fields,
    conflicts: raw.conflicts.filter((c): c is string => typeof c === "string"),
    isAccurate: raw.isAccurate,
    verifiedByUser: raw.verifiedByUser,
    sourceFrameIds: raw.sourceFrameIds.filter((id): id is string => typeof id === "string"),
    createdAt: parseDate(raw.createdAt, "createdAt"),
    updatedAt: parseDate(raw.updatedAt, "updatedAt"),
  };
}

// ─── FilePersistence ────────────────────────────────────────────────────────────

export class FilePersistence implements MeasurementStore {
  private baseDir: string;

  constructor(baseDir: string = "output") {
    this.baseDir = baseDir;
  }

  private directoryFor(userId: string, captureSessionId: string): string {
    return join(
      this.baseDir,
      toPathSegment(userId, "user id"),
      toPathSegment(captureSessionId, "capture session id"),
    );
  }

  async saveAccepted(record: ReconciledMeasurementSet, mesh: MeshParameters | null): Promise<string[]> {
    if (!record.verifiedByUser) {
      throw new Error(`Refusing to persist unverified measurements for session ${record.captureSessionId}`);
    }

    const dirPath = this.directoryFor(record.userId, record.captureSessionId);
    await mkdir(dirPath, { recursive: true });

    const savedPaths: string[] = [];

    const measurementsPath = join(dirPath, "measurements.json");
    await writeFile(measurementsPath, JSON.stringify(record, null, 2), "utf-8");
    savedPaths.push(measurementsPath);

    if (mesh) {
      const meshPath = join(dirPath, "mesh.json");
      await writeFile(meshPath, JSON.stringify(mesh, null, 2), "utf-8");
      savedPaths.push(meshPath);
    }

    const summaryPath = join(dirPath, "summary.txt");
    await writeFile(summaryPath, formatSummary(record, mesh), "utf-8");
    savedPaths.push(summaryPath);

    return savedPaths;
  }

  async load(userId: string, captureSessionId: string): Promise<ReconciledMeasurementSet | null> {
    const filePath = join(this.directoryFor(userId, captureSessionId), "measurements.json");

    let text: string;
    try {
      text = await readFile(filePath, "utf-8");
    } catch (err) {
      if (isRecord(err) && err.code === "ENOENT") return null;
      throw err;
    }

    return parseStoredMeasurements(JSON.parse(text));
  }
}
