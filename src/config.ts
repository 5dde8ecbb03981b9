// Body Measurement Pipeline - Configuration
// Settings come from the environment (.env is loaded by the entry point via
// dotenv). Every value has a default; invalid values fail startup.

import { readFile } from "node:fs/promises";
import { parseMeasurementPlan, parseReferenceMesh } from "./measurement-plan.js";
import type { MeasurementPlan, ReferenceMeshMetadata } from "./types.js";

export interface PipelineConfig {
  port: number;
  /** Minimum keypoint confidence accepted by the frame validator. */
  minConfidence: number;
  /** Field confidence a measurement must exceed to count as accurate. */
  accuracyThreshold: number;
  minPixelDistance: number;
  conflictTolerance: number;
  /** Inactivity before an inaccurate review proposes a retake. */
  gracePeriodMs: number;
  maxRetakes: number;
  measurementPlanPath: string;
  referenceMeshPath: string;
  outputDir: string;
}

export const DEFAULT_CONFIG: PipelineConfig = {
  port: 3000,
  minConfidence: 0.5,
  accuracyThreshold: 0.5,
  minPixelDistance: 20,
  conflictTolerance: 0.08,
  gracePeriodMs: 30_000,
  maxRetakes: 3,
  measurementPlanPath: "config/measurement-plan.json",
  referenceMeshPath: "config/reference-mesh.json",
  outputDir: "output",
};

type Env = Record<string, string | undefined>;

function readNumber(
  env: Env,
  key: string,
  fallback: number,
  check: (n: number) => boolean,
  rule: string,
  errors: string[],
): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || !check(value)) {
    errors.push(`${key}="${raw}" must be ${rule}`);
    return fallback;
  }
  return value;
}

function readString(env: Env, key: string, fallback: string): string {
  const raw = env[key];
  return raw === undefined || raw.trim() === "" ? fallback : raw.trim();
}

/**
 * Builds the pipeline configuration from environment variables.
 * @throws Error naming every invalid variable.
 */
export function loadConfig(env: Env = process.env): PipelineConfig {
  const errors: string[] = [];
  const fraction = (n: number) => n >= 0 && n <= 1;

  const config: PipelineConfig = {
    port: readNumber(env, "PORT", DEFAULT_CONFIG.port,
      (n) => Number.isInteger(n) && n >= 0 && n <= 65535, "an integer port (0-65535)", errors),
    minConfidence: readNumber(env, "MIN_CONFIDENCE", DEFAULT_CONFIG.minConfidence,
      fraction, "between 0 and 1", errors),
    accuracyThreshold: readNumber(env, "ACCURACY_THRESHOLD", DEFAULT_CONFIG.accuracyThreshold,
      fraction, "between 0 and 1", errors),
    minPixelDistance: readNumber(env, "MIN_PIXEL_DISTANCE", DEFAULT_CONFIG.minPixelDistance,
      (n) => n >= 0, "a non-negative number", errors),
    conflictTolerance: readNumber(env, "CONFLICT_TOLERANCE", DEFAULT_CONFIG.conflictTolerance,
      (n) => n > 0, "a positive number", errors),
    gracePeriodMs: readNumber(env, "GRACE_PERIOD_MS", DEFAULT_CONFIG.gracePeriodMs,
      (n) => Number.isInteger(n) && n > 0, "a positive integer", errors),
    maxRetakes: readNumber(env, "MAX_RETAKES", DEFAULT_CONFIG.maxRetakes,
      (n) => Number.isInteger(n) && n >= 0, "a non-negative integer", errors),
    measurementPlanPath: readString(env, "MEASUREMENT_PLAN_PATH", DEFAULT_CONFIG.measurementPlanPath),
    referenceMeshPath: readString(env, "REFERENCE_MESH_PATH", DEFAULT_CONFIG.referenceMeshPath),
    outputDir: readString(env, "OUTPUT_DIR", DEFAULT_CONFIG.outputDir),
  };

  if (errors.length > 0) {
    throw new Error(`Invalid configuration: ${errors.join("; ")}`);
  }

  return config;
}

async function readJson(path: string, label: string): Promise<unknown> {
  const text = await readFile(path, "utf-8");
  try {
    return JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Could not parse ${label} at ${path}: ${reason}`);
  }
}

export async function loadMeasurementPlan(path: string): Promise<MeasurementPlan> {
  return parseMeasurementPlan(await readJson(path, "measurement plan"));
}

export async function loadReferenceMesh(path: string): Promise<ReferenceMeshMetadata> {
  return parseReferenceMesh(await readJson(path, "reference mesh"));
}
