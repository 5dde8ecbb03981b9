// Body Measurement Pipeline - Multi-View Aggregator
// Merges the per-view MeasurementSets of one capture session into a single
// ReconciledMeasurementSet (poseType "combined") with per-field provenance.
//
// Reconciliation per field:
//   0. A linear field is measured on the front frame in both the front and
//      the combined set; the combined copy is dropped when a front one exists.
//   1. One candidate → passed through unchanged.
//   2. Otherwise keep the authoritative candidates (not estimated from the
//      front view alone; if every candidate is an estimate, all of them).
//   3. One authoritative candidate → it wins.
//   4. Several → relative spread (max − min) / min above the tolerance marks
//      the field conflicting and keeps the most confident value; within
//      tolerance the confidence-weighted mean is used.
//
// Conflicts are flags, not failures: the session still reaches review.

import type {
  MeasurementCandidate,
  MeasurementName,
  MeasurementSet,
  ReconciledField,
  ReconciledMeasurementSet,
  MeasurementValue,
} from "./types.js";
import { DEFAULT_ACCURACY_THRESHOLD } from "./measurement-engine.js";

export const DEFAULT_CONFLICT_TOLERANCE = 0.08;

export interface AggregationOptions {
  /** Relative difference above which two authoritative values conflict. Default: 0.08. */
  tolerance?: number;
  /** A field counts as accurate only when its confidence exceeds this. Default: 0.5. */
  accuracyThreshold?: number;
}

/**
 * Relative spread of a list of values, measured against the smallest one.
 * 80 and 95 → 15 / 80 = 0.1875.
 */
export function relativeSpread(values: readonly number[]): number {
  const min = Math.min(...values);
  const max = Math.max(...values);
  if (min <= 0) return max === min ? 0 : Number.POSITIVE_INFINITY;
  return (max - min) / min;
}

function mostConfident(candidates: MeasurementCandidate[]): MeasurementCandidate {
  return candidates.reduce((best, c) => (c.confidence > best.confidence ? c : best));
}

/** Candidates that carry an independent observation of the field. */
function distinctCandidates(
  model: MeasurementValue["model"],
  candidates: MeasurementCandidate[],
): MeasurementCandidate[] {
  if (model !== "linear" || !candidates.some((c) => c.poseType === "front")) {
    return candidates;
  }
  return candidates.filter((c) => c.poseType !== "combined");
}

function reconcileField(
  model: MeasurementValue["model"],
  candidates: MeasurementCandidate[],
  tolerance: number,
): ReconciledField {
  const distinct = distinctCandidates(model, candidates);
  if (distinct.length === 1) {
    const [only] = distinct;
    return {
      valueCm: only.valueCm,
      confidence: only.confidence,
      model,
      estimatedFromFrontOnly: only.estimatedFromFrontOnly,
      sources: [only.poseType],
      conflicting: false,
      candidates,
    };
  }

  const measured = distinct.filter((c) => !c.estimatedFromFrontOnly);
  const authoritative = measured.length > 0 ? measured : distinct;
  const sources = [...new Set(authoritative.map((c) => c.poseType))];
  const best = mostConfident(authoritative);

  if (authoritative.length === 1) {
    return {
      valueCm: best.valueCm,
      confidence: best.confidence,
      model,
      estimatedFromFrontOnly: best.estimatedFromFrontOnly,
      sources,
      conflicting: false,
      candidates,
    };
  }

  const conflicting = relativeSpread(authoritative.map((c) => c.valueCm)) > tolerance;
  const totalWeight = authoritative.reduce((sum, c) => sum + c.confidence, 0);
  const mean =
    totalWeight > 0
      ? authoritative.reduce((sum, c) => sum + c.valueCm * c.confidence, 0) / totalWeight
      : authoritative.reduce((sum, c) => sum + c.valueCm, 0) / authoritative.length;

  return {
    valueCm: conflicting ? best.valueCm : mean,
    confidence: best.confidence,
    model,
    estimatedFromFrontOnly: authoritative.every((c) => c.estimatedFromFrontOnly),
    sources,
    conflicting,
    candidates,
  };
}

/**
 * Reconcile the per-view sets of one capture session.
 * @throws Error if `sets` is empty or mixes sessions or users.
 */
export function aggregateViews(
  sets: readonly MeasurementSet[],
  options: AggregationOptions = {},
): ReconciledMeasurementSet {
  const tolerance = options.tolerance ?? DEFAULT_CONFLICT_TOLERANCE;
  const accuracyThreshold = options.accuracyThreshold ?? DEFAULT_ACCURACY_THRESHOLD;

  if (sets.length === 0) {
    throw new Error("Cannot aggregate an empty list of measurement sets");
  }

  const [first] = sets;
  for (const set of sets) {
    if (set.captureSessionId !== first.captureSessionId) {
      throw new Error(
        `Cannot aggregate across capture sessions: "${set.captureSessionId}" vs "${first.captureSessionId}"`,
      );
    }
    if (set.userId !== first.userId) {
      throw new Error(`Cannot aggregate measurement sets owned by different users in session "${first.captureSessionId}"`);
    }
  }

  // Collect candidates in first-seen field order.
  const byField = new Map<MeasurementName, { model: MeasurementValue["model"]; candidates: MeasurementCandidate[] }>();
  for (const set of sets) {
    for (const [name, value] of Object.entries(set.fields)) {
      const entry = byField.get(name) ?? { model: value.model, candidates: [] };
      entry.candidates.push({
        poseType: set.poseType,
        valueCm: value.valueCm,
        confidence: value.confidence,
        estimatedFromFrontOnly: value.estimatedFromFrontOnly,
      });
      byField.set(name, entry);
    }
  }

  const fields: Record<MeasurementName, ReconciledField> = {};
  const conflicts: MeasurementName[] = [];
  for (const [name, { model, candidates }] of byField) {
    const field = reconcileField(model, candidates, tolerance);
    fields[name] = field;
    if (field.conflicting) conflicts.push(name);
  }

  const chosen = Object.values(fields);
  const isAccurate =
    chosen.length > 0 &&
    conflicts.length === 0 &&
    chosen.every((f) => f.confidence > accuracyThreshold && !f.estimatedFromFrontOnly);

  const primary = sets.find((s) => s.poseType === "front") ?? sets.find((s) => s.poseType === "combined") ?? first;
  const createdAt = Math.max(...sets.map((s) => s.createdAt.getTime()));

  return {
    userId: first.userId,
    captureSessionId: first.captureSessionId,
    poseType: "combined",
    calibrationRatio: primary.calibrationRatio,
    fields,
    conflicts,
    isAccurate,
    verifiedByUser: false,
    sourceFrameIds: [...new Set(sets.flatMap((s) => s.sourceFrameIds))],
    createdAt: new Date(createdAt),
    updatedAt: new Date(createdAt),
  };
}
