/**
 * Reconciles the stage-only baseline with the model's molecular-aware
 * probability. A patient is "reclassified" when the two land in different
 * risk categories; the raw difference is reported regardless.
 */

import type { RiskAssessment, RiskCategory } from "@/types/assessment";
import { ModelUnavailableError } from "./errors";
import { DEFAULT_RISK_THRESHOLDS } from "./risk-config";
import type { RiskThresholds } from "./risk-config";

/** LOW < intermediate ≤ INTERMEDIATE < high ≤ HIGH. Lower bounds inclusive. */
export function riskCategory(
  probability: number,
  thresholds: RiskThresholds = DEFAULT_RISK_THRESHOLDS,
): RiskCategory {
  if (probability >= thresholds.high) return "HIGH";
  if (probability >= thresholds.intermediate) return "INTERMEDIATE";
  return "LOW";
}

export interface ReconcileOptions {
  modelVersion: string;
  /** Defaults to the current time. */
  assessmentDate?: Date;
  thresholds?: RiskThresholds;
  riskPercentile?: number | null;
}

function clamp01(x: number): number {
  return Math.min(1, Math.max(0, x));
}

/** Narrows raw model output to a probability in [0, 1] or throws ModelUnavailableError. */
export function usableProbability(modelRisk: number | undefined, modelVersion: string): number {
  if (modelRisk === undefined || !Number.isFinite(modelRisk) || modelRisk < 0 || modelRisk > 1) {
    throw new ModelUnavailableError(`Model ${modelVersion} returned an unusable probability`, {
      modelVersion,
      value: modelRisk ?? null,
    });
  }
  return modelRisk;
}

export function reconcile(
  stageRisk: number,
  modelRisk: number | undefined,
  options: ReconcileOptions,
): RiskAssessment {
  const probability = usableProbability(modelRisk, options.modelVersion);
  if (!Number.isFinite(stageRisk)) {
    throw new RangeError(`Stage-based risk must be finite, got ${stageRisk}`);
  }

  const thresholds = options.thresholds ?? DEFAULT_RISK_THRESHOLDS;
  const stage = clamp01(stageRisk);
  const category = riskCategory(probability, thresholds);
  const stageCategory = riskCategory(stage, thresholds);

  return {
    recurrence_probability: probability,
    risk_category: category,
    stage_based_risk: stage,
    stage_risk_category: stageCategory,
    risk_difference: probability - stage,
    reclassified: category !== stageCategory,
    risk_percentile: options.riskPercentile ?? null,
    model_version: options.modelVersion,
    assessment_date: (options.assessmentDate ?? new Date()).toISOString(),
  };
}
