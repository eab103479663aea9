/**
 * Assessment pipeline: one validated panel in, one reconciled assessment
 * out. validate → classify → encode → predict → stage baseline →
 * reconcile → FIGO 2023. Any thrown error means no assessment.
 */

import type { BiomarkerPanel } from "@/types/panel";
import type { MolecularClassification, RiskAssessment } from "@/types/assessment";
import { classifyMolecular } from "./molecular-classifier";
import { encodeFeatures } from "./feature-encoding";
import type { FeatureVector } from "./feature-encoding";
import { estimateStageRiskDetailed } from "./stage-risk";
import type { StageRiskEstimate } from "./stage-risk";
import { reconcile, usableProbability } from "./risk-reconciler";
import { determineFigo2023Stage } from "./figo-2023-staging";
import type { Figo2023Stage } from "./figo-2023-staging";
import { buildExplanation } from "./explanation-engine";
import type { Explanation, ExplanationEngine } from "./explanation-engine";
import type { RecurrenceRiskModel } from "./recurrence-model";
import { parsePanel } from "./panel-validation";
import { ModelUnavailableError, isRiskEngineError } from "./errors";
import type { RiskEngineError } from "./errors";
import { silentLogger } from "./logger";
import type { Logger } from "./logger";
import type { ClassifierConfidence, RiskThresholds } from "./risk-config";

export interface AssessmentContext {
  /** Loaded once at startup and shared read-only. */
  model: RecurrenceRiskModel;
  thresholds?: RiskThresholds;
  confidence?: ClassifierConfidence;
  logger?: Logger;
  /** Clock for assessment_date. */
  now?: () => Date;
}

export interface AssessmentResult {
  assessment: RiskAssessment;
  classification: MolecularClassification;
  /** The exact vector the model scored; explain with this one. */
  features: FeatureVector;
  stageRisk: StageRiskEstimate;
  figo2023: Figo2023Stage;
}

interface ModelOutput {
  probability: number;
  percentile: number | null;
}

function runModel(features: FeatureVector, model: RecurrenceRiskModel): ModelOutput {
  if (model.encodingVersion !== features.encodingVersion) {
    throw new ModelUnavailableError(
      `Model ${model.version} expects encoding ${model.encodingVersion}, got ${features.encodingVersion}`,
      { modelVersion: model.version },
    );
  }
  const probability = usableProbability(model.predict(features), model.version);
  return { probability, percentile: model.percentile?.(probability) ?? null };
}

export function assessPanel(panel: BiomarkerPanel, ctx: AssessmentContext): AssessmentResult {
  const log = ctx.logger ?? silentLogger;
  const patient = panel.patient_id ?? null;
  const { model } = ctx;

  const classification = classifyMolecular(panel, ctx.confidence);
  if (classification.ambiguous) {
    log.warn("AmbiguousClassification: no primary marker tested, NSMP assigned by default", {
      patient,
      confidence: classification.confidence,
    });
  }

  const features = encodeFeatures(panel, classification.group);
  const stageRisk = estimateStageRiskDetailed(panel);

  // Only the model call is relabelled as a model failure.
  let output: ModelOutput;
  try {
    output = runModel(features, model);
  } catch (err) {
    const failure =
      err instanceof ModelUnavailableError
        ? err
        : new ModelUnavailableError(
            `Model ${model.version} failed during inference`,
            { modelVersion: model.version },
            { cause: err },
          );
    log.error(failure.message, { patient, modelVersion: model.version });
    throw failure;
  }

  const assessment = reconcile(stageRisk.risk, output.probability, {
    modelVersion: model.version,
    assessmentDate: ctx.now?.(),
    thresholds: ctx.thresholds,
    riskPercentile: output.percentile,
  });

  const figo2023 = determineFigo2023Stage(panel, classification.group);

  log.debug("Assessment complete", {
    patient,
    group: classification.group,
    risk_category: assessment.risk_category,
    reclassified: assessment.reclassified,
  });

  return { assessment, classification, features, stageRisk, figo2023 };
}

/** Validate untrusted input, then assess. Throws InvalidPanelError before any scoring. */
export function assessInput(input: unknown, ctx: AssessmentContext): AssessmentResult {
  return assessPanel(parsePanel(input), ctx);
}

export type BatchOutcome =
  | { ok: true; result: AssessmentResult }
  | { ok: false; error: RiskEngineError };

/**
 * Assess each input independently. Engine errors are reported per item;
 * anything else is a bug and propagates.
 */
export function assessBatch(inputs: readonly unknown[], ctx: AssessmentContext): BatchOutcome[] {
  return inputs.map((input): BatchOutcome => {
    try {
      return { ok: true, result: assessInput(input, ctx) };
    } catch (err) {
      if (isRiskEngineError(err)) return { ok: false, error: err };
      throw err;
    }
  });
}

export function explainAssessment(result: AssessmentResult, explainer: ExplanationEngine): Explanation {
  return buildExplanation(result.features, explainer, result.assessment);
}
