/**
 * Per-feature attribution of a recurrence prediction.
 *
 * For an additive logistic model the reference-point Shapley value of each
 * feature is its own term's log-odds shift from the reference patient, so
 * attributions are exact: baseValue + Σ contributions = logit.
 */

import type { RiskAssessment } from "@/types/assessment";
import { FEATURE_DISPLAY_NAMES, decodeFeatures } from "./feature-encoding";
import type { DecodedFeatures, FeatureName, FeatureVector } from "./feature-encoding";
import type { AdditiveLogisticModel } from "./recurrence-model";
import { ModelUnavailableError } from "./errors";

// ---------------------------------------------------------------------------
// Engine contract
// ---------------------------------------------------------------------------

/** "neutral" marks a feature sitting at its reference level. */
export type AttributionDirection = "risk" | "protective" | "neutral";

function directionOf(contribution: number): AttributionDirection {
  if (contribution > 0) return "risk";
  if (contribution < 0) return "protective";
  return "neutral";
}

export interface FeatureAttribution {
  feature: FeatureName;
  /** Encoded value the model saw. */
  encoded: number;
  /** Log-odds. */
  contribution: number;
  direction: AttributionDirection;
}

export interface Attributions {
  modelVersion: string;
  /** Log-odds of the reference patient. */
  baseValue: number;
  logit: number;
  /** Every feature, ordered by |contribution| descending. */
  attributions: FeatureAttribution[];
}

export interface ExplanationEngine {
  readonly encodingVersion: string;
  explain(vector: FeatureVector): Attributions;
}

function byMagnitude<T extends { contribution: number }>(a: T, b: T): number {
  return Math.abs(b.contribution) - Math.abs(a.contribution);
}

export function createAdditiveExplainer(model: AdditiveLogisticModel): ExplanationEngine {
  return {
    encodingVersion: model.encodingVersion,
    explain(vector) {
      if (vector.encodingVersion !== model.encodingVersion) {
        throw new ModelUnavailableError(
          `Explainer for model ${model.version} expects encoding ${model.encodingVersion}, got ${vector.encodingVersion}`,
          { modelVersion: model.version },
        );
      }
      const terms = model.contributions(vector);
      const attributions: FeatureAttribution[] = terms
        .map((t) => ({
          feature: t.feature,
          encoded: t.value,
          contribution: t.contribution,
          direction: directionOf(t.contribution),
        }))
        .sort(byMagnitude);
      const logit = terms.reduce((acc, t) => acc + t.contribution, model.baseLogit);
      return { modelVersion: model.version, baseValue: model.baseLogit, logit, attributions };
    },
  };
}

// ---------------------------------------------------------------------------
// Clinician-facing explanation
// ---------------------------------------------------------------------------

/** Contributions below this magnitude are left out of the explanation. */
export const NEGLIGIBLE_CONTRIBUTION = 0.001;
const TOP_FACTORS = 3;

export interface ExplainedFeature {
  name: FeatureName;
  display_name: string;
  value: string;
  contribution: number;
  direction: AttributionDirection;
  importance_rank: number;
}

export interface InteractionNote {
  features: [FeatureName, FeatureName];
  interpretation: string;
}

export interface Explanation {
  model_version: string;
  base_value: number;
  logit: number;
  prediction: number;
  features: ExplainedFeature[];
  top_risk_factors: ExplainedFeature[];
  top_protective_factors: ExplainedFeature[];
  interactions: InteractionNote[];
  summary: string;
}

function displayValue(feature: FeatureName, d: DecodedFeatures): string {
  switch (feature) {
    case "molecular_group_encoded": return d.molecular_group;
    case "p53_encoded": return d.p53_status;
    case "pole_encoded": return d.pole_status;
    case "lvsi_encoded": return d.lvsi;
    case "l1cam_encoded": return d.l1cam_status;
    case "myometrial_encoded": return d.myometrial_invasion;
    case "grade_encoded": return d.grade;
    case "stage_encoded": return d.stage;
    case "age": return `${d.age} years`;
    case "mmr_encoded": return d.mmr_status;
    case "ctnnb1_encoded": return d.ctnnb1_status;
    case "histology_encoded": return d.histology;
    case "lymph_nodes_encoded": return d.lymph_nodes;
    case "bmi": return d.bmi.toFixed(1);
    case "ecog_status": return `ECOG ${d.ecog_status}`;
    case "diabetes_int": return d.diabetes ? "Yes" : "No";
  }
}

interface InteractionRule {
  features: [FeatureName, FeatureName];
  applies: (d: DecodedFeatures) => boolean;
  interpretation: string;
}

const INTERACTION_RULES: InteractionRule[] = [
  {
    features: ["p53_encoded", "stage_encoded"],
    applies: (d) => d.p53_status === "Abnormal" && (d.stage === "IA" || d.stage === "IB"),
    interpretation:
      "p53 abnormality overrides favorable early stage, indicating aggressive biology that transcends anatomical staging.",
  },
  {
    features: ["l1cam_encoded", "molecular_group_encoded"],
    applies: (d) => d.l1cam_status === "Positive" && d.molecular_group === "NSMP",
    interpretation:
      "L1CAM positivity in NSMP tumors substantially increases risk, shifting behavior toward p53abn-like biology.",
  },
  {
    features: ["lvsi_encoded", "grade_encoded"],
    applies: (d) => d.lvsi === "Substantial" && d.grade === "G3",
    interpretation: "Substantial LVSI combined with high grade indicates aggressive local invasion and metastatic potential.",
  },
];

function summarize(
  risk: ExplainedFeature[],
  assessment: Pick<RiskAssessment, "recurrence_probability" | "risk_category">,
): string {
  const head = `${assessment.risk_category} risk (${Math.trunc(assessment.recurrence_probability * 100)}% recurrence)`;
  const [first, second] = risk;
  if (!first) return `${head} based on overall clinical profile`;
  const lead = `${head} driven primarily by ${first.display_name} (${first.value})`;
  return second ? `${lead} and ${second.display_name}` : lead;
}

/**
 * Explain a prediction with the same vector the model scored. Negligible
 * attributions are dropped from `features`; `base_value` and `logit` are
 * the engine's exact values.
 */
export function buildExplanation(
  vector: FeatureVector,
  explainer: ExplanationEngine,
  assessment: Pick<RiskAssessment, "recurrence_probability" | "risk_category" | "model_version">,
): Explanation {
  const result = explainer.explain(vector);
  if (result.modelVersion !== assessment.model_version) {
    throw new ModelUnavailableError(
      `Explainer is bound to model ${result.modelVersion}, assessment came from ${assessment.model_version}`,
      { modelVersion: assessment.model_version },
    );
  }
  const decoded = decodeFeatures(vector);

  const features: ExplainedFeature[] = result.attributions
    .filter((a) => Math.abs(a.contribution) >= NEGLIGIBLE_CONTRIBUTION)
    .map((a, i) => ({
      name: a.feature,
      display_name: FEATURE_DISPLAY_NAMES[a.feature],
      value: displayValue(a.feature, decoded),
      contribution: a.contribution,
      direction: a.direction,
      importance_rank: i + 1,
    }));

  const topRisk = features.filter((f) => f.direction === "risk").slice(0, TOP_FACTORS);
  const topProtective = features.filter((f) => f.direction === "protective").slice(0, TOP_FACTORS);

  return {
    model_version: result.modelVersion,
    base_value: result.baseValue,
    logit: result.logit,
    prediction: assessment.recurrence_probability,
    features,
    top_risk_factors: topRisk,
    top_protective_factors: topProtective,
    interactions: INTERACTION_RULES.filter((r) => r.applies(decoded)).map((r) => ({
      features: r.features,
      interpretation: r.interpretation,
    })),
    summary: summarize(topRisk, assessment),
  };
}
