/**
 * Recurrence risk model: the numeric predictor behind the assessment.
 *
 * The core only depends on the RecurrenceRiskModel interface. The shipped
 * implementation is an additive logistic model read from a versioned JSON
 * artifact; it is loaded once at startup and shared read-only.
 */

import { readFile } from "fs/promises";
import { z } from "zod";
import bundledArtifact from "@/data/recurrence-model.v1.json";
import { FEATURE_ENCODING_VERSION, FEATURE_NAMES, featureValue } from "./feature-encoding";
import type { FeatureName, FeatureVector } from "./feature-encoding";
import { ModelUnavailableError } from "./errors";
import type { RiskEngineSettings } from "./risk-config";

// ─── Contract ────────────────────────────────────────────────

export interface RecurrenceRiskModel {
  readonly version: string;
  readonly encodingVersion: string;
  /** Calibrated 5-year recurrence probability in [0, 1]. */
  predict(vector: FeatureVector): number;
  /** Population percentile of a probability, when the model knows its reference population. */
  percentile?(probability: number): number | null;
}

// ─── Artifact schema ─────────────────────────────────────────

const CategoricalTermSchema = z.object({
  type: z.literal("categorical"),
  reference: z.number().int(),
  weights: z.record(z.number().finite()),
});

const LinearTermSchema = z.object({
  type: z.literal("linear"),
  reference: z.number().finite(),
  coefficient: z.number().finite(),
});

const TermSchema = z.discriminatedUnion("type", [CategoricalTermSchema, LinearTermSchema]);

export const ModelArtifactSchema = z.object({
  model_version: z.string().min(1),
  encoding_version: z.string().min(1),
  kind: z.literal("additive-logistic"),
  description: z.string().optional(),
  intercept: z.number().finite(),
  terms: z.record(TermSchema),
  population_deciles: z.array(z.number().min(0).max(1)).length(11).optional(),
});

export type ModelArtifact = z.infer<typeof ModelArtifactSchema>;
export type ModelTerm = z.infer<typeof TermSchema>;

export interface TermContribution {
  feature: FeatureName;
  value: number;
  /** Log-odds shift relative to the reference level. */
  contribution: number;
}

// ─── Additive logistic model ─────────────────────────────────

function sigmoid(x: number): number {
  return 1 / (1 + Math.exp(-x));
}

export class AdditiveLogisticModel implements RecurrenceRiskModel {
  readonly version: string;
  readonly encodingVersion: string;
  private readonly terms: ReadonlyMap<FeatureName, ModelTerm>;
  private readonly intercept: number;
  private readonly deciles: readonly number[] | null;

  constructor(artifact: ModelArtifact) {
    const terms = new Map<FeatureName, ModelTerm>();
    for (const name of FEATURE_NAMES) {
      const term = artifact.terms[name];
      if (!term) {
        throw new ModelUnavailableError(`Model ${artifact.model_version} has no term for feature ${name}`, {
          modelVersion: artifact.model_version,
        });
      }
      if (term.type === "categorical" && term.weights[String(term.reference)] === undefined) {
        throw new ModelUnavailableError(
          `Model ${artifact.model_version}: reference level ${term.reference} of ${name} has no weight`,
          { modelVersion: artifact.model_version },
        );
      }
      terms.set(name, term);
    }
    const deciles = artifact.population_deciles ?? null;
    if (deciles && deciles.some((d, i) => i > 0 && d < deciles[i - 1])) {
      throw new ModelUnavailableError(`Model ${artifact.model_version}: population deciles are not sorted`, {
        modelVersion: artifact.model_version,
      });
    }
    this.version = artifact.model_version;
    this.encodingVersion = artifact.encoding_version;
    this.terms = terms;
    this.intercept = artifact.intercept;
    this.deciles = deciles;
  }

  /** Log-odds of the reference patient. */
  get baseLogit(): number {
    return this.intercept;
  }

  /** Per-feature log-odds shift from the reference patient, in feature order. */
  contributions(vector: FeatureVector): TermContribution[] {
    this.assertEncoding(vector);
    return FEATURE_NAMES.map((feature) => {
      const value = featureValue(vector, feature);
      return { feature, value, contribution: this.termShift(feature, value) };
    });
  }

  logit(vector: FeatureVector): number {
    return this.contributions(vector).reduce((acc, c) => acc + c.contribution, this.intercept);
  }

  predict(vector: FeatureVector): number {
    const p = sigmoid(this.logit(vector));
    if (!Number.isFinite(p)) {
      throw new ModelUnavailableError(`Model ${this.version} produced a non-finite probability`, {
        modelVersion: this.version,
        value: p,
      });
    }
    return p;
  }

  /**
   * Position of a probability within the reference population, by linear
   * interpolation between deciles. Null when the artifact carries none.
   */
  percentile(probability: number): number | null {
    const d = this.deciles;
    if (!d) return null;
    if (probability <= d[0]) return 0;
    if (probability >= d[d.length - 1]) return 100;
    for (let i = 0; i < d.length - 1; i++) {
      if (probability <= d[i + 1]) {
        const span = d[i + 1] - d[i];
        const frac = span > 0 ? (probability - d[i]) / span : 0;
        return Math.round((i + frac) * 10);
      }
    }
    return 100;
  }

  private termShift(feature: FeatureName, value: number): number {
    const term = this.terms.get(feature);
    if (!term) {
      throw new ModelUnavailableError(`Model ${this.version} has no term for feature ${feature}`, {
        modelVersion: this.version,
      });
    }
    if (term.type === "linear") {
      return term.coefficient * (value - term.reference);
    }
    const weight = term.weights[String(value)];
    if (weight === undefined) {
      throw new ModelUnavailableError(`Model ${this.version} has no weight for ${feature}=${value}`, {
        modelVersion: this.version,
        value,
      });
    }
    return weight - term.weights[String(term.reference)];
  }

  private assertEncoding(vector: FeatureVector): void {
    if (vector.encodingVersion !== this.encodingVersion) {
      throw new ModelUnavailableError(
        `Model ${this.version} expects encoding ${this.encodingVersion}, got ${vector.encodingVersion}`,
        { modelVersion: this.version },
      );
    }
  }
}

// ─── Loading ─────────────────────────────────────────────────

/** Validate an artifact and build the model. Throws ModelUnavailableError. */
export function createRecurrenceModel(artifact: unknown): AdditiveLogisticModel {
  const parsed = ModelArtifactSchema.safeParse(artifact);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ModelUnavailableError(`Invalid model artifact: ${problems}`, {}, { cause: parsed.error });
  }
  if (parsed.data.encoding_version !== FEATURE_ENCODING_VERSION) {
    throw new ModelUnavailableError(
      `Model ${parsed.data.model_version} was fitted on ${parsed.data.encoding_version}; ` +
        `this build encodes ${FEATURE_ENCODING_VERSION}`,
      { modelVersion: parsed.data.model_version },
    );
  }
  return new AdditiveLogisticModel(parsed.data);
}

/** The artifact shipped with the package. */
export function loadBundledModel(): AdditiveLogisticModel {
  return createRecurrenceModel(bundledArtifact);
}

export async function loadRecurrenceModel(path: string): Promise<AdditiveLogisticModel> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    throw new ModelUnavailableError(`Model artifact not readable at ${path}`, {}, { cause: err });
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ModelUnavailableError(`Model artifact at ${path} is not valid JSON`, {}, { cause: err });
  }
  return createRecurrenceModel(json);
}

export function loadModelFromSettings(settings: RiskEngineSettings): Promise<AdditiveLogisticModel> {
  if (settings.modelPath) return loadRecurrenceModel(settings.modelPath);
  return Promise.resolve(loadBundledModel());
}
