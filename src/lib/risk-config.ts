/**
 * Fixed configuration constants for classification and reconciliation,
 * plus process-level settings read from the environment at startup.
 */

import { z } from "zod";
import { LOG_LEVELS } from "./logger";
import type { LogLevel } from "./logger";

// ─── Risk category thresholds ────────────────────────────────

/**
 * LOW below `intermediate`, INTERMEDIATE up to (not including) `high`,
 * HIGH at or above `high`. Applied identically to stage-based and
 * model-based probabilities.
 */
export interface RiskThresholds {
  intermediate: number;
  high: number;
}

export const DEFAULT_RISK_THRESHOLDS: Readonly<RiskThresholds> = Object.freeze({
  intermediate: 0.15,
  high: 0.4,
});

// ─── Classifier confidence ───────────────────────────────────

export interface ClassifierConfidence {
  /** POLEmut / MMRd / p53abn when the deciding marker is explicit. */
  dominant: number;
  /** NSMP is a diagnosis of exclusion. */
  nsmp: number;
  /** Per higher-precedence primary marker reported "Not Tested". */
  untestedPenalty: number;
  /** Per co-occurring dominant alteration overruled by precedence. */
  supersededPenalty: number;
  floor: number;
}

export const DEFAULT_CLASSIFIER_CONFIDENCE: Readonly<ClassifierConfidence> = Object.freeze({
  dominant: 0.95,
  nsmp: 0.85,
  untestedPenalty: 0.15,
  supersededPenalty: 0.05,
  floor: 0.4,
});

// ─── Process settings ────────────────────────────────────────

export interface RiskEngineSettings {
  /** Model artifact on disk; null means the bundled artifact. */
  modelPath: string | null;
  logLevel: LogLevel;
}

const SettingsSchema = z.object({
  RISK_MODEL_PATH: z.string().trim().min(1).optional(),
  RISK_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

export function loadSettings(env: Record<string, string | undefined> = process.env): RiskEngineSettings {
  const parsed = SettingsSchema.safeParse({
    RISK_MODEL_PATH: env.RISK_MODEL_PATH,
    RISK_LOG_LEVEL: env.RISK_LOG_LEVEL?.toLowerCase(),
  });
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid risk engine settings: ${problems}`);
  }
  return {
    modelPath: parsed.data.RISK_MODEL_PATH ?? null,
    logLevel: parsed.data.RISK_LOG_LEVEL ?? "info",
  };
}
