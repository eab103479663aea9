/**
 * Stage-based recurrence baseline: what anatomical staging alone predicts.
 * Molecular markers are excluded by type (StagingInputs).
 *
 * risk = STAGE_BASED_RISK[stage] × grade × histology × invasion × LVSI × nodes,
 * capped at STAGE_RISK_CEILING. Every factor is positive and the stage and
 * grade tables are non-decreasing in severity, so the estimate is monotone
 * in both.
 */

import type {
  FigoStage,
  Grade,
  HistologyType,
  LvsiStatus,
  LymphNodeStatus,
  MyometrialInvasion,
  StagingInputs,
} from "@/types/panel";

// ─── Tables ──────────────────────────────────────────────────

/** Literature 5-year recurrence by FIGO stage. */
export const STAGE_BASED_RISK: Record<FigoStage, number> = {
  IA: 0.05,
  IB: 0.1,
  II: 0.15,
  IIIA: 0.25,
  IIIB: 0.3,
  IIIC1: 0.4,
  IIIC2: 0.5,
  IVA: 0.65,
  IVB: 0.75,
};

export const GRADE_FACTOR: Record<Grade, number> = {
  G1: 0.8,
  G2: 1.0,
  G3: 1.3,
};

export const HISTOLOGY_FACTOR: Record<HistologyType, number> = {
  Endometrioid: 1.0,
  Mixed: 1.1,
  Other: 1.1,
  "Clear Cell": 1.4,
  Serous: 1.4,
  Carcinosarcoma: 1.5,
};

export const MYOMETRIAL_FACTOR: Record<MyometrialInvasion, number> = {
  "<50%": 1.0,
  "≥50%": 1.15,
};

export const LVSI_FACTOR: Record<LvsiStatus, number> = {
  None: 0.9,
  Focal: 1.0,
  Substantial: 1.4,
};

export const LYMPH_NODE_FACTOR: Record<LymphNodeStatus, number> = {
  Negative: 1.0,
  "Pelvic+": 1.2,
  "Para-aortic+": 1.35,
};

export const STAGE_RISK_CEILING = 0.85;

// ─── Estimation ──────────────────────────────────────────────

export interface StageRiskFactor {
  factor: "grade" | "histology" | "myometrial_invasion" | "lvsi" | "lymph_nodes";
  value: string;
  multiplier: number;
}

export interface StageRiskEstimate {
  risk: number;
  baseline: number;
  factors: StageRiskFactor[];
  capped: boolean;
}

export function estimateStageRiskDetailed(inputs: StagingInputs): StageRiskEstimate {
  const baseline = STAGE_BASED_RISK[inputs.stage];
  const factors: StageRiskFactor[] = [
    { factor: "grade", value: inputs.grade, multiplier: GRADE_FACTOR[inputs.grade] },
    { factor: "histology", value: inputs.histology, multiplier: HISTOLOGY_FACTOR[inputs.histology] },
    {
      factor: "myometrial_invasion",
      value: inputs.myometrial_invasion,
      multiplier: MYOMETRIAL_FACTOR[inputs.myometrial_invasion],
    },
    { factor: "lvsi", value: inputs.lvsi, multiplier: LVSI_FACTOR[inputs.lvsi] },
    { factor: "lymph_nodes", value: inputs.lymph_nodes, multiplier: LYMPH_NODE_FACTOR[inputs.lymph_nodes] },
  ];

  const raw = factors.reduce((acc, f) => acc * f.multiplier, baseline);
  const capped = raw > STAGE_RISK_CEILING;
  const risk = Math.round(Math.min(raw, STAGE_RISK_CEILING) * 10000) / 10000;

  return { risk, baseline, factors, capped };
}

/** Baseline probability in [0, 1]. */
export function estimateStageRisk(inputs: StagingInputs): number {
  return estimateStageRiskDetailed(inputs).risk;
}
