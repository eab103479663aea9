/**
 * Wire records produced by the core: the molecular classification and the
 * reconciled risk assessment. Engine-internal shapes (feature vectors,
 * attributions, staging annotations) live next to the code that builds them.
 */

export const MOLECULAR_GROUPS = ["POLEmut", "MMRd", "NSMP", "p53abn"] as const;
export type MolecularGroup = (typeof MOLECULAR_GROUPS)[number];

export const RISK_CATEGORIES = ["LOW", "INTERMEDIATE", "HIGH"] as const;
export type RiskCategory = (typeof RISK_CATEGORIES)[number];

/** The three markers that can assign a group outright, in precedence order. */
export type PrimaryMarker = "POLE" | "MMR" | "p53";

export interface MolecularClassification {
  group: MolecularGroup;
  subtype: string | null;
  /** In (0, 1]. Lowered when the decision rested on untested markers. */
  confidence: number;
  rationale: string;
  clinical_significance: string;
  /** Higher-precedence primary markers reported "Not Tested". */
  untested_markers: PrimaryMarker[];
  /** Dominant alterations present but overruled by precedence. */
  superseded_markers: PrimaryMarker[];
  /** All three primary markers untested: NSMP by default only. */
  ambiguous: boolean;
}

export interface RiskAssessment {
  recurrence_probability: number;
  risk_category: RiskCategory;
  stage_based_risk: number;
  stage_risk_category: RiskCategory;
  /** recurrence_probability − stage_based_risk. Positive = molecular profile raised risk. */
  risk_difference: number;
  reclassified: boolean;
  risk_percentile: number | null;
  model_version: string;
  /** ISO-8601, UTC. */
  assessment_date: string;
}
