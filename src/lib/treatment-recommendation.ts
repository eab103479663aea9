/**
 * Decision-support text for adjuvant treatment, routed by molecular group
 * and, within NSMP, by L1CAM status and then model risk category.
 * Output is advisory narrative only; it never feeds back into risk.
 */

import type { BiomarkerPanel } from "@/types/panel";
import type { MolecularClassification, MolecularGroup, RiskAssessment } from "@/types/assessment";

export interface EvidenceItem {
  source: string;
  finding: string;
  hazard_ratio: number | null;
  p_value: number | null;
}

export interface ClinicalTrial {
  trial_name: string;
  intervention: string;
  eligibility_note: string;
}

export type AlertLevel = "critical" | "warning" | "info";

export interface ClinicalAlert {
  level: AlertLevel;
  message: string;
}

export interface TreatmentRecommendation {
  group: MolecularGroup;
  primary_recommendation: string;
  rationale: string;
  evidence: EvidenceItem[];
  trial_eligibility: ClinicalTrial[];
  alerts: ClinicalAlert[];
  contraindications: string[];
}

type RecommendationInputs = Pick<BiomarkerPanel, "stage">;
type AssessmentInputs = Pick<RiskAssessment, "recurrence_probability" | "risk_category">;

const pct = (p: number) => `${Math.round(p * 100)}%`;

function evidence(source: string, finding: string, hazard_ratio: number | null = null, p_value: number | null = null): EvidenceItem {
  return { source, finding, hazard_ratio, p_value };
}

// ---------------------------------------------------------------------------
// Per-group recommenders
// ---------------------------------------------------------------------------

function recommendPoleMutated(panel: RecommendationInputs, a: AssessmentInputs): TreatmentRecommendation {
  return {
    group: "POLEmut",
    primary_recommendation: "Consider Treatment De-escalation / Observation",
    rationale:
      `POLEmut molecular classification with predicted 5-year recurrence risk of ${pct(a.recurrence_probability)}. ` +
      `This group has an excellent prognosis regardless of stage (${panel.stage}) or grade.`,
    evidence: [
      evidence(
        "PORTEC-3 POLEmut subgroup analysis",
        "No recurrences in POLEmut patients at 5 years regardless of adjuvant treatment",
      ),
      evidence("Leon-Castillo et al., Lancet Oncol 2020", "POLEmut tumors have favorable outcomes even with high-grade histology"),
    ],
    trial_eligibility: [
      {
        trial_name: "RAINBO POLEmut-BLUE",
        intervention: "Observation vs vaginal brachytherapy",
        eligibility_note: "De-escalation in POLEmut patients",
      },
    ],
    alerts: [{ level: "info", message: "POLEmut biology overrides adverse pathological features" }],
    contraindications: ["None specific; consider observation"],
  };
}

function recommendMismatchRepairDeficient(a: AssessmentInputs): TreatmentRecommendation {
  return {
    group: "MMRd",
    primary_recommendation: "Standard Adjuvant Therapy + Consider Immunotherapy",
    rationale:
      `MMR-deficient molecular classification with predicted 5-year recurrence risk of ${pct(a.recurrence_probability)}. ` +
      "High tumor mutational burden makes these tumors responsive to immune checkpoint inhibitors.",
    evidence: [
      evidence("KEYNOTE-158 (pembrolizumab in MSI-H/dMMR)", "Objective response rate 57.1% in MSI-H/dMMR endometrial cancer"),
      evidence("GARNET (dostarlimab)", "Objective response rate 42.3% in dMMR endometrial cancer"),
    ],
    trial_eligibility: [
      {
        trial_name: "RAINBO MMRd-GREEN",
        intervention: "Radiotherapy with or without durvalumab",
        eligibility_note: "Immunotherapy benefit in MMRd patients",
      },
    ],
    alerts: [
      {
        level: "warning",
        message: "Lynch syndrome screening recommended: germline testing for hereditary MMR mutations",
      },
      { level: "info", message: "High immunogenicity: consider checkpoint inhibitors for advanced or recurrent disease" },
    ],
    contraindications: ["Check autoimmune history before immunotherapy", "Monitor for immune-related adverse events"],
  };
}

function recommendP53Abnormal(panel: RecommendationInputs, a: AssessmentInputs): TreatmentRecommendation {
  return {
    group: "p53abn",
    primary_recommendation: "Aggressive Multimodal Therapy: Chemoradiotherapy",
    rationale:
      `p53-abnormal molecular classification with predicted 5-year recurrence risk of ${pct(a.recurrence_probability)}. ` +
      "This is the highest-risk molecular group. " +
      `Anatomical stage (${panel.stage}) underestimates biological risk.`,
    evidence: [
      evidence(
        "PORTEC-3 long-term follow-up (de Boer et al.)",
        "p53abn patients: overall survival 52.7% with chemoradiotherapy vs 36.6% with radiotherapy alone",
        0.52,
        0.021,
      ),
      evidence("ESGO/ESTRO/ESP 2021 guidelines", "p53abn endometrioid cancers treated like serous carcinomas"),
    ],
    trial_eligibility: [
      {
        trial_name: "RAINBO p53abn-RED",
        intervention: "Chemoradiotherapy + olaparib",
        eligibility_note: "PARP inhibitor benefit in p53abn patients",
      },
    ],
    alerts: [
      { level: "critical", message: "Aggressive biology: systemic therapy regardless of early anatomical stage" },
      { level: "warning", message: "Stage-based risk estimate underestimates biological risk" },
    ],
    contraindications: [
      "Assess ECOG performance status for chemotherapy tolerance",
      "Check cardiac function",
      "Check renal function before platinum agents",
    ],
  };
}

/** Follows the classifier's NSMP subtype: CTNNB1 before L1CAM. */
function recommendNsmp(subtype: string | null, a: AssessmentInputs): TreatmentRecommendation {
  const risk = pct(a.recurrence_probability);
  let primary: string;
  let rationale: string;
  let alert: ClinicalAlert;

  if (subtype === "NSMP-L1CAM-positive") {
    primary = "Treat as High-Risk: Consider Chemoradiotherapy";
    rationale =
      `NSMP with L1CAM positivity (predicted risk ${risk}). ` +
      "L1CAM-positive NSMP behaves like the p53abn group and warrants intensive treatment.";
    alert = { level: "warning", message: "L1CAM positivity elevates NSMP from intermediate to high-risk biology" };
  } else if (a.risk_category === "HIGH") {
    primary = "Standard Adjuvant Therapy: Consider Chemotherapy + Radiotherapy";
    rationale = `NSMP classified as high-risk on clinicopathological features (predicted risk ${risk}).`;
    alert = { level: "info", message: "High-risk NSMP: conventional features drive treatment intensification" };
  } else if (a.risk_category === "LOW") {
    primary = "Consider De-escalation: Observation or Vaginal Brachytherapy";
    rationale = `Low-risk NSMP (predicted risk ${risk}). Early-stage disease may allow treatment de-escalation.`;
    alert = { level: "info", message: "Low-risk NSMP: consider individualized de-escalation" };
  } else {
    primary = "Risk-Adapted Therapy: Radiotherapy ± Chemotherapy";
    rationale = `NSMP with intermediate risk (predicted ${risk}). Individualize on clinicopathological features.`;
    alert = { level: "info", message: "Heterogeneous group: integrate molecular and conventional risk factors" };
  }
  if (subtype === "NSMP-CTNNB1mut") {
    rationale += " CTNNB1 mutation: consider extended follow-up for late recurrence.";
  }

  return {
    group: "NSMP",
    primary_recommendation: primary,
    rationale,
    evidence: [
      evidence("Bosse et al., J Clin Oncol 2018", "L1CAM expression is an independent adverse prognostic factor", 2.5, 0.002),
    ],
    trial_eligibility: [
      {
        trial_name: "RAINBO NSMP-ORANGE",
        intervention: "Risk-adapted observation, radiotherapy or chemoradiotherapy",
        eligibility_note: "Treatment stratification in NSMP patients",
      },
    ],
    alerts: [alert],
    contraindications: ["Individualize on age, comorbidities and risk factors"],
  };
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

function routeByGroup(
  panel: RecommendationInputs,
  classification: MolecularClassification,
  a: AssessmentInputs,
): TreatmentRecommendation {
  switch (classification.group) {
    case "POLEmut":
      return recommendPoleMutated(panel, a);
    case "MMRd":
      return recommendMismatchRepairDeficient(a);
    case "p53abn":
      return recommendP53Abnormal(panel, a);
    case "NSMP":
      return recommendNsmp(classification.subtype, a);
  }
}

export function recommendTreatment(
  panel: RecommendationInputs,
  classification: MolecularClassification,
  assessment: AssessmentInputs,
): TreatmentRecommendation {
  const rec = routeByGroup(panel, classification, assessment);

  // An incomplete panel weakens whichever route was taken
  if (classification.untested_markers.length > 0) {
    rec.alerts.push({
      level: "warning",
      message: `Molecular classification incomplete (${classification.untested_markers.join(", ")} not tested); confirm before de-escalating`,
    });
  }
  return rec;
}
