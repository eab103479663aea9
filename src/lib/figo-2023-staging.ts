/**
 * FIGO 2023 molecular-integrated staging.
 *
 * Early stages take a molecular suffix or are upstaged: favorable groups
 * (POLEmut, MMRd) get "m1", p53abn upstages IA/IB to IC and II to IIC.
 * Stages III and IV keep their anatomical label; the molecular modifier is
 * reported alongside rather than folded into the label.
 */

import type { BiomarkerPanel, FigoStage, HistologyType } from "@/types/panel";
import type { MolecularGroup } from "@/types/assessment";

export type Figo2023StageGroup = "I" | "II" | "III" | "IV";

/** "m1" favorable molecular profile, "2" p53-abnormal. */
export type MolecularModifier = "m1" | "2";

export interface Figo2023Stage {
  anatomical_stage: FigoStage;
  figo_2023_stage: string;
  stage_group: Figo2023StageGroup;
  molecular_modifier: MolecularModifier | null;
  rationale: string;
  prognosis_impact: string;
  clinical_implications: string;
  staging_system: "FIGO 2023 (Molecular-Integrated)";
}

export type Figo2023Inputs = Pick<BiomarkerPanel, "stage" | "histology" | "lvsi">;

const STAGE_GROUP: Record<FigoStage, Figo2023StageGroup> = {
  IA: "I",
  IB: "I",
  II: "II",
  IIIA: "III",
  IIIB: "III",
  IIIC1: "III",
  IIIC2: "III",
  IVA: "IV",
  IVB: "IV",
};

const ANATOMY: Record<FigoStage, string> = {
  IA: "Tumor confined to uterus with <50% myometrial invasion.",
  IB: "Tumor confined to uterus with ≥50% myometrial invasion.",
  II: "Tumor invades cervical stroma.",
  IIIA: "Tumor invades serosa and/or adnexa.",
  IIIB: "Vaginal and/or parametrial involvement.",
  IIIC1: "Pelvic lymph node involvement.",
  IIIC2: "Para-aortic lymph node involvement.",
  IVA: "Tumor invades bladder and/or bowel mucosa.",
  IVB: "Distant metastases including abdominal or inguinal nodes.",
};

export const AGGRESSIVE_HISTOTYPES: ReadonlySet<HistologyType> = new Set<HistologyType>([
  "Serous",
  "Clear Cell",
  "Carcinosarcoma",
]);

const isFavorable = (g: MolecularGroup) => g === "POLEmut" || g === "MMRd";

function prognosisImpact(group: MolecularGroup): string {
  if (isFavorable(group)) {
    return (
      `FAVORABLE: ${group} molecular profile improves prognosis even with adverse pathological features. ` +
      "De-escalation of adjuvant therapy may be appropriate."
    );
  }
  if (group === "p53abn") {
    return (
      "AGGRESSIVE: p53 abnormal molecular profile indicates high-risk biology with higher recurrence " +
      "and poorer survival than other groups. Warrants intensified treatment regardless of anatomical stage."
    );
  }
  return (
    "INTERMEDIATE: NSMP (no specific molecular profile). Prognosis follows clinicopathological features; " +
    "L1CAM and CTNNB1 refine risk within the group."
  );
}

const GROUP_IMPLICATIONS: Record<MolecularGroup, string> = {
  POLEmut: "POLEmut: consider observation alone for stage I-II; adjuvant therapy may be omitted.",
  MMRd:
    "MMRd: screen for Lynch syndrome. Consider immune checkpoint inhibition for advanced or recurrent disease.",
  p53abn: "p53abn: combined chemoradiotherapy recommended; consider clinical trials. Close surveillance warranted.",
  NSMP: "NSMP: adjuvant therapy guided by stage, grade and LVSI per ESGO/ESTRO/ESP guidelines.",
};

export function determineFigo2023Stage(inputs: Figo2023Inputs, group: MolecularGroup): Figo2023Stage {
  const stageGroup = STAGE_GROUP[inputs.stage];
  const aggressiveHistotype = AGGRESSIVE_HISTOTYPES.has(inputs.histology);
  const substantialLvsi = inputs.lvsi === "Substantial";
  const favorable = isFavorable(group);
  const p53abn = group === "p53abn";

  let stage: string = inputs.stage;
  let modifier: MolecularModifier | null = null;
  const rationale = [ANATOMY[inputs.stage]];

  if (stageGroup === "I") {
    if (favorable) {
      stage = `${inputs.stage}m1`;
      modifier = "m1";
      rationale.push(`Favorable molecular profile (${group}).`);
    } else if (p53abn) {
      stage = "IC";
      modifier = "2";
      rationale.push("p53 abnormal molecular profile: upstaged to IC.");
    } else if (aggressiveHistotype) {
      stage = "IC";
      rationale.push(`Aggressive histotype (${inputs.histology}): staged as IC.`);
    } else {
      rationale.push(`NSMP: standard stage ${inputs.stage}.`);
    }
  } else if (stageGroup === "II") {
    if (substantialLvsi) {
      stage = "IIB";
      rationale.push("Substantial LVSI: staged as IIB.");
    } else if (favorable) {
      stage = "IIAm1";
      modifier = "m1";
      rationale.push(`Favorable molecular profile (${group}).`);
    } else if (p53abn) {
      stage = "IIC";
      modifier = "2";
      rationale.push("p53 abnormal molecular profile: upstaged to IIC.");
    } else {
      stage = "IIA";
    }
  } else if (p53abn) {
    modifier = "2";
    rationale.push("p53 abnormal: worst prognostic subgroup within stage.");
  } else if (favorable) {
    modifier = "m1";
    rationale.push(`Favorable molecular profile (${group}): better prognosis within stage.`);
  }

  const implications = [GROUP_IMPLICATIONS[group]];
  if (substantialLvsi) {
    implications.push("Substantial LVSI: increased risk of nodal involvement and recurrence.");
  }
  if (aggressiveHistotype) {
    implications.push(`Aggressive histotype (${inputs.histology}): adjuvant chemotherapy with or without radiation.`);
  }

  return {
    anatomical_stage: inputs.stage,
    figo_2023_stage: stage,
    stage_group: stageGroup,
    molecular_modifier: modifier,
    rationale: rationale.join(" "),
    prognosis_impact: prognosisImpact(group),
    clinical_implications: implications.join(" "),
    staging_system: "FIGO 2023 (Molecular-Integrated)",
  };
}
