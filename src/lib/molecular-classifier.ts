/**
 * Molecular classification: TCGA/ProMisE hierarchy for endometrial cancer.
 *
 * Ordered rules, first match wins:
 *   1. POLE mutated       → POLEmut
 *   2. MMR deficient      → MMRd
 *   3. p53 abnormal       → p53abn
 *   4. otherwise          → NSMP, refined by CTNNB1 then L1CAM
 *
 * "Not Tested" never matches a rule; it falls through and costs confidence.
 * Co-occurring dominant alterations are resolved by order alone and named
 * in the rationale. Pure and total over valid panels.
 */

import type { BiomarkerPanel } from "@/types/panel";
import type { MolecularClassification, MolecularGroup, PrimaryMarker } from "@/types/assessment";
import { DEFAULT_CLASSIFIER_CONFIDENCE } from "./risk-config";
import type { ClassifierConfidence } from "./risk-config";

// ─── Types ────────────────────────────────────────────────

export type DominantGroup = Exclude<MolecularGroup, "NSMP">;

export interface GroupRule {
  id: string;
  marker: PrimaryMarker;
  group: DominantGroup;
  matches: (panel: BiomarkerPanel) => boolean;
  describe: (panel: BiomarkerPanel) => { subtype: string | null; rationale: string };
  clinicalSignificance: string;
}

export interface NsmpSubtypeRule {
  id: string;
  subtype: string;
  matches: (panel: BiomarkerPanel, untested: PrimaryMarker[]) => boolean;
  rationale: string;
  clinicalSignificance: string;
}

export interface MolecularGroupInfo {
  name: string;
  shortName: MolecularGroup;
  frequency: string;
  prognosis: string;
  keyFeature: string;
  biology: string;
  treatmentImplication: string;
}

// ─── Marker helpers ───────────────────────────────────────

const ALTERATION_LABEL: Record<PrimaryMarker, string> = {
  POLE: "POLE mutation",
  MMR: "MMR deficiency",
  p53: "p53 abnormality",
};

export function isMarkerAltered(panel: BiomarkerPanel, marker: PrimaryMarker): boolean {
  switch (marker) {
    case "POLE":
      return panel.pole_status === "Mutated";
    case "MMR":
      return panel.mmr_status === "Deficient";
    case "p53":
      return panel.p53_status === "Abnormal";
  }
}

export function isMarkerUntested(panel: BiomarkerPanel, marker: PrimaryMarker): boolean {
  switch (marker) {
    case "POLE":
      return panel.pole_status === "Not Tested";
    case "MMR":
      return panel.mmr_status === "Not Tested";
    case "p53":
      return panel.p53_status === "Not Tested";
  }
}

/** CTNNB1 and L1CAM, in subtype precedence, when reported "Not Tested". */
function untestedRefiningMarkers(panel: BiomarkerPanel): string[] {
  const out: string[] = [];
  if (panel.ctnnb1_status === "Not Tested") out.push("CTNNB1");
  if (panel.l1cam_status === "Not Tested") out.push("L1CAM");
  return out;
}

function joinMarkers(markers: readonly string[]): string {
  if (markers.length <= 1) return markers.join("");
  return `${markers.slice(0, -1).join(", ")} and ${markers[markers.length - 1]}`;
}

// ─── Ruleset ──────────────────────────────────────────────

export const GROUP_RULES: readonly GroupRule[] = [
  {
    id: "pole-mutated",
    marker: "POLE",
    group: "POLEmut",
    matches: (p) => p.pole_status === "Mutated",
    describe: () => ({
      subtype: null,
      rationale: "POLE pathogenic mutation detected; POLE status dominates prognosis and is applied first (POLEmut).",
    }),
    clinicalSignificance:
      "Excellent prognosis regardless of stage or grade. Ultramutated tumors with very low recurrence risk. " +
      "PORTEC-3 data shows 100% 5-year RFS regardless of adjuvant treatment. Consider treatment de-escalation. " +
      "Eligible for RAINBO POLEmut-BLUE trial (observation vs RT).",
  },
  {
    id: "mmr-deficient",
    marker: "MMR",
    group: "MMRd",
    matches: (p) => p.mmr_status === "Deficient",
    describe: (p) => ({
      subtype: p.mmr_protein_lost ? `MMRd-${p.mmr_protein_lost}` : null,
      rationale: p.mmr_protein_lost
        ? `Mismatch repair deficiency detected (loss of ${p.mmr_protein_lost}) (MMRd).`
        : "Mismatch repair deficiency detected; lost protein not reported (MMRd).",
    }),
    clinicalSignificance:
      "Intermediate prognosis with high tumor mutational burden. High neoantigen load makes these tumors " +
      "responsive to immune checkpoint inhibitors (pembrolizumab, dostarlimab, durvalumab). " +
      "Screen for Lynch syndrome (germline MMR mutation). Eligible for RAINBO MMRd-GREEN trial (durvalumab + RT).",
  },
  {
    id: "p53-abnormal",
    marker: "p53",
    group: "p53abn",
    matches: (p) => p.p53_status === "Abnormal",
    describe: (p) => ({
      subtype: p.p53_pattern ? `p53abn-${p.p53_pattern}` : null,
      rationale:
        `p53 abnormal pattern detected${p.p53_pattern ? ` (${p.p53_pattern} on IHC)` : ""}; ` +
        "copy-number-high, serous-like aggressive biology (p53abn).",
    }),
    clinicalSignificance:
      "Worst prognosis group with aggressive tumor biology. High recurrence risk regardless of anatomical stage. " +
      "PORTEC-3 10-year data shows benefit from chemoradiotherapy (OS HR 0.52, p=0.021). " +
      "Eligible for RAINBO p53abn-RED trial (CTRT + olaparib). Anatomical staging alone underestimates biological risk.",
  },
];

export const NSMP_SUBTYPE_RULES: readonly NsmpSubtypeRule[] = [
  {
    id: "nsmp-ctnnb1",
    subtype: "NSMP-CTNNB1mut",
    matches: (p) => p.ctnnb1_status === "Mutated",
    rationale: "CTNNB1 mutation detected: intermediate-risk NSMP, associated with late recurrence.",
    clinicalSignificance:
      "CTNNB1-mutated NSMP carries an intermediate-risk signal with a tendency to late recurrence. " +
      "Risk-adapted treatment based on clinicopathological features; extended follow-up is reasonable. " +
      "Eligible for RAINBO NSMP-ORANGE trial.",
  },
  {
    id: "nsmp-l1cam",
    subtype: "NSMP-L1CAM-positive",
    matches: (p) => p.l1cam_status === "Positive",
    rationale: "L1CAM expression >10% detected: higher-risk NSMP.",
    clinicalSignificance:
      "L1CAM-positive NSMP behaves aggressively, closer to the p53abn group. L1CAM is an independent " +
      "adverse prognostic factor; consider treating as high-risk disease. Eligible for RAINBO NSMP-ORANGE trial.",
  },
  {
    id: "nsmp-unconfirmed",
    subtype: "NSMP-unconfirmed",
    matches: (_p, untested) => untested.length > 0,
    rationale: "No refining marker positive, but NSMP is not confirmed while primary markers remain untested.",
    clinicalSignificance:
      "Assignment rests on incomplete molecular testing. Complete POLE, MMR and p53 testing before using " +
      "this classification to de-escalate or intensify treatment.",
  },
  {
    id: "nsmp-favorable",
    subtype: "NSMP-favorable",
    matches: () => true,
    rationale: "No positive refining marker: baseline-risk NSMP.",
    clinicalSignificance:
      "Heterogeneous group; risk depends on stage, grade and LVSI. Generally favorable prognosis in " +
      "early-stage disease and may allow de-escalation in selected cases. Eligible for RAINBO NSMP-ORANGE trial.",
  },
];

export const MOLECULAR_GROUP_INFO: Record<MolecularGroup, MolecularGroupInfo> = {
  POLEmut: {
    name: "POLE Ultramutated",
    shortName: "POLEmut",
    frequency: "~7% of endometrial cancers",
    prognosis: "Excellent (5-year RFS >95%)",
    keyFeature: "POLE exonuclease domain mutation",
    biology: "Ultramutated tumors with high neoantigen load but excellent outcomes",
    treatmentImplication: "Consider de-escalation regardless of stage/grade",
  },
  MMRd: {
    name: "Mismatch Repair Deficient",
    shortName: "MMRd",
    frequency: "~28% of endometrial cancers",
    prognosis: "Intermediate (5-year RFS ~85-90%)",
    keyFeature: "Loss of MMR proteins (MLH1, MSH2, MSH6, PMS2)",
    biology: "High tumor mutational burden, immunogenic",
    treatmentImplication: "Response to checkpoint inhibitors; screen for Lynch syndrome",
  },
  NSMP: {
    name: "No Specific Molecular Profile",
    shortName: "NSMP",
    frequency: "~40% of endometrial cancers",
    prognosis: "Variable (depends on L1CAM/CTNNB1)",
    keyFeature: "Wild-type POLE, proficient MMR, wild-type p53",
    biology: "Heterogeneous group; L1CAM/CTNNB1 refine risk",
    treatmentImplication: "Risk-adapted approach based on clinicopathological features",
  },
  p53abn: {
    name: "p53 Abnormal",
    shortName: "p53abn",
    frequency: "~25% of endometrial cancers",
    prognosis: "Poor (5-year RFS ~50-60%)",
    keyFeature: "Abnormal p53 IHC (null or missense pattern)",
    biology: "Copy number high, serous-like biology, aggressive",
    treatmentImplication: "Requires multimodal therapy (chemoradiotherapy)",
  },
};

// ─── Confidence ───────────────────────────────────────────

function scoreConfidence(
  base: number,
  untested: number,
  superseded: number,
  cfg: ClassifierConfidence,
): number {
  const raw = base - untested * cfg.untestedPenalty - superseded * cfg.supersededPenalty;
  // Two decimals keeps penalties exact (0.85 − 3 × 0.15 = 0.40, not 0.39999…).
  return Math.round(Math.max(cfg.floor, Math.min(1, raw)) * 100) / 100;
}

function untestedNote(untested: PrimaryMarker[], group: MolecularGroup): string {
  const verb = untested.length === 1 ? "was" : "were";
  const consequence =
    group === "NSMP"
      ? "NSMP is assigned by exclusion and cannot be confirmed"
      : "a higher-precedence alteration cannot be excluded";
  return `${joinMarkers(untested)} ${verb} not tested; ${consequence}, confidence reduced.`;
}

// ─── Classification ───────────────────────────────────────

export function classifyMolecular(
  panel: BiomarkerPanel,
  cfg: ClassifierConfidence = DEFAULT_CLASSIFIER_CONFIDENCE,
): MolecularClassification {
  for (let i = 0; i < GROUP_RULES.length; i++) {
    const rule = GROUP_RULES[i];
    if (!rule.matches(panel)) continue;

    const untested = GROUP_RULES.slice(0, i)
      .map((r) => r.marker)
      .filter((m) => isMarkerUntested(panel, m));
    const superseded = GROUP_RULES.slice(i + 1)
      .map((r) => r.marker)
      .filter((m) => isMarkerAltered(panel, m));

    const { subtype, rationale } = rule.describe(panel);
    const parts = [rationale];
    for (const marker of superseded) {
      parts.push(
        `${ALTERATION_LABEL[marker]} present but superseded by ${ALTERATION_LABEL[rule.marker]} status.`,
      );
    }
    if (untested.length > 0) parts.push(untestedNote(untested, rule.group));

    return {
      group: rule.group,
      subtype,
      confidence: scoreConfidence(cfg.dominant, untested.length, superseded.length, cfg),
      rationale: parts.join(" "),
      clinical_significance: rule.clinicalSignificance,
      untested_markers: untested,
      superseded_markers: superseded,
      ambiguous: false,
    };
  }

  return classifyNsmp(panel, cfg);
}

function classifyNsmp(panel: BiomarkerPanel, cfg: ClassifierConfidence): MolecularClassification {
  const untested = GROUP_RULES.map((r) => r.marker).filter((m) => isMarkerUntested(panel, m));
  // The last rule always matches.
  const refinement =
    NSMP_SUBTYPE_RULES.find((r) => r.matches(panel, untested)) ??
    NSMP_SUBTYPE_RULES[NSMP_SUBTYPE_RULES.length - 1];

  const parts = [
    untested.length === 0
      ? "No POLE, MMR or p53 alteration detected (NSMP)."
      : "No POLE, MMR or p53 alteration detected among tested markers (NSMP).",
    refinement.rationale,
  ];
  const unrefined = untestedRefiningMarkers(panel);
  if (unrefined.length > 0) {
    const verb = unrefined.length === 1 ? "was" : "were";
    parts.push(`${joinMarkers(unrefined)} ${verb} not tested; the NSMP subtype is provisional.`);
  }
  if (untested.length > 0) parts.push(untestedNote(untested, "NSMP"));

  return {
    group: "NSMP",
    subtype: refinement.subtype,
    confidence: scoreConfidence(cfg.nsmp, untested.length, 0, cfg),
    rationale: parts.join(" "),
    clinical_significance: refinement.clinicalSignificance,
    untested_markers: untested,
    superseded_markers: [],
    ambiguous: untested.length === GROUP_RULES.length,
  };
}
