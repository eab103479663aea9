/**
 * Feature encoding shared by the recurrence model and the explainer.
 *
 * The order and the categorical codes are part of the model contract: a
 * model artifact declares the encoding version it was fitted against, and
 * any change here must bump FEATURE_ENCODING_VERSION. "Not Tested" encodes
 * as -1 so it never collapses onto a negative result.
 */

import {
  CTNNB1_STATUSES,
  FIGO_STAGES,
  GRADES,
  HISTOLOGY_TYPES,
  L1CAM_STATUSES,
  LVSI_STATUSES,
  LYMPH_NODE_STATUSES,
  MMR_STATUSES,
  MYOMETRIAL_INVASIONS,
  P53_STATUSES,
  POLE_STATUSES,
} from "@/types/panel";
import type { BiomarkerPanel } from "@/types/panel";
import { MOLECULAR_GROUPS } from "@/types/assessment";
import type { MolecularGroup } from "@/types/assessment";
import { InvalidPanelError } from "./errors";

export const FEATURE_ENCODING_VERSION = "ec-features/1";

// ─── Codes ───────────────────────────────────────────────────

export const MOLECULAR_GROUP_ENCODING: Record<MolecularGroup, number> = { POLEmut: 0, MMRd: 1, NSMP: 2, p53abn: 3 };

export const STAGE_ENCODING: Record<BiomarkerPanel["stage"], number> = {
  IA: 0, IB: 1, II: 2, IIIA: 3, IIIB: 4, IIIC1: 5, IIIC2: 6, IVA: 7, IVB: 8,
};

export const HISTOLOGY_ENCODING: Record<BiomarkerPanel["histology"], number> = {
  Endometrioid: 0, Serous: 1, "Clear Cell": 2, Carcinosarcoma: 3, Mixed: 4, Other: 5,
};

export const GRADE_ENCODING: Record<BiomarkerPanel["grade"], number> = { G1: 0, G2: 1, G3: 2 };
export const LVSI_ENCODING: Record<BiomarkerPanel["lvsi"], number> = { None: 0, Focal: 1, Substantial: 2 };
export const MYOMETRIAL_ENCODING: Record<BiomarkerPanel["myometrial_invasion"], number> = { "<50%": 0, "≥50%": 1 };
export const LYMPH_NODE_ENCODING: Record<BiomarkerPanel["lymph_nodes"], number> = {
  Negative: 0, "Pelvic+": 1, "Para-aortic+": 2,
};

export const POLE_ENCODING: Record<BiomarkerPanel["pole_status"], number> = { "Wild-type": 0, Mutated: 1, "Not Tested": -1 };
export const MMR_ENCODING: Record<BiomarkerPanel["mmr_status"], number> = { Proficient: 0, Deficient: 1, "Not Tested": -1 };
export const P53_ENCODING: Record<BiomarkerPanel["p53_status"], number> = { "Wild-type": 0, Abnormal: 1, "Not Tested": -1 };
export const L1CAM_ENCODING: Record<BiomarkerPanel["l1cam_status"], number> = { Negative: 0, Positive: 1, "Not Tested": -1 };
export const CTNNB1_ENCODING: Record<BiomarkerPanel["ctnnb1_status"], number> = { "Wild-type": 0, Mutated: 1, "Not Tested": -1 };

// ─── Feature order ───────────────────────────────────────────

export const FEATURE_NAMES = [
  "molecular_group_encoded",
  "p53_encoded",
  "pole_encoded",
  "lvsi_encoded",
  "l1cam_encoded",
  "myometrial_encoded",
  "grade_encoded",
  "stage_encoded",
  "age",
  "mmr_encoded",
  "ctnnb1_encoded",
  "histology_encoded",
  "lymph_nodes_encoded",
  "bmi",
  "ecog_status",
  "diabetes_int",
] as const;

export type FeatureName = (typeof FEATURE_NAMES)[number];

export const FEATURE_DISPLAY_NAMES: Record<FeatureName, string> = {
  molecular_group_encoded: "Molecular Classification",
  p53_encoded: "p53 Status",
  pole_encoded: "POLE Status",
  lvsi_encoded: "LVSI",
  l1cam_encoded: "L1CAM Status",
  myometrial_encoded: "Myometrial Invasion",
  grade_encoded: "Grade",
  stage_encoded: "FIGO Stage",
  age: "Age",
  mmr_encoded: "MMR Status",
  ctnnb1_encoded: "CTNNB1 Status",
  histology_encoded: "Histology",
  lymph_nodes_encoded: "Lymph Node Status",
  bmi: "BMI",
  ecog_status: "ECOG Status",
  diabetes_int: "Diabetes",
};

export interface FeatureVector {
  readonly encodingVersion: string;
  readonly names: readonly FeatureName[];
  readonly values: readonly number[];
}

/** Every field the vector carries, in its natural (decoded) form. */
export interface DecodedFeatures {
  molecular_group: MolecularGroup;
  p53_status: BiomarkerPanel["p53_status"];
  pole_status: BiomarkerPanel["pole_status"];
  lvsi: BiomarkerPanel["lvsi"];
  l1cam_status: BiomarkerPanel["l1cam_status"];
  myometrial_invasion: BiomarkerPanel["myometrial_invasion"];
  grade: BiomarkerPanel["grade"];
  stage: BiomarkerPanel["stage"];
  age: number;
  mmr_status: BiomarkerPanel["mmr_status"];
  ctnnb1_status: BiomarkerPanel["ctnnb1_status"];
  histology: BiomarkerPanel["histology"];
  lymph_nodes: BiomarkerPanel["lymph_nodes"];
  bmi: number;
  ecog_status: number;
  diabetes: boolean;
}

// ─── Encode ──────────────────────────────────────────────────

function encoder<T extends string>(field: string, encoding: Record<T, number>): (value: T) => number {
  return (value) => {
    // Panels built in code skip validation; a value outside the vocabulary stops here.
    if (!Object.hasOwn(encoding, value)) {
      throw new InvalidPanelError(`Unknown value ${value} for ${field}`, {
        issues: [{ field, message: `no code for ${value}` }],
        value,
      });
    }
    return encoding[value];
  };
}

const encodeGroup = encoder("molecular_group", MOLECULAR_GROUP_ENCODING);
const encodeP53 = encoder("p53_status", P53_ENCODING);
const encodePole = encoder("pole_status", POLE_ENCODING);
const encodeLvsi = encoder("lvsi", LVSI_ENCODING);
const encodeL1cam = encoder("l1cam_status", L1CAM_ENCODING);
const encodeMyometrial = encoder("myometrial_invasion", MYOMETRIAL_ENCODING);
const encodeGrade = encoder("grade", GRADE_ENCODING);
const encodeStage = encoder("stage", STAGE_ENCODING);
const encodeMmr = encoder("mmr_status", MMR_ENCODING);
const encodeCtnnb1 = encoder("ctnnb1_status", CTNNB1_ENCODING);
const encodeHistology = encoder("histology", HISTOLOGY_ENCODING);
const encodeLymphNodes = encoder("lymph_nodes", LYMPH_NODE_ENCODING);

/** Throws InvalidPanelError for a categorical value outside its vocabulary. */
export function encodeFeatures(panel: BiomarkerPanel, group: MolecularGroup): FeatureVector {
  const byName: Record<FeatureName, number> = {
    molecular_group_encoded: encodeGroup(group),
    p53_encoded: encodeP53(panel.p53_status),
    pole_encoded: encodePole(panel.pole_status),
    lvsi_encoded: encodeLvsi(panel.lvsi),
    l1cam_encoded: encodeL1cam(panel.l1cam_status),
    myometrial_encoded: encodeMyometrial(panel.myometrial_invasion),
    grade_encoded: encodeGrade(panel.grade),
    stage_encoded: encodeStage(panel.stage),
    age: panel.age,
    mmr_encoded: encodeMmr(panel.mmr_status),
    ctnnb1_encoded: encodeCtnnb1(panel.ctnnb1_status),
    histology_encoded: encodeHistology(panel.histology),
    lymph_nodes_encoded: encodeLymphNodes(panel.lymph_nodes),
    bmi: panel.bmi,
    ecog_status: panel.ecog_status,
    diabetes_int: panel.diabetes ? 1 : 0,
  };
  return Object.freeze({
    encodingVersion: FEATURE_ENCODING_VERSION,
    names: FEATURE_NAMES,
    values: Object.freeze(FEATURE_NAMES.map((name) => byName[name])),
  });
}

export function featureValue(vector: FeatureVector, name: FeatureName): number {
  const idx = vector.names.indexOf(name);
  if (idx < 0 || idx >= vector.values.length) {
    throw new InvalidPanelError(`Feature vector has no value for ${name}`, { issues: [{ field: name, message: "missing" }] });
  }
  return vector.values[idx];
}

// ─── Decode ──────────────────────────────────────────────────

function decoder<T extends string>(
  field: string,
  vocabulary: readonly T[],
  encoding: Record<T, number>,
): (code: number) => T {
  const byCode = new Map<number, T>(vocabulary.map((v) => [encoding[v], v]));
  return (code) => {
    const value = byCode.get(code);
    if (value === undefined) {
      throw new InvalidPanelError(`Unknown code ${code} for ${field}`, {
        issues: [{ field, message: `no value encodes as ${code}` }],
        value: code,
      });
    }
    return value;
  };
}

const decodeGroup = decoder("molecular_group", MOLECULAR_GROUPS, MOLECULAR_GROUP_ENCODING);
const decodeP53 = decoder("p53_status", P53_STATUSES, P53_ENCODING);
const decodePole = decoder("pole_status", POLE_STATUSES, POLE_ENCODING);
const decodeLvsi = decoder("lvsi", LVSI_STATUSES, LVSI_ENCODING);
const decodeL1cam = decoder("l1cam_status", L1CAM_STATUSES, L1CAM_ENCODING);
const decodeMyometrial = decoder("myometrial_invasion", MYOMETRIAL_INVASIONS, MYOMETRIAL_ENCODING);
const decodeGrade = decoder("grade", GRADES, GRADE_ENCODING);
const decodeStage = decoder("stage", FIGO_STAGES, STAGE_ENCODING);
const decodeMmr = decoder("mmr_status", MMR_STATUSES, MMR_ENCODING);
const decodeCtnnb1 = decoder("ctnnb1_status", CTNNB1_STATUSES, CTNNB1_ENCODING);
const decodeHistology = decoder("histology", HISTOLOGY_TYPES, HISTOLOGY_ENCODING);
const decodeLymphNodes = decoder("lymph_nodes", LYMPH_NODE_STATUSES, LYMPH_NODE_ENCODING);

/** Inverse of encodeFeatures. Rejects foreign encoding versions and unknown codes. */
export function decodeFeatures(vector: FeatureVector): DecodedFeatures {
  if (vector.encodingVersion !== FEATURE_ENCODING_VERSION) {
    throw new InvalidPanelError(
      `Feature vector encoding ${vector.encodingVersion} does not match ${FEATURE_ENCODING_VERSION}`,
      { value: vector.encodingVersion },
    );
  }
  const v = (name: FeatureName) => featureValue(vector, name);
  const diabetes = v("diabetes_int");
  if (diabetes !== 0 && diabetes !== 1) {
    throw new InvalidPanelError(`Unknown code ${diabetes} for diabetes`, {
      issues: [{ field: "diabetes", message: "expected 0 or 1" }],
      value: diabetes,
    });
  }
  return {
    molecular_group: decodeGroup(v("molecular_group_encoded")),
    p53_status: decodeP53(v("p53_encoded")),
    pole_status: decodePole(v("pole_encoded")),
    lvsi: decodeLvsi(v("lvsi_encoded")),
    l1cam_status: decodeL1cam(v("l1cam_encoded")),
    myometrial_invasion: decodeMyometrial(v("myometrial_encoded")),
    grade: decodeGrade(v("grade_encoded")),
    stage: decodeStage(v("stage_encoded")),
    age: v("age"),
    mmr_status: decodeMmr(v("mmr_encoded")),
    ctnnb1_status: decodeCtnnb1(v("ctnnb1_encoded")),
    histology: decodeHistology(v("histology_encoded")),
    lymph_nodes: decodeLymphNodes(v("lymph_nodes_encoded")),
    bmi: v("bmi"),
    ecog_status: v("ecog_status"),
    diabetes: diabetes === 1,
  };
}
