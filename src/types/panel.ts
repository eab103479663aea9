/**
 * BiomarkerPanel: the normalized clinical, pathological and molecular
 * record a single assessment runs on.
 *
 * Field names follow the wire shape used by the intake and extraction
 * surfaces (snake_case). Every categorical field is a closed vocabulary;
 * "Not Tested" is a real value, distinct from a missing field.
 */

// ─── Vocabularies ────────────────────────────────────────────

/** FIGO anatomical stages, in order of increasing severity. */
export const FIGO_STAGES = [
  "IA",
  "IB",
  "II",
  "IIIA",
  "IIIB",
  "IIIC1",
  "IIIC2",
  "IVA",
  "IVB",
] as const;

export const HISTOLOGY_TYPES = [
  "Endometrioid",
  "Serous",
  "Clear Cell",
  "Carcinosarcoma",
  "Mixed",
  "Other",
] as const;

/** Tumor grades, in order of increasing severity. */
export const GRADES = ["G1", "G2", "G3"] as const;

export const MYOMETRIAL_INVASIONS = ["<50%", "≥50%"] as const;

export const LVSI_STATUSES = ["None", "Focal", "Substantial"] as const;

export const LYMPH_NODE_STATUSES = ["Negative", "Pelvic+", "Para-aortic+"] as const;

export const POLE_STATUSES = ["Mutated", "Wild-type", "Not Tested"] as const;
export const MMR_STATUSES = ["Proficient", "Deficient", "Not Tested"] as const;
export const P53_STATUSES = ["Wild-type", "Abnormal", "Not Tested"] as const;
export const L1CAM_STATUSES = ["Positive", "Negative", "Not Tested"] as const;
export const CTNNB1_STATUSES = ["Mutated", "Wild-type", "Not Tested"] as const;

export const MMR_PROTEINS = ["MLH1", "MSH2", "MSH6", "PMS2"] as const;
export const P53_PATTERNS = ["Null", "Missense"] as const;
export const MSI_STATUSES = ["Stable", "Unstable"] as const;

/** Extended NGS markers: carried for reporting, never used for classification. */
export const EXTENDED_MARKERS = ["PTEN", "PIK3CA", "KRAS", "FBXW7", "FGFR2"] as const;
export const EXTENDED_MARKER_STATUSES = ["Mutated", "Wild-type", "Not Tested"] as const;

export type FigoStage = (typeof FIGO_STAGES)[number];
export type HistologyType = (typeof HISTOLOGY_TYPES)[number];
export type Grade = (typeof GRADES)[number];
export type MyometrialInvasion = (typeof MYOMETRIAL_INVASIONS)[number];
export type LvsiStatus = (typeof LVSI_STATUSES)[number];
export type LymphNodeStatus = (typeof LYMPH_NODE_STATUSES)[number];
export type PoleStatus = (typeof POLE_STATUSES)[number];
export type MmrStatus = (typeof MMR_STATUSES)[number];
export type P53Status = (typeof P53_STATUSES)[number];
export type L1camStatus = (typeof L1CAM_STATUSES)[number];
export type Ctnnb1Status = (typeof CTNNB1_STATUSES)[number];
export type MmrProtein = (typeof MMR_PROTEINS)[number];
export type P53Pattern = (typeof P53_PATTERNS)[number];
export type MsiStatus = (typeof MSI_STATUSES)[number];
export type ExtendedMarker = (typeof EXTENDED_MARKERS)[number];
export type ExtendedMarkerStatus = (typeof EXTENDED_MARKER_STATUSES)[number];

export const NOT_TESTED = "Not Tested" as const;

// ─── Panel ───────────────────────────────────────────────────

export interface BiomarkerPanel {
  readonly patient_id?: string;

  // Clinical
  readonly age: number;
  readonly bmi: number;
  readonly diabetes: boolean;
  readonly ecog_status: number;

  // Pathological
  readonly stage: FigoStage;
  readonly histology: HistologyType;
  readonly grade: Grade;
  readonly myometrial_invasion: MyometrialInvasion;
  readonly lvsi: LvsiStatus;
  readonly lymph_nodes: LymphNodeStatus;

  // Primary molecular markers
  readonly pole_status: PoleStatus;
  readonly mmr_status: MmrStatus;
  readonly p53_status: P53Status;

  // Refining markers (NSMP only)
  readonly l1cam_status: L1camStatus;
  readonly ctnnb1_status: Ctnnb1Status;

  // Supplementary, never part of classification precedence
  readonly mmr_protein_lost?: MmrProtein;
  readonly p53_pattern?: P53Pattern;
  readonly er_percent?: number;
  readonly pr_percent?: number;
  readonly msi_status?: MsiStatus;
  readonly extended_markers?: Readonly<Partial<Record<ExtendedMarker, ExtendedMarkerStatus>>>;
}

/** Fields a panel cannot be assessed without. */
export const REQUIRED_PANEL_FIELDS = [
  "age",
  "bmi",
  "diabetes",
  "ecog_status",
  "stage",
  "histology",
  "grade",
  "myometrial_invasion",
  "lvsi",
  "lymph_nodes",
  "pole_status",
  "mmr_status",
  "p53_status",
  "l1cam_status",
  "ctnnb1_status",
] as const satisfies readonly (keyof BiomarkerPanel)[];

export type RequiredPanelField = (typeof REQUIRED_PANEL_FIELDS)[number];

/** Anatomical inputs only, what staging alone sees. */
export type StagingInputs = Pick<
  BiomarkerPanel,
  "stage" | "grade" | "histology" | "myometrial_invasion" | "lvsi" | "lymph_nodes"
>;
