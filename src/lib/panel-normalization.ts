/**
 * Normalizes partially-filled field mappings from an extraction source
 * (report parser, CSV row, form) into panel-shaped input for parsePanel.
 *
 * Keys are aliased onto panel field names and values mapped through the
 * synonym table in src/data/value-synonyms.json. Anything that cannot be
 * mapped is passed through unchanged so validation rejects it; values are
 * never guessed.
 */

import { z } from "zod";
import synonymData from "@/data/value-synonyms.json";
import {
  CTNNB1_STATUSES,
  EXTENDED_MARKERS,
  EXTENDED_MARKER_STATUSES,
  FIGO_STAGES,
  GRADES,
  HISTOLOGY_TYPES,
  L1CAM_STATUSES,
  LVSI_STATUSES,
  LYMPH_NODE_STATUSES,
  MMR_PROTEINS,
  MMR_STATUSES,
  MSI_STATUSES,
  MYOMETRIAL_INVASIONS,
  P53_PATTERNS,
  P53_STATUSES,
  POLE_STATUSES,
  REQUIRED_PANEL_FIELDS,
} from "@/types/panel";
import type { ExtendedMarker, MmrProtein, RequiredPanelField } from "@/types/panel";

// ---------------------------------------------------------------------------
// Synonym table
// ---------------------------------------------------------------------------

const SynonymTableSchema = z.object({
  field_aliases: z.record(z.string()),
  values: z.record(z.record(z.union([z.string(), z.boolean()]))),
});

const SYNONYMS = SynonymTableSchema.parse(synonymData);

// ---------------------------------------------------------------------------
// Field catalog
// ---------------------------------------------------------------------------

const MMR_PROTEIN_FIELDS: Record<MmrProtein, string> = {
  MLH1: "mlh1_status",
  MSH2: "msh2_status",
  MSH6: "msh6_status",
  PMS2: "pms2_status",
};

/** Order in which a lost protein is reported: MLH1/PMS2 pair, then MSH2/MSH6. */
const MMR_PROTEIN_PRIORITY: readonly MmrProtein[] = ["MLH1", "PMS2", "MSH2", "MSH6"];

const EXTENDED_MARKER_FIELDS: Record<ExtendedMarker, string> = {
  PTEN: "pten_status",
  PIK3CA: "pik3ca_status",
  KRAS: "kras_status",
  FBXW7: "fbxw7_status",
  FGFR2: "fgfr2_status",
};

const PANEL_FIELDS: readonly string[] = [
  ...REQUIRED_PANEL_FIELDS,
  "patient_id",
  "mmr_protein_lost",
  "p53_pattern",
  "er_percent",
  "pr_percent",
  "msi_status",
  "extended_markers",
];

const AUXILIARY_FIELDS: readonly string[] = [
  ...Object.values(MMR_PROTEIN_FIELDS),
  ...Object.values(EXTENDED_MARKER_FIELDS),
];

const KNOWN_FIELDS: ReadonlySet<string> = new Set([...PANEL_FIELDS, ...AUXILIARY_FIELDS]);

const NUMERIC_FIELDS: ReadonlySet<string> = new Set(["age", "bmi", "ecog_status", "er_percent", "pr_percent"]);

interface ValueDomain {
  vocabulary: readonly string[];
  synonyms: string;
}

const VALUE_DOMAINS: Partial<Record<string, ValueDomain>> = {
  stage: { vocabulary: FIGO_STAGES, synonyms: "stage" },
  histology: { vocabulary: HISTOLOGY_TYPES, synonyms: "histology" },
  grade: { vocabulary: GRADES, synonyms: "grade" },
  myometrial_invasion: { vocabulary: MYOMETRIAL_INVASIONS, synonyms: "myometrial_invasion" },
  lvsi: { vocabulary: LVSI_STATUSES, synonyms: "lvsi" },
  lymph_nodes: { vocabulary: LYMPH_NODE_STATUSES, synonyms: "lymph_nodes" },
  pole_status: { vocabulary: POLE_STATUSES, synonyms: "pole_status" },
  mmr_status: { vocabulary: MMR_STATUSES, synonyms: "mmr_status" },
  p53_status: { vocabulary: P53_STATUSES, synonyms: "p53_status" },
  l1cam_status: { vocabulary: L1CAM_STATUSES, synonyms: "l1cam_status" },
  ctnnb1_status: { vocabulary: CTNNB1_STATUSES, synonyms: "ctnnb1_status" },
  mmr_protein_lost: { vocabulary: MMR_PROTEINS, synonyms: "mmr_protein_lost" },
  p53_pattern: { vocabulary: P53_PATTERNS, synonyms: "p53_pattern" },
  msi_status: { vocabulary: MSI_STATUSES, synonyms: "msi_status" },
};

const MMR_PROTEIN_DOMAIN: ValueDomain = { vocabulary: ["Intact", "Lost"], synonyms: "mmr_protein" };
const EXTENDED_MARKER_DOMAIN: ValueDomain = { vocabulary: EXTENDED_MARKER_STATUSES, synonyms: "extended_marker" };

for (const protein of MMR_PROTEINS) VALUE_DOMAINS[MMR_PROTEIN_FIELDS[protein]] = MMR_PROTEIN_DOMAIN;
for (const marker of EXTENDED_MARKERS) VALUE_DOMAINS[EXTENDED_MARKER_FIELDS[marker]] = EXTENDED_MARKER_DOMAIN;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === "string" && value.trim() === "");
}

export function normalizeFieldKey(key: string): string {
  return key.trim().toLowerCase().replace(/[\s-]+/g, "_");
}

function resolveField(key: string): { field: string; aliased: boolean } | null {
  if (KNOWN_FIELDS.has(key)) return { field: key, aliased: false };
  const target = SYNONYMS.field_aliases[key];
  if (target !== undefined && KNOWN_FIELDS.has(target)) return { field: target, aliased: true };
  return null;
}

function mapCategorical(value: string, domain: ValueDomain): string {
  const needle = value.trim().toLowerCase();
  const canonical = domain.vocabulary.find((v) => v.toLowerCase() === needle);
  if (canonical !== undefined) return canonical;
  const synonym = SYNONYMS.values[domain.synonyms]?.[needle];
  return typeof synonym === "string" ? synonym : value;
}

function normalizeDiabetes(value: unknown): unknown {
  if (typeof value === "boolean") return value;
  if (value === 1 || value === 0) return value === 1;
  if (typeof value === "string") {
    const mapped = SYNONYMS.values.diabetes?.[value.trim().toLowerCase()];
    if (typeof mapped === "boolean") return mapped;
  }
  return value;
}

function normalizeNumber(value: unknown): unknown {
  if (typeof value !== "string") return value;
  const text = value.trim().replace(/%$/, "").trim();
  if (text === "") return value;
  const n = Number(text);
  return Number.isFinite(n) ? n : value;
}

/** Map a single value onto its field's vocabulary or numeric form. */
export function normalizeFieldValue(field: string, value: unknown): unknown {
  if (field === "diabetes") return normalizeDiabetes(value);
  if (NUMERIC_FIELDS.has(field)) return normalizeNumber(value);
  const domain = VALUE_DOMAINS[field];
  if (!domain) return value;
  if (typeof value === "string") return mapCategorical(value, domain);
  // Numeric codes such as grade 3 or stage 2 go through the same table
  if (typeof value === "number") {
    const mapped = mapCategorical(String(value), domain);
    return mapped === String(value) ? value : mapped;
  }
  return value;
}

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

export interface NormalizedFields {
  /** Panel-shaped input for parsePanel. */
  fields: Record<string, unknown>;
  /** Input keys that map to no panel field, as given. */
  unrecognized_fields: string[];
  /** Human-readable notes on fields filled by derivation. */
  derived: string[];
}

function collectExtendedMarkers(
  nested: unknown,
  flat: Map<ExtendedMarker, unknown>,
  unrecognized: string[],
): unknown {
  // Not a mapping: hand it to validation as-is
  if (nested !== undefined && !isRecord(nested)) return nested;
  const out: Record<string, unknown> = {};
  if (isRecord(nested)) {
    for (const [key, value] of Object.entries(nested)) {
      const marker = EXTENDED_MARKERS.find((m) => m.toLowerCase() === key.trim().toLowerCase());
      if (!marker) {
        unrecognized.push(`extended_markers.${key}`);
        continue;
      }
      if (!isBlank(value)) out[marker] = normalizeFieldValue(EXTENDED_MARKER_FIELDS[marker], value);
    }
  }
  for (const [marker, value] of flat) out[marker] = value;
  return Object.keys(out).length > 0 ? out : undefined;
}

/**
 * Derive mmr_status when the source reported only per-protein IHC or MSI.
 * Any lost protein → Deficient; all four intact → Proficient; MSI-high →
 * Deficient. An explicit mmr_status is never overridden.
 */
function deriveMmrStatus(fields: Record<string, unknown>, proteins: Map<MmrProtein, unknown>, derived: string[]): void {
  if (fields.mmr_status !== undefined) return;

  const lost = MMR_PROTEIN_PRIORITY.find((p) => proteins.get(p) === "Lost");
  if (lost) {
    fields.mmr_status = "Deficient";
    derived.push(`mmr_status: Deficient (loss of ${lost} by IHC)`);
    if (fields.mmr_protein_lost === undefined) {
      fields.mmr_protein_lost = lost;
      derived.push(`mmr_protein_lost: ${lost}`);
    }
    return;
  }
  if (MMR_PROTEINS.every((p) => proteins.get(p) === "Intact")) {
    fields.mmr_status = "Proficient";
    derived.push("mmr_status: Proficient (all four MMR proteins intact)");
    return;
  }
  if (fields.msi_status === "Unstable") {
    fields.mmr_status = "Deficient";
    derived.push("mmr_status: Deficient (MSI-high)");
  }
}

export function normalizeExtractedFields(raw: Readonly<Record<string, unknown>>): NormalizedFields {
  const fields: Record<string, unknown> = {};
  const aliasedFrom = new Set<string>();
  const proteins = new Map<MmrProtein, unknown>();
  const markers = new Map<ExtendedMarker, unknown>();
  const unrecognized: string[] = [];
  const derived: string[] = [];
  let nestedMarkers: unknown;

  for (const [rawKey, rawValue] of Object.entries(raw)) {
    const resolved = resolveField(normalizeFieldKey(rawKey));
    if (!resolved) {
      unrecognized.push(rawKey);
      continue;
    }
    if (isBlank(rawValue)) continue;

    const { field, aliased } = resolved;
    if (field === "extended_markers") {
      nestedMarkers = rawValue;
      continue;
    }

    const value = normalizeFieldValue(field, rawValue);
    const protein = MMR_PROTEINS.find((p) => MMR_PROTEIN_FIELDS[p] === field);
    if (protein) {
      proteins.set(protein, value);
      continue;
    }
    const marker = EXTENDED_MARKERS.find((m) => EXTENDED_MARKER_FIELDS[m] === field);
    if (marker) {
      markers.set(marker, value);
      continue;
    }

    // The canonical key wins over any alias; among aliases the first wins
    if (field in fields && (aliased || !aliasedFrom.has(field))) continue;
    fields[field] = value;
    if (aliased) aliasedFrom.add(field);
    else aliasedFrom.delete(field);
  }

  deriveMmrStatus(fields, proteins, derived);

  const extended = collectExtendedMarkers(nestedMarkers, markers, unrecognized);
  if (extended !== undefined) fields.extended_markers = extended;

  return { fields, unrecognized_fields: unrecognized, derived };
}

// ---------------------------------------------------------------------------
// Completeness
// ---------------------------------------------------------------------------

export interface PanelCompleteness {
  filled: RequiredPanelField[];
  missing: RequiredPanelField[];
  complete: boolean;
}

/** Which required fields are present. Says nothing about their validity. */
export function checkPanelCompleteness(fields: Readonly<Record<string, unknown>>): PanelCompleteness {
  const filled: RequiredPanelField[] = [];
  const missing: RequiredPanelField[] = [];
  for (const field of REQUIRED_PANEL_FIELDS) {
    if (isBlank(fields[field])) missing.push(field);
    else filled.push(field);
  }
  return { filled, missing, complete: missing.length === 0 };
}
