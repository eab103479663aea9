/**
 * Turns untrusted input into a frozen BiomarkerPanel.
 * Missing required fields and out-of-vocabulary values are rejected with an
 * InvalidPanelError listing every offending field; nothing is defaulted.
 * Unknown keys are stripped.
 */

import { z } from "zod";
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
} from "@/types/panel";
import type { BiomarkerPanel, ExtendedMarker, ExtendedMarkerStatus } from "@/types/panel";
import { InvalidPanelError } from "./errors";
import type { PanelIssue } from "./errors";

const percent = z.number().finite().min(0).max(100);

const extendedMarkerStatus = z.enum(EXTENDED_MARKER_STATUSES);

export const BiomarkerPanelSchema = z.object({
  patient_id: z.string().min(1).optional(),

  age: z.number().int().min(18).max(110),
  bmi: z.number().finite().positive(),
  diabetes: z.boolean(),
  ecog_status: z.number().int().min(0).max(4),

  stage: z.enum(FIGO_STAGES),
  histology: z.enum(HISTOLOGY_TYPES),
  grade: z.enum(GRADES),
  myometrial_invasion: z.enum(MYOMETRIAL_INVASIONS),
  lvsi: z.enum(LVSI_STATUSES),
  lymph_nodes: z.enum(LYMPH_NODE_STATUSES),

  pole_status: z.enum(POLE_STATUSES),
  mmr_status: z.enum(MMR_STATUSES),
  p53_status: z.enum(P53_STATUSES),
  l1cam_status: z.enum(L1CAM_STATUSES),
  ctnnb1_status: z.enum(CTNNB1_STATUSES),

  mmr_protein_lost: z.enum(MMR_PROTEINS).optional(),
  p53_pattern: z.enum(P53_PATTERNS).optional(),
  er_percent: percent.optional(),
  pr_percent: percent.optional(),
  msi_status: z.enum(MSI_STATUSES).optional(),
  extended_markers: z
    .object({
      PTEN: extendedMarkerStatus.optional(),
      PIK3CA: extendedMarkerStatus.optional(),
      KRAS: extendedMarkerStatus.optional(),
      FBXW7: extendedMarkerStatus.optional(),
      FGFR2: extendedMarkerStatus.optional(),
    })
    .strict()
    .optional(),
});

function toIssues(error: z.ZodError): PanelIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join(".") : "(root)",
    message: issue.message,
  }));
}

function freezeExtended(
  markers: Partial<Record<ExtendedMarker, ExtendedMarkerStatus>>,
): Readonly<Partial<Record<ExtendedMarker, ExtendedMarkerStatus>>> {
  const out: Partial<Record<ExtendedMarker, ExtendedMarkerStatus>> = {};
  for (const marker of EXTENDED_MARKERS) {
    const status = markers[marker];
    if (status !== undefined) out[marker] = status;
  }
  return Object.freeze(out);
}

/** Validate and freeze. Throws InvalidPanelError. */
export function parsePanel(input: unknown): BiomarkerPanel {
  const result = BiomarkerPanelSchema.safeParse(input);
  if (!result.success) {
    const issues = toIssues(result.error);
    const fields = [...new Set(issues.map((i) => i.field))].join(", ");
    throw new InvalidPanelError(`Invalid biomarker panel: ${fields}`, { issues });
  }
  const { extended_markers, ...rest } = result.data;
  const panel: BiomarkerPanel = extended_markers
    ? { ...rest, extended_markers: freezeExtended(extended_markers) }
    : rest;
  return Object.freeze(panel);
}

/** Non-throwing variant for intake surfaces that show every problem at once. */
export function validatePanel(
  input: unknown,
): { ok: true; panel: BiomarkerPanel } | { ok: false; issues: PanelIssue[] } {
  try {
    return { ok: true, panel: parsePanel(input) };
  } catch (err) {
    if (err instanceof InvalidPanelError) return { ok: false, issues: err.issues };
    throw err;
  }
}
