/**
 * Curated demonstration cases. Panels are validated when the catalog is
 * first read, so a malformed scenario fails loudly instead of at assessment.
 */

import { z } from "zod";
import scenarioData from "@/data/demo-scenarios.json";
import { MOLECULAR_GROUPS } from "@/types/assessment";
import type { MolecularGroup } from "@/types/assessment";
import type { BiomarkerPanel } from "@/types/panel";
import { parsePanel } from "./panel-validation";

export interface ScenarioPatient {
  readonly label: string;
  readonly panel: BiomarkerPanel;
}

export interface DemoScenario {
  readonly id: string;
  readonly title: string;
  readonly subtitle: string;
  readonly description: string;
  readonly expected_molecular_group: MolecularGroup;
  readonly key_insight: string;
  readonly narrative_points: readonly string[];
  readonly patients: readonly ScenarioPatient[];
}

export type ScenarioSummary = Omit<DemoScenario, "patients" | "narrative_points"> & { patient_count: number };

const ScenarioSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  subtitle: z.string(),
  description: z.string(),
  expected_molecular_group: z.enum(MOLECULAR_GROUPS),
  key_insight: z.string(),
  narrative_points: z.array(z.string()),
  patients: z.array(z.object({ label: z.string(), panel: z.unknown() })).min(1),
});

let catalog: readonly DemoScenario[] | null = null;

function scenarios(): readonly DemoScenario[] {
  if (catalog) return catalog;
  const parsed = z.array(ScenarioSchema).parse(scenarioData);
  // Shared by every caller, so frozen all the way down.
  catalog = Object.freeze(
    parsed.map(
      (s): DemoScenario =>
        Object.freeze({
          ...s,
          narrative_points: Object.freeze(s.narrative_points),
          patients: Object.freeze(
            s.patients.map((p) => Object.freeze({ label: p.label, panel: parsePanel(p.panel) })),
          ),
        }),
    ),
  );
  return catalog;
}

export function listScenarios(): ScenarioSummary[] {
  return scenarios().map((s) => ({
    id: s.id,
    title: s.title,
    subtitle: s.subtitle,
    description: s.description,
    expected_molecular_group: s.expected_molecular_group,
    key_insight: s.key_insight,
    patient_count: s.patients.length,
  }));
}

/** Undefined for an unknown id. */
export function getScenario(id: string): DemoScenario | undefined {
  return scenarios().find((s) => s.id === id);
}
