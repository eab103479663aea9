/**
 * Attribution engine and clinician-facing explanation.
 */
import { describe, it, expect } from "vitest";
import { loadBundledModel } from "@/lib/recurrence-model";
import { encodeFeatures } from "@/lib/feature-encoding";
import { buildExplanation, createAdditiveExplainer } from "@/lib/explanation-engine";
import { ModelUnavailableError } from "@/lib/errors";
import { FALSE_ALARM, SILENT_KILLER, makePanel } from "./panel-fixtures";

const model = loadBundledModel();
const explainer = createAdditiveExplainer(model);

// ─── Attributions ────────────────────────────────────────────

describe("createAdditiveExplainer", () => {
  it("attributions add up exactly to the model logit", () => {
    for (const [panel, group] of [
      [SILENT_KILLER, "p53abn"],
      [FALSE_ALARM, "POLEmut"],
      [makePanel({ pole_status: "Not Tested", diabetes: true, ecog_status: 2 }), "NSMP"],
    ] as const) {
      const v = encodeFeatures(panel, group);
      const result = explainer.explain(v);
      const sum = result.attributions.reduce((acc, a) => acc + a.contribution, result.baseValue);
      expect(result.attributions).toHaveLength(16);
      expect(sum).toBeCloseTo(model.logit(v), 10);
      expect(result.logit).toBeCloseTo(model.logit(v), 10);
    }
  });

  it("orders attributions by magnitude", () => {
    const result = explainer.explain(encodeFeatures(SILENT_KILLER, "p53abn"));
    expect(result.baseValue).toBe(-3.35);
    expect(result.attributions.slice(0, 4).map((a) => a.feature)).toEqual([
      "molecular_group_encoded",
      "grade_encoded",
      "p53_encoded",
      "l1cam_encoded",
    ]);
    expect(result.attributions[0].direction).toBe("risk");
    expect(result.attributions[0].encoded).toBe(3);
  });

  it("marks features at their reference level as neutral", () => {
    const reference = explainer.explain(encodeFeatures(makePanel({ age: 63 }), "NSMP"));
    expect(reference.attributions.every((a) => a.direction === "neutral")).toBe(true);

    const directions = new Map(
      explainer.explain(encodeFeatures(FALSE_ALARM, "POLEmut")).attributions.map((a) => [a.feature, a.direction]),
    );
    expect(directions.get("molecular_group_encoded")).toBe("protective");
    expect(directions.get("stage_encoded")).toBe("risk");
    expect(directions.get("diabetes_int")).toBe("neutral");
    expect(directions.get("mmr_encoded")).toBe("neutral");
  });

  it("rejects a vector from another encoding", () => {
    const v = encodeFeatures(makePanel(), "NSMP");
    expect(() => explainer.explain({ ...v, encodingVersion: "ec-features/0" })).toThrow(ModelUnavailableError);
  });
});

// ─── Explanation ─────────────────────────────────────────────

describe("buildExplanation", () => {
  it("explains a high-grade p53-abnormal early-stage tumor", () => {
    const v = encodeFeatures(SILENT_KILLER, "p53abn");
    const e = buildExplanation(v, explainer, {
      recurrence_probability: model.predict(v),
      risk_category: "INTERMEDIATE",
      model_version: model.version,
    });

    expect(e.model_version).toBe("1.0.0");
    expect(e.features.map((f) => f.name)).toEqual([
      "molecular_group_encoded",
      "grade_encoded",
      "p53_encoded",
      "l1cam_encoded",
      "lvsi_encoded",
      "ecog_status",
      "bmi",
      "age",
    ]);
    expect(e.features.map((f) => f.importance_rank)).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
    expect(e.top_risk_factors.map((f) => `${f.display_name} (${f.value})`)).toEqual([
      "Molecular Classification (p53abn)",
      "Grade (G3)",
      "p53 Status (Abnormal)",
    ]);
    expect(e.top_protective_factors).toEqual([]);
    expect(e.summary).toBe(
      "INTERMEDIATE risk (17% recurrence) driven primarily by Molecular Classification (p53abn) and Grade",
    );
    expect(e.interactions).toHaveLength(1);
    expect(e.interactions[0].features).toEqual(["p53_encoded", "stage_encoded"]);
  });

  it("separates protective from risk factors", () => {
    const v = encodeFeatures(FALSE_ALARM, "POLEmut");
    const e = buildExplanation(v, explainer, {
      recurrence_probability: model.predict(v),
      risk_category: "LOW",
      model_version: model.version,
    });

    expect(e.top_protective_factors.map((f) => `${f.display_name} (${f.value})`)).toEqual([
      "Molecular Classification (POLEmut)",
      "POLE Status (Mutated)",
      "Age (58 years)",
    ]);
    expect(e.top_risk_factors.map((f) => `${f.display_name} (${f.value})`)).toEqual([
      "FIGO Stage (IIIC1)",
      "LVSI (Substantial)",
      "Lymph Node Status (Pelvic+)",
    ]);
    expect(e.features.find((f) => f.name === "bmi")?.value).toBe("28.0");
    expect(e.summary).toBe("LOW risk (6% recurrence) driven primarily by FIGO Stage (IIIC1) and LVSI");
    expect(e.interactions.map((i) => i.features)).toEqual([["lvsi_encoded", "grade_encoded"]]);
  });

  it("drops negligible attributions and falls back to the overall profile", () => {
    const v = encodeFeatures(makePanel({ age: 63 }), "NSMP");
    const e = buildExplanation(v, explainer, {
      recurrence_probability: model.predict(v),
      risk_category: "LOW",
      model_version: model.version,
    });
    expect(e.features).toEqual([]);
    expect(e.summary).toBe("LOW risk (3% recurrence) based on overall clinical profile");
    expect(e.logit).toBeCloseTo(e.base_value, 10);
  });

  it("flags L1CAM positivity in NSMP", () => {
    const v = encodeFeatures(makePanel({ l1cam_status: "Positive" }), "NSMP");
    const e = buildExplanation(v, explainer, {
      recurrence_probability: model.predict(v),
      risk_category: "LOW",
      model_version: model.version,
    });
    expect(e.interactions.map((i) => i.features)).toEqual([["l1cam_encoded", "molecular_group_encoded"]]);
  });

  it("refuses to explain an assessment from a different model", () => {
    const v = encodeFeatures(makePanel(), "NSMP");
    expect(() =>
      buildExplanation(v, explainer, { recurrence_probability: 0.03, risk_category: "LOW", model_version: "0.9.0" }),
    ).toThrow("Explainer is bound to model 1.0.0, assessment came from 0.9.0");
  });
});
