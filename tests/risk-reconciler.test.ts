/**
 * Risk categories and stage/model reconciliation.
 */
import { describe, it, expect } from "vitest";
import { reconcile, riskCategory } from "@/lib/risk-reconciler";
import { ModelUnavailableError } from "@/lib/errors";

const opts = { modelVersion: "test-1", assessmentDate: new Date("2026-01-15T10:00:00Z") };

describe("riskCategory", () => {
  it.each([
    [0, "LOW"],
    [0.149999, "LOW"],
    [0.15, "INTERMEDIATE"],
    [0.399999, "INTERMEDIATE"],
    [0.4, "HIGH"],
    [1, "HIGH"],
  ])("%s → %s", (p, expected) => {
    expect(riskCategory(p)).toBe(expected);
  });

  it("applies custom thresholds", () => {
    expect(riskCategory(0.12, { intermediate: 0.1, high: 0.3 })).toBe("INTERMEDIATE");
    expect(riskCategory(0.3, { intermediate: 0.1, high: 0.3 })).toBe("HIGH");
  });
});

describe("reconcile", () => {
  it("flags a category change as reclassification", () => {
    const a = reconcile(0.1, 0.45, opts);
    expect(a.risk_category).toBe("HIGH");
    expect(a.stage_risk_category).toBe("LOW");
    expect(a.reclassified).toBe(true);
    expect(a.risk_difference).toBeCloseTo(0.35, 10);
    expect(a.recurrence_probability).toBe(0.45);
    expect(a.stage_based_risk).toBe(0.1);
  });

  it("does not flag a difference within the same category", () => {
    const a = reconcile(0.2, 0.25, opts);
    expect(a.risk_category).toBe("INTERMEDIATE");
    expect(a.reclassified).toBe(false);
    expect(a.risk_difference).toBeCloseTo(0.05, 10);
  });

  it("records the model version, date and percentile", () => {
    const a = reconcile(0.2, 0.25, { ...opts, riskPercentile: 62 });
    expect(a.model_version).toBe("test-1");
    expect(a.assessment_date).toBe("2026-01-15T10:00:00.000Z");
    expect(a.risk_percentile).toBe(62);
    expect(reconcile(0.2, 0.25, opts).risk_percentile).toBeNull();
  });

  it.each([Number.NaN, undefined, Number.POSITIVE_INFINITY, 1.2, -0.1])(
    "rejects unusable model output %s",
    (bad) => {
      expect(() => reconcile(0.1, bad, opts)).toThrow(ModelUnavailableError);
    },
  );

  it("carries the model version on the error", () => {
    try {
      reconcile(0.1, Number.NaN, opts);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ModelUnavailableError);
      if (err instanceof ModelUnavailableError) {
        expect(err.code).toBe("MODEL_UNAVAILABLE");
        expect(err.details.modelVersion).toBe("test-1");
      }
    }
  });

  it("clamps the stage risk into [0, 1]", () => {
    expect(reconcile(1.3, 0.5, opts).stage_based_risk).toBe(1);
    expect(reconcile(-0.2, 0.1, opts).stage_based_risk).toBe(0);
  });

  it("rejects a non-finite stage risk", () => {
    expect(() => reconcile(Number.NaN, 0.1, opts)).toThrow(RangeError);
  });

  it("uses the same thresholds for both sides", () => {
    const a = reconcile(0.05, 0.12, { ...opts, thresholds: { intermediate: 0.1, high: 0.3 } });
    expect(a.stage_risk_category).toBe("LOW");
    expect(a.risk_category).toBe("INTERMEDIATE");
    expect(a.reclassified).toBe(true);
  });
});
