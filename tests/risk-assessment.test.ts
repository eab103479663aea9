/**
 * End-to-end assessment pipeline with the bundled model and stub models.
 */
import { describe, it, expect, vi } from "vitest";
import { assessBatch, assessInput, assessPanel, explainAssessment } from "@/lib/risk-assessment";
import type { AssessmentContext } from "@/lib/risk-assessment";
import { loadBundledModel } from "@/lib/recurrence-model";
import type { RecurrenceRiskModel } from "@/lib/recurrence-model";
import { FEATURE_ENCODING_VERSION } from "@/lib/feature-encoding";
import { createAdditiveExplainer } from "@/lib/explanation-engine";
import { InvalidPanelError, ModelUnavailableError } from "@/lib/errors";
import { createLogger } from "@/lib/logger";
import { FALSE_ALARM, SILENT_KILLER, UNTESTED, makePanel } from "./panel-fixtures";

const model = loadBundledModel();
const fixedClock = () => new Date("2026-03-01T12:00:00Z");

function stubModel(predict: () => number, encodingVersion = FEATURE_ENCODING_VERSION): RecurrenceRiskModel {
  return { version: "stub-1", encodingVersion, predict };
}

function recordingSink() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

// ─── Worked cases ────────────────────────────────────────────

describe("assessPanel — bundled model", () => {
  const ctx: AssessmentContext = { model, now: fixedClock };

  it("reclassifies an early-stage p53-abnormal tumor upward", () => {
    const { assessment, classification, figo2023, stageRisk } = assessPanel(SILENT_KILLER, ctx);
    expect(classification.group).toBe("p53abn");
    expect(stageRisk.risk).toBe(0.065);
    expect(assessment.stage_risk_category).toBe("LOW");
    expect(assessment.recurrence_probability).toBeCloseTo(0.17115, 4);
    expect(assessment.risk_category).toBe("INTERMEDIATE");
    expect(assessment.reclassified).toBe(true);
    expect(assessment.risk_difference).toBeCloseTo(0.10615, 4);
    expect(assessment.risk_percentile).toBe(70);
    expect(assessment.model_version).toBe("1.0.0");
    expect(assessment.assessment_date).toBe("2026-03-01T12:00:00.000Z");
    expect(figo2023.figo_2023_stage).toBe("IC");
  });

  it("reclassifies an advanced POLE-mutated tumor downward", () => {
    const { assessment, figo2023 } = assessPanel(FALSE_ALARM, ctx);
    expect(assessment.stage_based_risk).toBe(0.85);
    expect(assessment.stage_risk_category).toBe("HIGH");
    expect(assessment.risk_category).toBe("LOW");
    expect(assessment.reclassified).toBe(true);
    expect(figo2023.figo_2023_stage).toBe("IIIC1");
    expect(figo2023.molecular_modifier).toBe("m1");
  });

  it("does not reclassify when both estimates agree", () => {
    const { assessment } = assessPanel(makePanel(), ctx);
    expect(assessment.risk_category).toBe("LOW");
    expect(assessment.stage_risk_category).toBe("LOW");
    expect(assessment.reclassified).toBe(false);
  });

  it("applies threshold overrides to both estimates", () => {
    const { assessment } = assessPanel(SILENT_KILLER, { ...ctx, thresholds: { intermediate: 0.1, high: 0.17 } });
    expect(assessment.risk_category).toBe("HIGH");
    expect(assessment.stage_risk_category).toBe("LOW");
  });

  it("explains with the vector the model scored", () => {
    const result = assessPanel(SILENT_KILLER, ctx);
    const explanation = explainAssessment(result, createAdditiveExplainer(model));
    expect(explanation.prediction).toBe(result.assessment.recurrence_probability);
    expect(explanation.summary).toBe(
      "INTERMEDIATE risk (17% recurrence) driven primarily by Molecular Classification (p53abn) and Grade",
    );
  });
});

// ─── Logging ─────────────────────────────────────────────────

describe("assessPanel — logging", () => {
  it("warns when no primary marker was tested", () => {
    const sink = recordingSink();
    const { classification } = assessPanel(UNTESTED, { model, logger: createLogger("warn", sink) });
    expect(classification.ambiguous).toBe(true);
    expect(sink.warn).toHaveBeenCalledTimes(1);
    expect(sink.warn).toHaveBeenCalledWith(
      "[ec-risk] AmbiguousClassification: no primary marker tested, NSMP assigned by default",
      { patient: null, confidence: 0.4 },
    );
    expect(sink.debug).not.toHaveBeenCalled();
  });

  it("logs completion at debug level", () => {
    const sink = recordingSink();
    assessPanel(SILENT_KILLER, { model, logger: createLogger("debug", sink) });
    expect(sink.debug).toHaveBeenCalledWith("[ec-risk] Assessment complete", {
      patient: "TEST-SK",
      group: "p53abn",
      risk_category: "INTERMEDIATE",
      reclassified: true,
    });
  });
});

// ─── Model failures ──────────────────────────────────────────

describe("assessPanel — model failures", () => {
  it.each([Number.NaN, 1.5, -0.2])("rejects model output %s", (value) => {
    const sink = recordingSink();
    const ctx = { model: stubModel(() => value), logger: createLogger("info", sink) };
    expect(() => assessPanel(makePanel(), ctx)).toThrow(ModelUnavailableError);
    expect(sink.error).toHaveBeenCalledWith("[ec-risk] Model stub-1 returned an unusable probability", {
      patient: null,
      modelVersion: "stub-1",
    });
  });

  it("wraps an inference crash", () => {
    const crash = new Error("tensor shape mismatch");
    const ctx = {
      model: stubModel(() => {
        throw crash;
      }),
    };
    try {
      assessPanel(makePanel(), ctx);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ModelUnavailableError);
      if (err instanceof ModelUnavailableError) {
        expect(err.message).toBe("Model stub-1 failed during inference");
        expect(err.cause).toBe(crash);
      }
    }
  });

  it("refuses a model fitted on another encoding", () => {
    const ctx = { model: stubModel(() => 0.2, "ec-features/0") };
    expect(() => assessPanel(makePanel(), ctx)).toThrow(
      "Model stub-1 expects encoding ec-features/0, got ec-features/1",
    );
  });

  it("treats a percentile crash as a model failure", () => {
    const ctx = {
      model: {
        ...stubModel(() => 0.2),
        percentile: (): number | null => {
          throw new Error("deciles missing");
        },
      },
    };
    expect(() => assessPanel(makePanel(), ctx)).toThrow("Model stub-1 failed during inference");
  });

  it("does not blame the model for a stage outside the vocabulary", () => {
    const sink = recordingSink();
    const predict = vi.fn(() => 0.2);
    const panel = Object.assign({}, makePanel(), { stage: "IC" });
    expect(() => assessPanel(panel, { model: stubModel(predict), logger: createLogger("info", sink) })).toThrow(
      InvalidPanelError,
    );
    expect(predict).not.toHaveBeenCalled();
    expect(sink.error).not.toHaveBeenCalled();
  });

  it("reports no percentile for a model without a reference population", () => {
    const { assessment } = assessPanel(makePanel(), { model: stubModel(() => 0.5) });
    expect(assessment.risk_percentile).toBeNull();
    expect(assessment.risk_category).toBe("HIGH");
  });
});

// ─── Input and batch ─────────────────────────────────────────

describe("assessInput / assessBatch", () => {
  it("validates before scoring", () => {
    const predict = vi.fn(() => 0.2);
    expect(() => assessInput({ stage: "IA" }, { model: stubModel(predict) })).toThrow(InvalidPanelError);
    expect(predict).not.toHaveBeenCalled();
  });

  it("reports each item independently", () => {
    const outcomes = assessBatch([SILENT_KILLER, { ...makePanel(), grade: "G4" }, FALSE_ALARM], { model });
    expect(outcomes.map((o) => o.ok)).toEqual([true, false, true]);
    const failed = outcomes[1];
    if (!failed.ok) {
      expect(failed.error).toBeInstanceOf(InvalidPanelError);
      expect(failed.error.message).toBe("Invalid biomarker panel: grade");
    }
    const first = outcomes[0];
    if (first.ok) expect(first.result.classification.group).toBe("p53abn");
  });

  it("lets errors that are not engine errors propagate", () => {
    const sink = recordingSink();
    sink.warn.mockImplementation(() => {
      throw new TypeError("sink closed");
    });
    expect(() => assessBatch([UNTESTED], { model, logger: createLogger("info", sink) })).toThrow("sink closed");
  });
});
