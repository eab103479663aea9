import { describe, it, expect } from "vitest";
import { parsePanel, validatePanel } from "@/lib/panel-validation";
import { InvalidPanelError } from "@/lib/errors";
import { makePanel } from "./panel-fixtures";

function without(field: string): Record<string, unknown> {
  return Object.fromEntries(Object.entries(makePanel()).filter(([key]) => key !== field));
}

describe("parsePanel", () => {
  it("accepts a complete panel and freezes it", () => {
    const panel = parsePanel({ ...makePanel(), extended_markers: { KRAS: "Mutated" } });
    expect(panel.stage).toBe("IA");
    expect(Object.isFrozen(panel)).toBe(true);
    expect(panel.extended_markers).toEqual({ KRAS: "Mutated" });
    expect(Object.isFrozen(panel.extended_markers)).toBe(true);
  });

  it("strips unknown keys", () => {
    const panel = parsePanel({ ...makePanel(), notes: "free text" });
    expect("notes" in panel).toBe(false);
  });

  it("rejects a missing required field without defaulting it", () => {
    expect(() => parsePanel(without("ecog_status"))).toThrow("Invalid biomarker panel: ecog_status");
    expect(() => parsePanel(without("diabetes"))).toThrow(InvalidPanelError);
  });

  it("lists every offending field", () => {
    try {
      parsePanel({ ...without("stage"), grade: "G4", lvsi: "Present" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidPanelError);
      if (err instanceof InvalidPanelError) {
        expect(err.message).toBe("Invalid biomarker panel: stage, grade, lvsi");
        expect(err.issues.map((i) => i.field)).toEqual(["stage", "grade", "lvsi"]);
        expect(err.code).toBe("INVALID_PANEL");
      }
    }
  });

  it("treats Not Tested as a value, not a missing field", () => {
    expect(parsePanel(makePanel({ pole_status: "Not Tested" })).pole_status).toBe("Not Tested");
  });

  it("rejects out-of-range clinical values", () => {
    expect(() => parsePanel(makePanel({ ecog_status: 5 }))).toThrow("ecog_status");
    expect(() => parsePanel(makePanel({ age: 64.5 }))).toThrow("age");
    expect(() => parsePanel(makePanel({ bmi: 0 }))).toThrow("bmi");
  });

  it("rejects unknown extended markers", () => {
    expect(() => parsePanel({ ...makePanel(), extended_markers: { BRCA1: "Mutated" } })).toThrow(
      "Invalid biomarker panel: extended_markers",
    );
  });

  it("rejects input that is not an object", () => {
    expect(() => parsePanel("IA G3")).toThrow("Invalid biomarker panel: (root)");
  });
});

describe("validatePanel", () => {
  it("returns issues instead of throwing", () => {
    const result = validatePanel(without("p53_status"));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.issues).toEqual([{ field: "p53_status", message: "Required" }]);
    }
  });

  it("returns the frozen panel when valid", () => {
    const result = validatePanel(makePanel());
    expect(result.ok).toBe(true);
    if (result.ok) expect(result.panel.grade).toBe("G1");
  });
});
