import { describe, it, expect } from "vitest";
import {
  FEATURE_ENCODING_VERSION,
  FEATURE_NAMES,
  decodeFeatures,
  encodeFeatures,
  featureValue,
} from "@/lib/feature-encoding";
import type { FeatureVector } from "@/lib/feature-encoding";
import { InvalidPanelError } from "@/lib/errors";
import { SILENT_KILLER, UNTESTED, makePanel } from "./panel-fixtures";

function withValue(vector: FeatureVector, name: (typeof FEATURE_NAMES)[number], value: number): FeatureVector {
  return {
    encodingVersion: vector.encodingVersion,
    names: vector.names,
    values: vector.values.map((v, i) => (vector.names[i] === name ? value : v)),
  };
}

describe("encodeFeatures", () => {
  it("emits every feature in the fixed order", () => {
    const v = encodeFeatures(SILENT_KILLER, "p53abn");
    expect(v.encodingVersion).toBe(FEATURE_ENCODING_VERSION);
    expect(v.names).toEqual(FEATURE_NAMES);
    expect(v.values).toEqual([3, 1, 0, 1, 1, 0, 2, 0, 64, 0, 0, 0, 0, 32.5, 1, 0]);
  });

  it("encodes Not Tested as -1, distinct from a negative result", () => {
    const untested = encodeFeatures(UNTESTED, "NSMP");
    const negative = encodeFeatures(makePanel(), "NSMP");
    expect(featureValue(untested, "pole_encoded")).toBe(-1);
    expect(featureValue(untested, "mmr_encoded")).toBe(-1);
    expect(featureValue(untested, "p53_encoded")).toBe(-1);
    expect(featureValue(negative, "pole_encoded")).toBe(0);
  });

  it("encodes diabetes as 0/1", () => {
    expect(featureValue(encodeFeatures(makePanel({ diabetes: true }), "NSMP"), "diabetes_int")).toBe(1);
  });

  it("returns a frozen vector", () => {
    const v = encodeFeatures(makePanel(), "NSMP");
    expect(Object.isFrozen(v)).toBe(true);
    expect(Object.isFrozen(v.values)).toBe(true);
  });

  it("rejects a stage outside the vocabulary", () => {
    const panel = Object.assign({}, makePanel(), { stage: "IC" });
    expect(() => encodeFeatures(panel, "NSMP")).toThrow(InvalidPanelError);
    expect(() => encodeFeatures(panel, "NSMP")).toThrow("Unknown value IC for stage");
  });
});

describe("decodeFeatures", () => {
  it("recovers every encoded field", () => {
    const decoded = decodeFeatures(encodeFeatures(SILENT_KILLER, "p53abn"));
    expect(decoded).toEqual({
      molecular_group: "p53abn",
      p53_status: "Abnormal",
      pole_status: "Wild-type",
      lvsi: "Focal",
      l1cam_status: "Positive",
      myometrial_invasion: "<50%",
      grade: "G3",
      stage: "IA",
      age: 64,
      mmr_status: "Proficient",
      ctnnb1_status: "Wild-type",
      histology: "Endometrioid",
      lymph_nodes: "Negative",
      bmi: 32.5,
      ecog_status: 1,
      diabetes: false,
    });
  });

  it("recovers Not Tested markers", () => {
    const decoded = decodeFeatures(encodeFeatures(UNTESTED, "NSMP"));
    expect(decoded.pole_status).toBe("Not Tested");
    expect(decoded.mmr_status).toBe("Not Tested");
    expect(decoded.p53_status).toBe("Not Tested");
  });

  it("rejects a vector from another encoding version", () => {
    const v = encodeFeatures(makePanel(), "NSMP");
    expect(() => decodeFeatures({ ...v, encodingVersion: "ec-features/0" })).toThrow(InvalidPanelError);
  });

  it("rejects an unknown categorical code", () => {
    const v = withValue(encodeFeatures(makePanel(), "NSMP"), "stage_encoded", 9);
    expect(() => decodeFeatures(v)).toThrow("Unknown code 9 for stage");
  });

  it("rejects a diabetes code other than 0 or 1", () => {
    const v = withValue(encodeFeatures(makePanel(), "NSMP"), "diabetes_int", 2);
    expect(() => decodeFeatures(v)).toThrow("Unknown code 2 for diabetes");
  });

  it("rejects a vector missing a feature", () => {
    const v = encodeFeatures(makePanel(), "NSMP");
    const short: FeatureVector = { ...v, values: v.values.slice(0, 10) };
    expect(() => decodeFeatures(short)).toThrow(InvalidPanelError);
  });
});
