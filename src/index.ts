export * from "./types";
export * from "./lib/errors";
export * from "./lib/logger";
export * from "./lib/risk-config";
export * from "./lib/panel-validation";
export * from "./lib/panel-normalization";
export * from "./lib/molecular-classifier";
export * from "./lib/stage-risk";
export * from "./lib/feature-encoding";
export * from "./lib/recurrence-model";
export * from "./lib/risk-reconciler";
export * from "./lib/explanation-engine";
export * from "./lib/figo-2023-staging";
export * from "./lib/treatment-recommendation";
export * from "./lib/risk-assessment";
export * from "./lib/demo-scenarios";
