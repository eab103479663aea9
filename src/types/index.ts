export * from "./panel";
export * from "./assessment";
