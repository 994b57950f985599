export * from "./state";
export * from "./strategies";
export * from "./config-builder";
export * from "./csv";
export * from "./normalizer";
export * from "./orchestrator";
