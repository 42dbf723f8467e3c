export * from "./types/registry.js";
export * from "./types/records.js";
export * from "./types/responses.js";
