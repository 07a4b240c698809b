export * from "./types.js";
export * from "./errors.js";
export * from "./repo.js";
export * from "./window.js";
export * from "./rules/engagement-classifier.js";
export * from "./rules/close-attribution.js";
