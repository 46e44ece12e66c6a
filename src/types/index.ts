/**
 * Shared type foundations for the purification workflow.
 */

export * from "./protein.js";
export * from "./module.js";
export * from "./pipeline.js";
