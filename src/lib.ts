/**
 * Library entry point.
 */

export * from "./circuit/index.js";
export * from "./dataset/index.js";
export * from "./results/index.js";
export * from "./complex.js";
export * from "./errors.js";
export { getConfig, loadConfig, type Config } from "./config.js";
