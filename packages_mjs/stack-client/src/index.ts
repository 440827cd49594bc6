/**
 * Stack Client - reads stack outputs and metadata from the watson service
 */

export const VERSION = "0.1.0";

export * from "./constants.js";
export * from "./errors.js";
export * from "./config.js";
export * from "./types.js";
export * from "./stack-name.js";
export * from "./client.js";
export * from "./core/base-client.js";
export * from "./outputs/projection.js";
