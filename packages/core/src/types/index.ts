/**
 * @fileoverview Type exports for the core package
 */

export * from "./json.js";
export * from "./props.js";
export * from "./request.js";
export * from "./page.js";
