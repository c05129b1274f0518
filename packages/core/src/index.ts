export * from "./types/index.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./headers.js";
export * from "./requestKind.js";
export * from "./props.js";
export * from "./version.js";
export * from "./page.js";
export * from "./config.js";
export * from "./controller.js";
export * from "./ssr/ssrClient.js";
export * from "./ssr/rendererProcess.js";
export * from "./template/manifest.js";
export * from "./template/resolver.js";
export * from "./utils/http.js";
