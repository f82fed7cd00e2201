export * from "./errors/catalog.js";
export * from "./dataset/types.js";
export * from "./schemas/index.js";
export * from "./config/index.js";
export * from "./logger/index.js";
export * from "./scan/index.js";
export * from "./validate/index.js";
export * from "./plan/index.js";
export * from "./assemble/index.js";
export * from "./stores/index.js";
export * from "./manifest/index.js";
export * from "./upload/index.js";
export * from "./pipeline/index.js";
