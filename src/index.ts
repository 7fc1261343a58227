export * from "./core/index.js";
export * from "./scenario/index.js";
