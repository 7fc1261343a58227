export * from "./types.js";
export { parseScenario } from "./parser.js";
export { runScenario, type RunScenarioOptions, type ScenarioResult } from "./runner.js";
export { formatScenarioResult, type FormatOptions } from "./format.js";
