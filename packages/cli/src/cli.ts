/**
 * CLI argument parsing and command dispatch
 */

export { VERSION, showHelp, parseArgs, runCli } from "./cli/index.js";
export * from "./types.js";
export * from "./config.js";
export { type GenerationResult, generateRegistrations } from "./pipeline.js";
export { type GenerateSummary, generateCommand } from "./commands/generate.js";
export { listCommand } from "./commands/list.js";
export { type CheckOutcome, checkCommand } from "./commands/check.js";
