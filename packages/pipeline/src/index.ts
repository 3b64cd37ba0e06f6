export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";

export {
  readConfigFile,
  parseRiskConfig,
  loadRiskConfig,
  FORMAT_ENV_VAR,
  DEFAULT_FORMAT,
  DEFAULT_DELIMITER,
} from "./config.js";
export type { Env, RiskConfig, ResolvedReportOptions } from "./config.js";

export { analyze, runPipeline } from "./run.js";
export type { AnalyzeOptions, RunOptions, RunResult } from "./run.js";

export { main, usage, EXIT_OK, EXIT_FAILURE, EXIT_CONFIG, EXIT_DATA } from "./cli/supply-risk.js";
export type { CliIO } from "./cli/supply-risk.js";

export { VERSION } from "./version.js";
