import { ConfigurationError, DataFormatError } from "../../../model/src/errors.js";
import { loadRiskConfig } from "../config.js";
import type { Env } from "../config.js";
import { createLogger } from "../logger.js";
import { runPipeline } from "../run.js";
import { VERSION } from "../version.js";

export type CliIO = {
  stdout: (s: string) => void;
  stderr: (s: string) => void;
  env: Env;
};

const log = createLogger("supply-risk");

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CONFIG = 2;
export const EXIT_DATA = 3;

const defaultIO: CliIO = {
  stdout: (s) => process.stdout.write(s),
  stderr: (s) => process.stderr.write(s),
  env: process.env,
};

export function usage(): string {
  return `supply-risk - rule-based supply chain risk reports

Usage:
  supply-risk --help
  supply-risk version

  supply-risk run --data <file.csv> --rules <config.yaml> [--out <file>]
                  [--format text|json|sqlite] [--delimiter <char>|tab] [--strict]
  supply-risk validate --rules <config.yaml>

Exit codes:
  0  success
  1  I/O or unexpected failure
  2  invalid configuration
  3  malformed data (file-level, or any row under --strict)

Examples:
  supply-risk run --data supply.csv --rules rules.yaml
  supply-risk run --data supply.csv --rules rules.yaml --format json --out report.json
  supply-risk run --data supply.csv --rules rules.yaml --format sqlite --out report.db
  supply-risk validate --rules rules.yaml
`;
}

// -------------------- argv parsing --------------------

function getFlagValue(args: string[], flag: string): string | null {
  const i = args.indexOf(flag);
  if (i < 0) return null;
  const v = args[i + 1];
  if (!v || v.startsWith("--")) return null;
  return v;
}

function delimiterArg(v: string | null): string | undefined {
  if (v === null) return undefined;
  return v === "tab" || v === "\\t" ? "\t" : v;
}

export function main(argv: string[], io: CliIO = defaultIO): number {
  const args = argv;

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    io.stdout(usage());
    return EXIT_OK;
  }

  const cmd = args[0];

  try {
    if (cmd === "version") {
      io.stdout(`supply-risk v${VERSION}\n`);
      return EXIT_OK;
    }

    if (cmd === "validate") {
      const rulesPath = getFlagValue(args, "--rules");
      if (!rulesPath) return missing(io, "--rules");

      const config = loadRiskConfig(rulesPath, io.env);
      io.stdout(
        `OK: ${config.ruleSet.rules.length} rule(s), labels: ${config.ruleSet.labels.join(", ") || "(none)"}\n`
      );
      return EXIT_OK;
    }

    if (cmd === "run") {
      const dataPath = getFlagValue(args, "--data");
      const rulesPath = getFlagValue(args, "--rules");
      if (!dataPath) return missing(io, "--data");
      if (!rulesPath) return missing(io, "--rules");

      const { written } = runPipeline({
        dataPath,
        rulesPath,
        out: getFlagValue(args, "--out") ?? undefined,
        format: getFlagValue(args, "--format") ?? undefined,
        delimiter: delimiterArg(getFlagValue(args, "--delimiter")),
        strict: args.includes("--strict"),
        env: io.env,
        logger: log,
      });

      if (written.destination === null) io.stdout(written.content ?? "");
      else io.stderr(`Wrote ${written.format} report to ${written.destination}\n`);
      return EXIT_OK;
    }

    io.stderr(`Unknown command: ${cmd}\n\n`);
    io.stderr(usage());
    return EXIT_FAILURE;
  } catch (e) {
    return failure(io, e);
  }
}

function missing(io: CliIO, flag: string): number {
  io.stderr(`Missing ${flag}.\n\n`);
  io.stderr(usage());
  return EXIT_FAILURE;
}

function failure(io: CliIO, e: unknown): number {
  if (e instanceof ConfigurationError) {
    log.error({ violations: e.violations }, "configuration rejected");
    io.stderr(`error: ${e.message}\n`);
    return EXIT_CONFIG;
  }
  if (e instanceof DataFormatError) {
    log.error({ row: e.row, issues: e.issues }, "data rejected");
    io.stderr(`error: ${e.message}\n`);
    return EXIT_DATA;
  }

  const message = e instanceof Error ? e.message : String(e);
  log.error({ err: e }, "run failed");
  io.stderr(`error: ${message}\n`);
  return EXIT_FAILURE;
}
