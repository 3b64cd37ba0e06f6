/* eslint-disable no-console */
import { fileURLToPath } from "node:url";

import { runPipeline } from "../packages/pipeline/src/run.js";

const dataPath = fileURLToPath(new URL("./data/supply-chain-sample.csv", import.meta.url));
const rulesPath = fileURLToPath(new URL("./config/supply-risk.yaml", import.meta.url));

const { report, written } = runPipeline({ dataPath, rulesPath });

if (written.content !== null) process.stdout.write(written.content);
console.error(
  `fingerprint=${report.fingerprint} flags=${report.summary.flag_count} at_risk=${report.summary.at_risk.length}`
);
