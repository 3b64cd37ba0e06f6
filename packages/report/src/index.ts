export { buildReport, computeFingerprint, REPORT_TITLE } from "./report.js";
export type { SupplyRiskReport, ReportInput, RejectedRow } from "./report.js";

export { canonicalJson, fingerprintOf, sha256Hex } from "./hash.js";
export { formatTable, formatKeyValues, formatBarChart, BAR_WIDTH } from "./table.js";
export type { Align } from "./table.js";

export { renderText } from "./render-text.js";
export { renderJson } from "./render-json.js";
export { writeSqliteReport } from "./sqlite-report.js";
export { writeReport, checkWriteTarget } from "./write.js";
export type { WriteTarget, WriteResult } from "./write.js";
