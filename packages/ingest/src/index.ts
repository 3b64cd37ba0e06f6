export { parseDelimited } from "./delimited.js";
export type { RawRow, RawTable } from "./delimited.js";

export {
  ingestTable,
  ingestText,
  ingestFile,
  ingestRecords,
  recordsToTable,
  parseValue,
} from "./ingest.js";

export type { IngestOptions, IngestResult, InputRecord } from "./ingest.js";
