import { canonicalizeSchema } from "./canonicalize.js";
import { ConfigurationError } from "./errors.js";
import { checkSchemaInvariants } from "./invariants.js";
import type { DatasetSchema } from "./schema.js";
import { parseDatasetSchemaShape } from "./validate.js";

/** Validate the `dataset` section of a rule configuration. Throws ConfigurationError. */
export function loadDatasetSchema(input: unknown): DatasetSchema {
  const parsed = parseDatasetSchemaShape(input);
  if (!parsed.ok) throw new ConfigurationError(parsed.violations);

  const schema = canonicalizeSchema(parsed.value);
  const violations = checkSchemaInvariants(schema);
  if (violations.length) throw new ConfigurationError(violations);

  return schema;
}
