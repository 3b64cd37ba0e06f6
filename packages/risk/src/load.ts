import { canonicalizeRules, uniqueSorted } from "../../model/src/canonicalize.js";
import { ConfigurationError } from "../../model/src/errors.js";
import type { ConfigViolation } from "../../model/src/errors.js";
import { attributeTypes, checkRuleInvariants } from "../../model/src/invariants.js";
import type { AttributeType, DatasetSchema, Rule, RuleDefinition, RuleSet } from "../../model/src/schema.js";
import { parseRuleDefinition, parseRuleMapping } from "../../model/src/validate.js";

export type RuleSetCheck =
  | { ok: true; ruleSet: RuleSet }
  | { ok: false; violations: ConfigViolation[] };

/**
 * Validate a rule mapping (`name -> {attribute, comparator, threshold, label, severity}`)
 * against the dataset schema. Every rule is checked; all violations are returned together.
 */
export function checkRuleSet(raw: unknown, schema: DatasetSchema): RuleSetCheck {
  const mapping = parseRuleMapping(raw);
  if (!mapping.ok) return { ok: false, violations: mapping.violations };

  const types = attributeTypes(schema);
  const violations: ConfigViolation[] = [];
  const rules: Rule[] = [];

  for (const [name, body] of Object.entries(mapping.value)) {
    const path = `/rules/${name}`;
    const parsed = parseRuleDefinition(body, path);
    if (!parsed.ok) {
      violations.push(...parsed.violations);
      continue;
    }

    const attribute_type = types.get(parsed.value.attribute);
    const def = withTextThreshold(parsed.value, attribute_type);
    const v = checkRuleInvariants(name, def, types, path);
    if (v.length || attribute_type === undefined) {
      violations.push(...v);
      continue;
    }

    rules.push({ ...def, name, attribute_type });
  }

  if (violations.length) return { ok: false, violations };

  const canonical = canonicalizeRules(rules);
  return {
    ok: true,
    ruleSet: { rules: canonical, labels: uniqueSorted(canonical.map((r) => r.label)) },
  };
}

// `threshold: 0` on a string attribute means the text "0"
function withTextThreshold(r: RuleDefinition, type: AttributeType | undefined): RuleDefinition {
  return type === "string" && typeof r.threshold === "number" ? { ...r, threshold: String(r.threshold) } : r;
}

/** Throwing form of checkRuleSet: the run must stop before any data is read. */
export function loadRuleSet(raw: unknown, schema: DatasetSchema): RuleSet {
  const r = checkRuleSet(raw, schema);
  if (!r.ok) throw new ConfigurationError(r.violations);
  return r.ruleSet;
}
