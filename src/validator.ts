// Decision model validator
// Structural checks only; FEEL entries were already compiled by the loader.

import type { Decision, DecisionModel, ValidationResult } from "./model.js";

function findCycle(decisions: readonly Decision[]): string[] | undefined {
  const requires = new Map(decisions.map((d) => [d.name, d.requires]));
  const done = new Set<string>();
  const path: string[] = [];

  function visit(name: string): string[] | undefined {
    const at = path.indexOf(name);
    if (at >= 0) return [...path.slice(at), name];
    if (done.has(name)) return undefined;

    path.push(name);
    for (const next of requires.get(name) ?? []) {
      if (!requires.has(next)) continue;
      const cycle = visit(next);
      if (cycle) return cycle;
    }
    path.pop();
    done.add(name);
    return undefined;
  }

  for (const decision of decisions) {
    const cycle = visit(decision.name);
    if (cycle) return cycle;
  }
  return undefined;
}

export function validate(model: DecisionModel): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!model.name) errors.push("Root field 'name' is required");
  if (model.decisions.length === 0) warnings.push("Model has no decisions");

  const names = new Set<string>();

  for (const decision of model.decisions) {
    const ctx = `Decision '${decision.name}'`;

    if (!decision.name) {
      errors.push("A decision is missing required field 'name'");
    } else if (names.has(decision.name)) {
      errors.push(`Duplicate decision name: '${decision.name}'`);
    } else {
      names.add(decision.name);
    }

    if (decision.kind !== "table") continue;
    const table = decision.table;

    if (table.outputs.length === 0) errors.push(`${ctx}: table has no outputs`);
    if (table.outputs.length > 1 && table.outputs.some((o) => !o.label)) {
      errors.push(`${ctx}: every output of a multi-output table needs a label`);
    }
    if (table.rules.length === 0) warnings.push(`${ctx}: table has no rules`);

    table.rules.forEach((rule, i) => {
      const ruleCtx = `${ctx} rule ${rule.id ?? i + 1}`;
      if (rule.inputEntries.length !== table.inputs.length) {
        errors.push(
          `${ruleCtx}: has ${rule.inputEntries.length} input entries, table has ${table.inputs.length} inputs`
        );
      }
      if (rule.outputEntries.length !== table.outputs.length) {
        errors.push(
          `${ruleCtx}: has ${rule.outputEntries.length} output entries, table has ${table.outputs.length} outputs`
        );
      }
    });

    if (table.hitPolicy === "PRIORITY" && table.outputs.every((o) => o.priorities.length === 0)) {
      warnings.push(`${ctx}: PRIORITY table declares no output priorities; the first match wins`);
    }
    if (table.hitPolicy !== "COLLECT" && table.aggregation !== "NONE") {
      warnings.push(`${ctx}: aggregation ${table.aggregation} is ignored for hit policy ${table.hitPolicy}`);
    }
  }

  // requires references
  for (const decision of model.decisions) {
    for (const req of decision.requires) {
      if (!names.has(req)) {
        errors.push(`Decision '${decision.name}': requires unknown decision '${req}'`);
      }
    }
  }

  const cycle = findCycle(model.decisions);
  if (cycle) errors.push(`Decision requirement cycle: ${cycle.join(" -> ")}`);

  // BKMs
  const bkmNames = new Set<string>();
  for (const bkm of model.bkms) {
    const ctx = `BKM '${bkm.name}'`;
    if (!bkm.name) {
      errors.push("A BKM is missing required field 'name'");
    } else if (bkmNames.has(bkm.name)) {
      errors.push(`Duplicate BKM name: '${bkm.name}'`);
    } else {
      bkmNames.add(bkm.name);
    }
    if (!bkm.expression.trim()) errors.push(`${ctx}: empty expression`);

    const params = new Set<string>();
    for (const param of bkm.parameters) {
      if (params.has(param)) errors.push(`${ctx}: duplicate parameter '${param}'`);
      params.add(param);
    }
  }

  return { errors, warnings, isValid: errors.length === 0 };
}
