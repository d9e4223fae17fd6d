import type { SparqlBinding, SparqlResults } from "../types.js";
import { classify, ResultFormatter } from "./base.js";

export type SimplifiedRow = Record<string, string | null>;

export type SimplifiedResult =
  | { type: "SELECT"; results: SimplifiedRow[] }
  | { type: "ASK"; result: boolean }
  | { type: "GRAPH"; results: SparqlResults };

/**
 * Flattens each binding to `{ var: value }`. Typed literals add
 * `var_datatype`, tagged ones `var_lang`; unbound variables are `null`.
 */
export function simplifyBindings(bindings: SparqlBinding[], variables: string[]): SimplifiedRow[] {
  return bindings.map((binding) => {
    const row: SimplifiedRow = {};
    for (const name of variables) {
      const term = binding[name];
      if (!term) {
        row[name] = null;
        continue;
      }
      row[name] = term.value;
      if (term.datatype !== undefined) row[`${name}_datatype`] = term.datatype;
      if (term["xml:lang"] !== undefined) row[`${name}_lang`] = term["xml:lang"];
    }
    return row;
  });
}

export class SimplifiedFormatter extends ResultFormatter<SimplifiedResult> {
  protected shape(raw: SparqlResults): SimplifiedResult {
    const shape = classify(raw);
    switch (shape.kind) {
      case "ASK":
        return { type: "ASK", result: shape.value };
      case "SELECT":
        return { type: "SELECT", results: simplifyBindings(shape.bindings, shape.variables) };
      case "EMPTY":
        return { type: "SELECT", results: [] };
      case "GRAPH":
        return { type: "GRAPH", results: raw };
    }
  }
}
