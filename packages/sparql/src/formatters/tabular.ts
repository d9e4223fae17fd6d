import type { SparqlResults } from "../types.js";
import { classify, ResultFormatter } from "./base.js";

export interface TabularColumn {
  name: string;
  label: string;
}

export type TabularResult =
  | { type: "SELECT"; columns: TabularColumn[]; rows: (string | null)[][] }
  | { type: "ASK"; value: boolean }
  | { type: "GRAPH"; results: SparqlResults };

function columnsFor(variables: string[]): TabularColumn[] {
  return variables.map((name) => ({ name, label: name }));
}

/**
 * Columns and rows, like a database result set. Graph results pass through.
 */
export class TabularFormatter extends ResultFormatter<TabularResult> {
  protected shape(raw: SparqlResults): TabularResult {
    const shape = classify(raw);
    switch (shape.kind) {
      case "ASK":
        return { type: "ASK", value: shape.value };
      case "SELECT":
        return {
          type: "SELECT",
          columns: columnsFor(shape.variables),
          rows: shape.bindings.map((binding) =>
            shape.variables.map((name) => binding[name]?.value ?? null)
          ),
        };
      case "EMPTY":
        return { type: "SELECT", columns: columnsFor(shape.variables), rows: [] };
      case "GRAPH":
        return { type: "GRAPH", results: raw };
    }
  }
}
