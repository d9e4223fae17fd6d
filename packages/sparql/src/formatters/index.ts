import type { Formatter } from "@querymemo/core";

import type { SparqlResults } from "../types.js";
import type { SparqlFormatterOptions, WithMetadata } from "./base.js";
import { JsonFormatter } from "./json.js";
import { type SimplifiedResult, SimplifiedFormatter } from "./simplified.js";
import { type TabularResult, TabularFormatter } from "./tabular.js";

export {
  classify,
  extractMetadata,
  ResultFormatter,
  type ResultMetadata,
  type ResultShape,
  type SparqlFormatterOptions,
  type WithMetadata,
} from "./base.js";
export { JsonFormatter } from "./json.js";
export { type SimplifiedResult, type SimplifiedRow, SimplifiedFormatter, simplifyBindings } from "./simplified.js";
export { type TabularColumn, type TabularResult, TabularFormatter } from "./tabular.js";

export type SparqlFormatted =
  | WithMetadata<SparqlResults>
  | WithMetadata<SimplifiedResult>
  | WithMetadata<TabularResult>;

export const SPARQL_FORMATS = ["json", "simplified", "tabular"] as const;
export type SparqlFormat = (typeof SPARQL_FORMATS)[number];

export type SparqlFormatterSet = Readonly<Record<SparqlFormat, Formatter<SparqlResults, SparqlFormatted>>>;

/**
 * The three SPARQL formatters keyed by format id, ready for a CachingExecutor.
 */
export function createSparqlFormatters(
  options: SparqlFormatterOptions = {}
): SparqlFormatterSet {
  return {
    json: new JsonFormatter(options),
    simplified: new SimplifiedFormatter(options),
    tabular: new TabularFormatter(options),
  };
}
