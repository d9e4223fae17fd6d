import type { SparqlResults } from "../types.js";
import { ResultFormatter } from "./base.js";

/**
 * Keeps the endpoint's own document, adding only metadata.
 */
export class JsonFormatter extends ResultFormatter<SparqlResults> {
  protected shape(raw: SparqlResults): SparqlResults {
    return { ...raw };
  }
}
