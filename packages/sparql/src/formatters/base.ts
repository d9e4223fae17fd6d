import type { Formatter } from "@querymemo/core";

import type { SparqlResults } from "../types.js";

export interface ResultMetadata {
  variables?: string[];
  links?: string[];
  /** Number of bindings, SELECT only */
  count?: number;
  type?: "ASK";
  query?: string;
}

/**
 * A formatter's body, with `metadata` attached unless it was turned off.
 */
export type WithMetadata<T> = T | (T & { metadata: ResultMetadata });

export interface SparqlFormatterOptions {
  /** @default true */
  includeMetadata?: boolean;
}

/**
 * Shape of a result document, as far as the formatters care.
 * `EMPTY` is a head without a results section.
 */
export type ResultShape =
  | { kind: "ASK"; value: boolean }
  | { kind: "SELECT"; variables: string[]; bindings: NonNullable<SparqlResults["results"]>["bindings"] }
  | { kind: "EMPTY"; variables: string[] }
  | { kind: "GRAPH" };

export function classify(raw: SparqlResults): ResultShape {
  if (raw.boolean !== undefined) {
    return { kind: "ASK", value: raw.boolean };
  }
  const variables = raw.head?.vars ?? [];
  if (raw.results) {
    return { kind: "SELECT", variables, bindings: raw.results.bindings };
  }
  if (raw.head) {
    return { kind: "EMPTY", variables };
  }
  return { kind: "GRAPH" };
}

/**
 * Base for SPARQL result formatters. Subclasses shape the body; metadata is
 * attached here.
 */
export abstract class ResultFormatter<T extends object>
  implements Formatter<SparqlResults, WithMetadata<T>>
{
  protected readonly includeMetadata: boolean;

  constructor(options: SparqlFormatterOptions = {}) {
    this.includeMetadata = options.includeMetadata ?? true;
  }

  format(raw: SparqlResults, queryText?: string): WithMetadata<T> {
    const body = this.shape(raw);
    if (!this.includeMetadata) {
      return body;
    }
    return { ...body, metadata: extractMetadata(raw, queryText) };
  }

  protected abstract shape(raw: SparqlResults): T;
}

export function extractMetadata(raw: SparqlResults, queryText?: string): ResultMetadata {
  const metadata: ResultMetadata = {};

  if (raw.head) {
    metadata.variables = raw.head.vars ?? [];
    metadata.links = raw.head.link ?? [];
  }

  if (raw.results) {
    metadata.count = raw.results.bindings.length;
  } else if (raw.boolean !== undefined) {
    metadata.type = "ASK";
  }

  if (queryText) {
    metadata.query = queryText;
  }

  return metadata;
}
