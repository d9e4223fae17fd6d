import { z } from "zod";

/**
 * One RDF term in a SPARQL 1.1 JSON binding.
 */
export const SparqlTermSchema = z
  .object({
    type: z.string(),
    value: z.string(),
    datatype: z.string().optional(),
    "xml:lang": z.string().optional(),
  })
  .passthrough();

export const SparqlHeadSchema = z
  .object({
    vars: z.array(z.string()).optional(),
    link: z.array(z.string()).optional(),
  })
  .passthrough();

/**
 * SPARQL 1.1 Query Results JSON document. SELECT results carry `results`,
 * ASK results carry `boolean`; anything else is treated as a graph.
 */
export const SparqlResultsSchema = z
  .object({
    head: SparqlHeadSchema.optional(),
    results: z
      .object({
        bindings: z.array(z.record(SparqlTermSchema)),
      })
      .passthrough()
      .optional(),
    boolean: z.boolean().optional(),
  })
  .passthrough();

export type SparqlTerm = z.infer<typeof SparqlTermSchema>;
export type SparqlBinding = Record<string, SparqlTerm>;
export type SparqlResults = z.infer<typeof SparqlResultsSchema>;

export type SparqlResultKind = "SELECT" | "ASK" | "GRAPH";
