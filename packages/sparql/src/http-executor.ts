import { ErrorCode, RemoteExecutionError, type RemoteErrorCode, type RemoteExecutor, Logger } from "@querymemo/core";
import { Err, Ok, type Result } from "@querymemo/shared";
import { type Dispatcher, fetch } from "undici";

import { type SparqlResults, SparqlResultsSchema } from "./types.js";

export const SPARQL_RESULTS_MEDIA_TYPE = "application/sparql-results+json";

const DEFAULT_TIMEOUT_MS = 30_000;
const BODY_PREVIEW_LENGTH = 200;

export interface SparqlHttpExecutorOptions {
  /** Named endpoints; an executor also accepts absolute http(s) URLs as ids */
  endpoints?: Readonly<Record<string, string>>;
  /**
   * Abort a request after this long (ms).
   * @default 30_000
   */
  timeoutMs?: number;
  /** undici dispatcher, for a connection pool or a MockAgent */
  dispatcher?: Dispatcher;
  logger?: Logger;
}

/**
 * Runs SPARQL queries over the SPARQL 1.1 Protocol (form-encoded POST) and
 * returns the parsed JSON results.
 *
 * @example
 * ```typescript
 * const remote = new SparqlHttpExecutor({
 *   endpoints: { main: "https://data.example.test/sparql" },
 *   dispatcher: new Agent({ connections: 10 }),
 * });
 * const result = await remote.execute("ASK { ?s ?p ?o }", "main");
 * ```
 */
export class SparqlHttpExecutor implements RemoteExecutor<SparqlResults> {
  private readonly endpoints: Readonly<Record<string, string>>;
  private readonly timeoutMs: number;
  private readonly dispatcher?: Dispatcher;
  private readonly logger: Logger;

  constructor(options: SparqlHttpExecutorOptions = {}) {
    this.endpoints = options.endpoints ?? {};
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.dispatcher = options.dispatcher;
    this.logger = (options.logger ?? new Logger()).child({ component: "sparql-http" });
  }

  /**
   * Resolve an endpoint id to its URL: a registered name first, then an
   * absolute http(s) URL. Returns undefined for anything else.
   */
  resolveEndpoint(endpointId: string): string | undefined {
    if (Object.hasOwn(this.endpoints, endpointId)) {
      return this.endpoints[endpointId];
    }
    if (!URL.canParse(endpointId)) {
      return undefined;
    }
    const { protocol } = new URL(endpointId);
    return protocol === "http:" || protocol === "https:" ? endpointId : undefined;
  }

  async execute(queryText: string, endpointId: string): Promise<Result<SparqlResults, RemoteExecutionError>> {
    const url = this.resolveEndpoint(endpointId);
    if (url === undefined) {
      return Err(
        new RemoteExecutionError(ErrorCode.REMOTE_BAD_REQUEST, `Unknown SPARQL endpoint '${endpointId}'`, {
          endpointId,
        })
      );
    }

    const signal = AbortSignal.timeout(this.timeoutMs);
    let status: number;
    let text: string;

    try {
      this.logger.debug("Sending SPARQL query", { url });
      const response = await fetch(url, {
        method: "POST",
        headers: {
          accept: SPARQL_RESULTS_MEDIA_TYPE,
          "content-type": "application/x-www-form-urlencoded",
        },
        body: new URLSearchParams({ query: queryText }).toString(),
        signal,
        dispatcher: this.dispatcher,
      });
      status = response.status;
      text = await response.text();
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      if (signal.aborted) {
        return Err(
          new RemoteExecutionError(
            ErrorCode.REMOTE_TIMEOUT,
            `SPARQL endpoint did not answer within ${this.timeoutMs}ms`,
            { endpointId, cause }
          )
        );
      }
      return Err(
        new RemoteExecutionError(ErrorCode.REMOTE_UNREACHABLE, `SPARQL endpoint unreachable: ${cause.message}`, {
          endpointId,
          cause,
        })
      );
    }

    if (status < 200 || status >= 300) {
      return Err(
        new RemoteExecutionError(
          statusToCode(status),
          `SPARQL endpoint returned HTTP ${status}: ${text.slice(0, BODY_PREVIEW_LENGTH)}`,
          { endpointId, status }
        )
      );
    }

    return parseResults(text, endpointId, status);
  }
}

function statusToCode(status: number): RemoteErrorCode {
  switch (status) {
    case 400:
      return ErrorCode.REMOTE_BAD_REQUEST;
    case 404:
      return ErrorCode.REMOTE_UNREACHABLE;
    default:
      return ErrorCode.REMOTE_QUERY_FAILED;
  }
}

function parseResults(
  text: string,
  endpointId: string,
  status: number
): Result<SparqlResults, RemoteExecutionError> {
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch (error) {
    return Err(
      new RemoteExecutionError(ErrorCode.REMOTE_INVALID_RESPONSE, "SPARQL endpoint returned malformed JSON", {
        endpointId,
        status,
        cause: error instanceof Error ? error : undefined,
      })
    );
  }

  const parsed = SparqlResultsSchema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return Err(
      new RemoteExecutionError(
        ErrorCode.REMOTE_INVALID_RESPONSE,
        `SPARQL endpoint returned an unexpected document (${where}${issue?.message ?? "invalid"})`,
        { endpointId, status }
      )
    );
  }

  return Ok(parsed.data);
}
