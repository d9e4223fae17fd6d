import type { EvictionPolicy } from "@querymemo/cache";
import type { Result } from "@querymemo/shared";

import type { RemoteExecutionError } from "../errors/types.js";

/**
 * Runs a query against a backing service. Owned by the host; may suspend.
 */
export interface RemoteExecutor<TRaw> {
  execute(queryText: string, endpointId: string): Promise<Result<TRaw, RemoteExecutionError>>;
}

/**
 * Shapes a raw result into one named presentation format. Must be pure.
 */
export interface Formatter<TRaw, TFormatted> {
  format(raw: TRaw, queryText: string): TFormatted;
}

/**
 * Formatters keyed by format id ("json", "tabular", ...).
 */
export type FormatterSet<TRaw, TFormatted> = Readonly<Record<string, Formatter<TRaw, TFormatted>>>;

export interface CacheStats {
  enabled: boolean;
  /** Entries currently held, expired-but-unread ones included */
  size: number;
  maxSize: number;
  /** Seconds */
  ttl: number;
  policy: EvictionPolicy;
}
