import { ErrorCode, QueryMemoError } from "./types.js";

/**
 * Short message suitable for end users, without internal detail.
 */
export function getUserFriendlyMessage(error: unknown): string {
  if (!(error instanceof QueryMemoError)) {
    return error instanceof Error ? error.message : "Unknown error";
  }

  switch (error.code) {
    case ErrorCode.CONFIG_INVALID:
      return "The cache configuration is invalid. Check ttl, size and policy.";
    case ErrorCode.REMOTE_UNREACHABLE:
      return "The query endpoint could not be reached.";
    case ErrorCode.REMOTE_TIMEOUT:
      return "The query endpoint did not answer in time.";
    case ErrorCode.REMOTE_BAD_REQUEST:
      return "The query was rejected as malformed.";
    case ErrorCode.REMOTE_QUERY_FAILED:
      return "The query failed on the remote endpoint.";
    case ErrorCode.REMOTE_INVALID_RESPONSE:
      return "The query endpoint returned an unreadable response.";
    case ErrorCode.QUERY_EMPTY:
      return "The query is empty.";
    case ErrorCode.FORMAT_NOT_FOUND:
      return "The requested result format is not supported.";
    default:
      return error.message;
  }
}
