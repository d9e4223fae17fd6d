export { getUserFriendlyMessage } from "./messages.js";
export {
  ConfigurationError,
  ErrorCode,
  type ExecutionError,
  InvalidRequestError,
  type InvalidRequestCode,
  isRetryableError,
  QueryMemoError,
  type QueryMemoErrorOptions,
  type RemoteErrorCode,
  RemoteExecutionError,
} from "./types.js";
