export { AbortError, abortableSleep, isAbortError, throwIfAborted } from "./abort.js";
export {
  ErrorCode,
  isSearchError,
  SearchCanceledError,
  SearchError,
  type SearchErrorOptions,
} from "./types.js";
