export { SearchServer, type SearchServerOptions } from './server'
export {
  SearchService,
  type SearchServiceOptions,
  type SearchOutcome,
  type SkippedIndex,
} from './search'
export { IndexCache, type IndexCacheOptions } from './cache'
export { createSearchApp } from './app'
export {
  parseSearchRequest,
  parseSearchResponse,
  toWireRequest,
  toErrorPayload,
  statusFor,
  isErrorPayload,
  type SearchRequest,
  type SearchResult,
  type WireSearchRequest,
  type ErrorPayload,
  type HealthPayload,
} from './protocol'
