export { SearchClient, type SearchClientOptions, type SearchResponse } from './SearchClient'
