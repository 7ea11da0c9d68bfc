export { SUPPORTED_SEARCH_PARAMETERS, SearchMatcher, parseIdentifierToken } from './SearchMatcher'
export type { SearchCriteria } from './SearchMatcher'
