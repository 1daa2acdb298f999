export { Paginator } from './Paginator'

export { CursorCodec } from './cursor/codec'
export type { CursorCodecOptions, SortKeyTuple } from './cursor/codec'

export { translateQuery, buildKeysetFilter } from './query/translate'
export { normalizePaginationRequest, resolvePagingMode } from './query/request'
export { assemblePage } from './page/assemble'
export type { AssemblePageArgs } from './page/assemble'

export { matchesFilter } from './query/filter'
export { compareValues, compareBy, reverseSort, ensureTieBreaker } from './query/sort'

export { PaginationError, createError, throwError, isPaginationError, isRecoverable } from './error'
export type { PaginationErrorCode, PaginationErrorDetails, PaginationErrorKind } from './error'

export { createNoopLogger } from './logger'
export type { PaginationLogger, PaginationLogMeta } from './logger'

export { resolvePaginatorConfig, DEFAULT_LIMIT, DEFAULT_CONCURRENCY } from './config'
export type { PaginatorConfig, ResolvedPaginatorConfig, FieldReader } from './config'
