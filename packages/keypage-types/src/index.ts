export type {
    CursorToken,
    SortDir,
    SortValueType,
    SortRule,
    FilterExpr,
    ComparisonOp
} from './query'

export type {
    CursorDirection,
    PaginationRequest,
    PagingMode,
    NormalizedPaginationRequest,
    QueryPlan,
    PageInfo,
    Edge,
    FindResult
} from './pagination'

export type { FindArgs, PaginationExecutor } from './ports'
