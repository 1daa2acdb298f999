import type { CursorToken, FilterExpr, SortRule } from './query'

export type CursorDirection = 'next' | 'previous'

export type PaginationRequest = {
    sort: SortRule[]
    cursor?: CursorToken
    /** 仅在 cursor 存在时生效，默认 'next' */
    direction?: CursorDirection
    /** 省略时使用 PaginatorConfig.defaultLimit */
    limit?: number
    /** 非 0 时进入 offset 模式，cursor 被忽略 */
    skip?: number
    /** 显式要求 offset 模式（允许 skip 为 0） */
    paging?: 'offset'
    filter?: FilterExpr
    /** 默认跟随 PaginatorConfig.includeTotal */
    includeTotal?: boolean
}

/**
 * 请求归一化时一次性决定的分页模式；之后的查询路径只看这个 tag。
 */
export type PagingMode =
    | { kind: 'first' }
    | { kind: 'offset'; skip: number }
    | { kind: 'cursor'; token: CursorToken; direction: CursorDirection }

export type NormalizedPaginationRequest = {
    sort: SortRule[]
    limit: number
    mode: PagingMode
    filter?: FilterExpr
    includeTotal: boolean
}

export type QueryPlan = {
    filter?: FilterExpr
    sort: SortRule[]
    /** 实际交给 executor 的条数：请求 limit + 1 */
    limit: number
    skip?: number
    /** count 只针对调用方的 base filter，不含 keyset 条件 */
    countFilter?: FilterExpr
    /** previous 方向时查询倒序执行，组装时需要翻转回来 */
    reverseResult: boolean
}

export type PageInfo = {
    hasNextPage: boolean
    hasPreviousPage: boolean
    startCursor?: CursorToken
    nextCursor?: CursorToken
}

export type Edge<T> = {
    cursor: CursorToken
    node: T
}

export type FindResult<T> = {
    pageInfo: PageInfo
    edges: Edge<T>[]
    items: T[]
    totalCount?: number
}
