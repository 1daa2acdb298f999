import type { FilterExpr, SortRule } from './query'

export type FindArgs = {
    filter?: FilterExpr
    sort: SortRule[]
    limit: number
    skip?: number
}

/**
 * 执行层（数据库驱动 / ORM）需要实现的端口。
 * executeFind 返回的行必须已按 sort 排好序，且长度不超过 limit。
 */
export interface PaginationExecutor<TRow> {
    executeFind(args: FindArgs): Promise<TRow[]>
    executeCount(filter: FilterExpr | undefined): Promise<number>
}
