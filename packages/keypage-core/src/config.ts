import { readPath } from 'keypage-shared'
import type { SortRule } from 'keypage-types'
import { CursorCodec } from './cursor/codec'
import type { CursorCodecOptions } from './cursor/codec'
import { createNoopLogger } from './logger'
import type { PaginationLogger } from './logger'

export const DEFAULT_LIMIT = 25
export const DEFAULT_CONCURRENCY = 4

export type FieldReader<TRow> = (row: TRow, field: string) => unknown

export type PaginatorConfig<TRow> = {
    /** 请求未带 limit 时使用，默认 25 */
    defaultLimit?: number
    /** 超出时截断并记录 warn */
    maxLimit?: number
    /**
     * 追加到 sort 末尾的唯一字段（如 `{ field: '_id', dir: 'desc' }`），sort 已包含该字段时不追加。
     * 默认不追加：保证 sort 末字段唯一是调用方的责任。
     */
    tieBreaker?: SortRule
    /** 默认 true */
    includeTotal?: boolean
    /** paginateMany 的并发上限，默认 4 */
    concurrency?: number
    cursor?: CursorCodecOptions
    /** 从行中读取排序字段的值，默认支持点号路径 */
    readField?: FieldReader<TRow>
    logger?: PaginationLogger
}

export type ResolvedPaginatorConfig<TRow> = {
    defaultLimit: number
    maxLimit?: number
    tieBreaker?: SortRule
    includeTotal: boolean
    concurrency: number
    codec: CursorCodec
    readField: FieldReader<TRow>
    logger: PaginationLogger
}

function positiveIntegerOr(value: number | undefined, fallback: number): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) return fallback
    const normalized = Math.floor(value)
    return normalized >= 1 ? normalized : fallback
}

export function resolvePaginatorConfig<TRow>(config: PaginatorConfig<TRow> = {}): ResolvedPaginatorConfig<TRow> {
    const base = config.logger ?? createNoopLogger()
    const logger = base.child ? base.child({ component: 'keypage' }) : base
    const maxLimit = typeof config.maxLimit === 'number'
        ? positiveIntegerOr(config.maxLimit, DEFAULT_LIMIT)
        : undefined

    return {
        defaultLimit: positiveIntegerOr(config.defaultLimit, DEFAULT_LIMIT),
        ...(maxLimit !== undefined ? { maxLimit } : {}),
        ...(config.tieBreaker ? { tieBreaker: config.tieBreaker } : {}),
        includeTotal: config.includeTotal !== false,
        concurrency: positiveIntegerOr(config.concurrency, DEFAULT_CONCURRENCY),
        codec: new CursorCodec(config.cursor),
        readField: config.readField ?? ((row, field) => readPath(row, field)),
        logger
    }
}
