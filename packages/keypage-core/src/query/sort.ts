import { Decimal128, Double, Int32, Long, ObjectId } from 'bson'
import type { ComparisonOp, SortDir, SortRule } from 'keypage-types'

/**
 * 近似 MongoDB 的跨类型排序：null/缺失 < 数字 < 字符串 < 对象 < 数组 < ObjectId < 布尔 < 日期。
 */
const TypeRank = {
    Null: 1,
    Number: 2,
    String: 3,
    Object: 4,
    Array: 5,
    ObjectId: 7,
    Boolean: 8,
    Date: 9
} as const

type TypeRank = typeof TypeRank[keyof typeof TypeRank]

function toNumber(value: unknown): number | undefined {
    if (typeof value === 'number') return value
    if (typeof value === 'bigint') return Number(value)
    if (value instanceof Long) return value.toNumber()
    if (value instanceof Int32 || value instanceof Double) return value.valueOf()
    if (value instanceof Decimal128) return Number(value.toString())
    return undefined
}

function rankOf(value: unknown): TypeRank {
    if (value === null || value === undefined) return TypeRank.Null
    if (toNumber(value) !== undefined) return TypeRank.Number
    if (typeof value === 'string') return TypeRank.String
    if (typeof value === 'boolean') return TypeRank.Boolean
    if (value instanceof Date) return TypeRank.Date
    if (value instanceof ObjectId) return TypeRank.ObjectId
    if (Array.isArray(value)) return TypeRank.Array
    return TypeRank.Object
}

function sign(n: number): number {
    return n < 0 ? -1 : n > 0 ? 1 : 0
}

export function isSameTypeBracket(a: unknown, b: unknown): boolean {
    return rankOf(a) === rankOf(b)
}

export function compareValues(a: unknown, b: unknown): number {
    const ra = rankOf(a)
    const rb = rankOf(b)
    if (ra !== rb) return ra < rb ? -1 : 1

    switch (ra) {
        case TypeRank.Null:
            return 0
        case TypeRank.Number:
            if (typeof a === 'bigint' && typeof b === 'bigint') return a < b ? -1 : a > b ? 1 : 0
            return sign((toNumber(a) ?? 0) - (toNumber(b) ?? 0))
        case TypeRank.String:
            return String(a) < String(b) ? -1 : String(a) > String(b) ? 1 : 0
        case TypeRank.Boolean:
            return a === b ? 0 : a === false ? -1 : 1
        case TypeRank.Date:
            return a instanceof Date && b instanceof Date ? sign(a.getTime() - b.getTime()) : 0
        case TypeRank.ObjectId: {
            const ha = a instanceof ObjectId ? a.toHexString() : ''
            const hb = b instanceof ObjectId ? b.toHexString() : ''
            return ha < hb ? -1 : ha > hb ? 1 : 0
        }
        default: {
            // 对象/数组只保证确定性，不完整复刻 BSON 的逐元素比较
            const ja = JSON.stringify(a) ?? ''
            const jb = JSON.stringify(b) ?? ''
            return ja < jb ? -1 : ja > jb ? 1 : 0
        }
    }
}

export function compareBy<TRow>(
    rules: SortRule[],
    readField: (row: TRow, field: string) => unknown
): (a: TRow, b: TRow) => number {
    return (a, b) => {
        for (const rule of rules) {
            const compared = compareValues(readField(a, rule.field), readField(b, rule.field))
            if (compared !== 0) return rule.dir === 'desc' ? -compared : compared
        }
        return 0
    }
}

export function reverseSort(sort: SortRule[]): SortRule[] {
    return sort.map(rule => ({
        ...rule,
        dir: rule.dir === 'asc' ? 'desc' : 'asc'
    }))
}

export function ensureTieBreaker(sort: SortRule[], tieBreaker: SortRule | undefined): SortRule[] {
    if (!tieBreaker) return sort
    const hasField = sort.some(rule => rule.field === tieBreaker.field)
    return hasField ? sort : [...sort, tieBreaker]
}

export function compareOpForAfter(dir: SortDir): Extract<ComparisonOp, 'gt' | 'lt'> {
    return dir === 'asc' ? 'gt' : 'lt'
}

export function getSortValues<TRow>(
    row: TRow,
    sort: SortRule[],
    readField: (row: TRow, field: string) => unknown
): unknown[] {
    return sort.map(rule => readField(row, rule.field))
}
