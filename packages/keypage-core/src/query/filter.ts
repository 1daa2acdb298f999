import type { FilterExpr } from 'keypage-types'
import { compareValues, isSameTypeBracket } from './sort'

const readString = (value: unknown): string | undefined => {
    return typeof value === 'string' ? value : undefined
}

const isPresent = (value: unknown) => value !== undefined && value !== null

/**
 * 在内存中按 MongoDB 语义求值 FilterExpr：
 * eq null 同时匹配缺失字段；范围比较只在同一类型区间内成立。
 */
export function matchesFilter<TRow>(
    row: TRow,
    filter: FilterExpr,
    readField: (row: TRow, field: string) => unknown
): boolean {
    switch (filter.op) {
        case 'and':
            return filter.args.every(child => matchesFilter(row, child, readField))
        case 'or':
            return filter.args.some(child => matchesFilter(row, child, readField))
        case 'not':
            return !matchesFilter(row, filter.arg, readField)
        case 'eq':
            return compareValues(readField(row, filter.field), filter.value) === 0
        case 'ne':
            return compareValues(readField(row, filter.field), filter.value) !== 0
        case 'in': {
            const value = readField(row, filter.field)
            return filter.values.some(candidate => compareValues(value, candidate) === 0)
        }
        case 'gt':
        case 'gte':
        case 'lt':
        case 'lte': {
            const value = readField(row, filter.field)
            if (!isSameTypeBracket(value, filter.value)) return false
            const compared = compareValues(value, filter.value)
            if (filter.op === 'gt') return compared > 0
            if (filter.op === 'gte') return compared >= 0
            if (filter.op === 'lt') return compared < 0
            return compared <= 0
        }
        case 'startsWith':
            return readString(readField(row, filter.field))?.startsWith(filter.value) ?? false
        case 'endsWith':
            return readString(readField(row, filter.field))?.endsWith(filter.value) ?? false
        case 'contains':
            return readString(readField(row, filter.field))?.includes(filter.value) ?? false
        case 'isNull':
            return readField(row, filter.field) === null
        case 'exists':
            return isPresent(readField(row, filter.field))
    }
}
