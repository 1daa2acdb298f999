import type { FilterExpr, NormalizedPaginationRequest, QueryPlan, SortRule } from 'keypage-types'
import type { CursorCodec } from '../cursor/codec'
import { compareOpForAfter, reverseSort } from './sort'

// 空 or：不匹配任何行
const MATCH_NONE: FilterExpr = { op: 'or', args: [] }

const isNullish = (value: unknown) => value === null || value === undefined

/**
 * 单个字段上"排在 value 之后"的条件。null（以及缺失）在排序中最小，而 gt/lt 只在同一类型区间内比较：
 * - gt null：所有非 null 值
 * - lt v：比 v 小的值，再加上 null 区间
 * - lt null：没有任何值
 */
function afterValue(rule: SortRule, value: unknown): FilterExpr | undefined {
    const op = compareOpForAfter(rule.dir)
    if (op === 'gt') {
        return isNullish(value)
            ? { op: 'exists', field: rule.field }
            : { op, field: rule.field, value }
    }
    if (isNullish(value)) return undefined
    return {
        op: 'or',
        args: [
            { op, field: rule.field, value },
            { op: 'eq', field: rule.field, value: null }
        ]
    }
}

/**
 * 按字典序展开 keyset 条件：
 * (f1 after v1) OR (f1 = v1 AND f2 after v2) OR (f1 = v1 AND f2 = v2 AND f3 after v3) ...
 *
 * sort 传入的是实际执行的排序（previous 方向时已整体翻转），因此统一按 "after" 规则取。
 * 某个字段之后不可能再有值时，对应分支直接省略。
 */
export function buildKeysetFilter(sort: SortRule[], values: unknown[]): FilterExpr {
    const branches: FilterExpr[] = []
    sort.forEach((rule, index) => {
        const comparison = afterValue(rule, values[index])
        if (!comparison) return
        if (index === 0) {
            branches.push(comparison)
            return
        }

        const equalities = sort.slice(0, index).map((prev, prevIndex): FilterExpr => ({
            op: 'eq',
            field: prev.field,
            value: values[prevIndex]
        }))
        branches.push({ op: 'and', args: [...equalities, comparison] })
    })

    if (!branches.length) return MATCH_NONE
    return branches.length === 1 ? branches[0] : { op: 'or', args: branches }
}

function combineFilters(base: FilterExpr | undefined, keyset: FilterExpr): FilterExpr {
    return base ? { op: 'and', args: [base, keyset] } : keyset
}

export function translateQuery(request: NormalizedPaginationRequest, codec: CursorCodec): QueryPlan {
    const { sort, filter, mode } = request
    // 多取一条用来判断是否还有下一页（previous 方向则是上一页）
    const limit = request.limit + 1

    switch (mode.kind) {
        case 'first':
            return {
                ...(filter ? { filter, countFilter: filter } : {}),
                sort,
                limit,
                reverseResult: false
            }
        case 'offset':
            return {
                ...(filter ? { filter, countFilter: filter } : {}),
                sort,
                limit,
                ...(mode.skip > 0 ? { skip: mode.skip } : {}),
                reverseResult: false
            }
        case 'cursor': {
            const values = codec.decode(sort, mode.token)
            const backwards = mode.direction === 'previous'
            const querySort = backwards ? reverseSort(sort) : sort
            return {
                filter: combineFilters(filter, buildKeysetFilter(querySort, values)),
                ...(filter ? { countFilter: filter } : {}),
                sort: querySort,
                limit,
                reverseResult: backwards
            }
        }
    }
}
