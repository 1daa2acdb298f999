import type { Edge, FindResult, NormalizedPaginationRequest, PageInfo, PagingMode, QueryPlan } from 'keypage-types'
import type { CursorCodec } from '../cursor/codec'
import type { FieldReader } from '../config'
import { throwError } from '../error'
import { getSortValues } from '../query/sort'

export type AssemblePageArgs<TRow> = {
    rows: TRow[]
    plan: QueryPlan
    request: Pick<NormalizedPaginationRequest, 'sort' | 'mode'>
    codec: CursorCodec
    readField: FieldReader<TRow>
    totalCount?: number
}

function resolvePageFlags(mode: PagingMode, extra: boolean): Pick<PageInfo, 'hasNextPage' | 'hasPreviousPage'> {
    switch (mode.kind) {
        case 'first':
            return { hasNextPage: extra, hasPreviousPage: false }
        case 'offset':
            return { hasNextPage: extra, hasPreviousPage: mode.skip > 0 }
        case 'cursor':
            return mode.direction === 'previous'
                ? { hasNextPage: true, hasPreviousPage: extra }
                : { hasNextPage: extra, hasPreviousPage: true }
    }
}

export function assemblePage<TRow>(args: AssemblePageArgs<TRow>): FindResult<TRow> {
    const { rows, plan, request, codec, readField } = args

    if (rows.length > plan.limit) {
        throwError('CONTRACT_VIOLATION', `Executor returned ${rows.length} rows, at most ${plan.limit} were requested`, {
            kind: 'internal',
            expected: plan.limit,
            actual: rows.length
        })
    }

    const extra = rows.length === plan.limit
    const kept = extra ? rows.slice(0, plan.limit - 1) : rows.slice()
    if (plan.reverseResult) kept.reverse()

    const edges: Edge<TRow>[] = kept.map(row => ({
        cursor: codec.encode(request.sort, getSortValues(row, request.sort, readField)),
        node: row
    }))

    const first = edges[0]
    const last = edges[edges.length - 1]
    const pageInfo: PageInfo = {
        ...resolvePageFlags(request.mode, extra),
        ...(first ? { startCursor: first.cursor } : {}),
        ...(last ? { nextCursor: last.cursor } : {})
    }

    return {
        pageInfo,
        edges,
        items: kept,
        ...(typeof args.totalCount === 'number' ? { totalCount: args.totalCount } : {})
    }
}
