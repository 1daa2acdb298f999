import { formatZodErrorMessage, formatZodIssuePath, isFieldPath, z } from 'keypage-shared'
import type {
    FilterExpr,
    NormalizedPaginationRequest,
    PaginationRequest,
    PagingMode
} from 'keypage-types'
import type { ResolvedPaginatorConfig } from '../config'
import { throwError } from '../error'
import type { PaginationErrorCode } from '../error'
import { ensureTieBreaker } from './sort'

const fieldPathSchema = z.string().refine(isFieldPath, {
    message: 'Expected an identifier path (letters, digits, "_" and ".")'
})

const sortRuleSchema = z.object({
    field: fieldPathSchema,
    dir: z.enum(['asc', 'desc']),
    type: z.enum(['string', 'number', 'boolean', 'date', 'objectId']).optional()
})

const isRecord = (value: unknown): value is Record<string, unknown> => {
    return typeof value === 'object' && value !== null
}

const hasField = (value: Record<string, unknown>) => typeof value.field === 'string'

function isFilterExpr(value: unknown): value is FilterExpr {
    if (!isRecord(value)) return false
    switch (value.op) {
        case 'and':
        case 'or':
            return Array.isArray(value.args) && value.args.every(isFilterExpr)
        case 'not':
            return isFilterExpr(value.arg)
        case 'eq':
        case 'ne':
        case 'gt':
        case 'gte':
        case 'lt':
        case 'lte':
            return hasField(value) && 'value' in value
        case 'in':
            return hasField(value) && Array.isArray(value.values)
        case 'startsWith':
        case 'endsWith':
        case 'contains':
            return hasField(value) && typeof value.value === 'string'
        case 'isNull':
        case 'exists':
            return hasField(value)
        default:
            return false
    }
}

function filterFields(filter: FilterExpr): string[] {
    switch (filter.op) {
        case 'and':
        case 'or':
            return filter.args.flatMap(filterFields)
        case 'not':
            return filterFields(filter.arg)
        default:
            return [filter.field]
    }
}

const filterSchema = z
    .custom<FilterExpr>(isFilterExpr, { message: 'Expected a filter expression' })
    .superRefine((filter, ctx) => {
        filterFields(filter)
            .filter(field => !isFieldPath(field))
            .forEach(field => {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    message: `Invalid filter field "${field}"`
                })
            })
    })

const paginationRequestSchema = z.object({
    sort: z.array(sortRuleSchema)
        .min(1, { message: 'Sort must contain at least one field' })
        .superRefine((rules, ctx) => {
            const seen = new Set<string>()
            rules.forEach((rule, index) => {
                if (seen.has(rule.field)) {
                    ctx.addIssue({
                        code: z.ZodIssueCode.custom,
                        path: [index, 'field'],
                        message: `Duplicate sort field "${rule.field}"`
                    })
                }
                seen.add(rule.field)
            })
        }),
    cursor: z.string().min(1).optional(),
    direction: z.enum(['next', 'previous']).optional(),
    limit: z.number().int().positive().optional(),
    skip: z.number().int().nonnegative().optional(),
    paging: z.literal('offset').optional(),
    filter: filterSchema.optional(),
    includeTotal: z.boolean().optional()
})

type ParsedPaginationRequest = z.infer<typeof paginationRequestSchema>

const CODE_BY_FIELD: Readonly<Record<string, PaginationErrorCode>> = {
    sort: 'INVALID_SORT_SPEC',
    cursor: 'INVALID_CURSOR',
    limit: 'INVALID_LIMIT',
    skip: 'INVALID_SKIP'
}

function parseRequest(request: PaginationRequest): ParsedPaginationRequest {
    const parsed = paginationRequestSchema.safeParse(request)
    if (parsed.success) return parsed.data

    const issue = parsed.error.issues[0]
    const head = issue?.path[0]
    const code = (typeof head === 'string' ? CODE_BY_FIELD[head] : undefined) ?? 'INVALID_REQUEST'
    throwError(code, `Invalid pagination request: ${formatZodErrorMessage(parsed.error)}`, {
        kind: 'validation',
        ...(issue ? { path: formatZodIssuePath(issue) } : {})
    })
}

/**
 * skip 非 0 或显式 paging: 'offset' 时为 offset 模式（cursor 被忽略）；否则有 cursor 即 cursor 模式。
 */
export function resolvePagingMode(request: Pick<PaginationRequest, 'cursor' | 'direction' | 'skip' | 'paging'>): PagingMode {
    const skip = request.skip ?? 0
    if (skip > 0 || request.paging === 'offset') {
        return { kind: 'offset', skip }
    }
    if (request.cursor) {
        return { kind: 'cursor', token: request.cursor, direction: request.direction ?? 'next' }
    }
    return { kind: 'first' }
}

export function normalizePaginationRequest<TRow>(
    request: PaginationRequest,
    config: ResolvedPaginatorConfig<TRow>
): NormalizedPaginationRequest {
    const parsed = parseRequest(request)

    let limit = parsed.limit ?? config.defaultLimit
    if (config.maxLimit !== undefined && limit > config.maxLimit) {
        config.logger.warn?.('keypage: limit clamped', { requested: limit, maxLimit: config.maxLimit })
        limit = config.maxLimit
    }

    return {
        sort: ensureTieBreaker(parsed.sort, config.tieBreaker),
        limit,
        mode: resolvePagingMode(parsed),
        ...(parsed.filter ? { filter: parsed.filter } : {}),
        includeTotal: parsed.includeTotal ?? config.includeTotal
    }
}
