import { throwError } from 'keypage-core'
import { isFieldPath } from 'keypage-shared'
import type { FilterExpr } from 'keypage-types'

export type SqlFilter = { sql: string; params: Record<string, unknown> }

export type SqlCompileContext = {
    alias?: string
    nextParam: (hint: string) => string
}

const MATCH_ALL: SqlFilter = { sql: '1=1', params: {} }
const MATCH_NONE: SqlFilter = { sql: '1=0', params: {} }

const RANGE_OPERATORS = { gt: '>', gte: '>=', lt: '<', lte: '<=' } as const

const LIKE_PATTERNS = {
    startsWith: escaped => `${escaped}%`,
    endsWith: escaped => `%${escaped}`,
    contains: escaped => `%${escaped}%`
} satisfies Record<'startsWith' | 'endsWith' | 'contains', (escaped: string) => string>

const isNullish = (value: unknown) => value === null || value === undefined

function escapeLike(input: string) {
    return input.replace(/[\\%_]/g, '\\$&')
}

/**
 * 字段名直接拼进 SQL，这里只放行标识符路径。
 */
export function resolveColumn(alias: string | undefined, field: string): string {
    if (!isFieldPath(field)) {
        throwError('INVALID_REQUEST', `Invalid field name "${field}"`, { kind: 'validation', field })
    }
    return alias ? `${alias}.${field}` : field
}

/**
 * FilterExpr -> 参数化 WHERE。NULL 的处理向 MongoDB 看齐（keyset 条件依赖这一点）：
 * - eq null / isNull -> IS NULL，exists -> IS NOT NULL
 * - ne v 与 in [..., null] 同时命中 NULL
 * - gt/lt null 不命中任何行，gte/lte null 只命中 NULL
 */
class SqlFilterCompiler {
    constructor(private readonly ctx: SqlCompileContext) {}

    compile(expr: FilterExpr): SqlFilter {
        switch (expr.op) {
            case 'and':
                return expr.args.length ? this.join(expr.args, 'AND') : MATCH_ALL
            case 'or':
                return expr.args.length ? this.join(expr.args, 'OR') : MATCH_NONE
            case 'not': {
                const inner = this.compile(expr.arg)
                return { sql: `NOT (${inner.sql})`, params: inner.params }
            }
            case 'eq':
                if (isNullish(expr.value)) return this.nullCheck(expr.field, true)
                return this.compare(expr.field, '=', `${expr.field}_eq`, expr.value)
            case 'ne': {
                if (isNullish(expr.value)) return this.nullCheck(expr.field, false)
                const column = this.column(expr.field)
                const key = this.ctx.nextParam(`${expr.field}_ne`)
                return { sql: `(${column} <> :${key} OR ${column} IS NULL)`, params: { [key]: expr.value } }
            }
            case 'in':
                return this.membership(expr.field, expr.values)
            case 'gt':
            case 'gte':
            case 'lt':
            case 'lte':
                if (isNullish(expr.value)) {
                    return expr.op === 'gte' || expr.op === 'lte' ? this.nullCheck(expr.field, true) : MATCH_NONE
                }
                return this.compare(expr.field, RANGE_OPERATORS[expr.op], `${expr.field}_${expr.op}`, expr.value)
            case 'startsWith':
            case 'endsWith':
            case 'contains': {
                const column = this.column(expr.field)
                const key = this.ctx.nextParam(`${expr.field}_${expr.op}`)
                const pattern = LIKE_PATTERNS[expr.op](escapeLike(expr.value))
                return { sql: `${column} LIKE :${key} ESCAPE '\\'`, params: { [key]: pattern } }
            }
            case 'isNull':
                return this.nullCheck(expr.field, true)
            case 'exists':
                return this.nullCheck(expr.field, false)
        }
    }

    private column(field: string) {
        return resolveColumn(this.ctx.alias, field)
    }

    private compare(field: string, operator: string, hint: string, value: unknown): SqlFilter {
        const column = this.column(field)
        const key = this.ctx.nextParam(hint)
        return { sql: `${column} ${operator} :${key}`, params: { [key]: value } }
    }

    private nullCheck(field: string, isNull: boolean): SqlFilter {
        return { sql: `${this.column(field)} ${isNull ? 'IS NULL' : 'IS NOT NULL'}`, params: {} }
    }

    private membership(field: string, values: unknown[]): SqlFilter {
        const present = values.filter(value => !isNullish(value))
        const includesNull = present.length !== values.length
        if (!present.length) {
            return includesNull ? this.nullCheck(field, true) : MATCH_NONE
        }

        const column = this.column(field)
        const key = this.ctx.nextParam(`${field}_in`)
        const sql = `${column} IN (:...${key})`
        return {
            sql: includesNull ? `(${sql} OR ${column} IS NULL)` : sql,
            params: { [key]: present }
        }
    }

    private join(args: FilterExpr[], joiner: 'AND' | 'OR'): SqlFilter {
        const parts = args.map(arg => this.compile(arg))
        return {
            sql: parts.map(part => `(${part.sql})`).join(` ${joiner} `),
            params: parts.reduce<Record<string, unknown>>((acc, part) => ({ ...acc, ...part.params }), {})
        }
    }
}

export function compileFilterToSql(filter: FilterExpr | undefined, ctx: SqlCompileContext): SqlFilter | undefined {
    if (!filter) return undefined
    return new SqlFilterCompiler(ctx).compile(filter)
}
