import { compareBy, matchesFilter } from 'keypage-core'
import type { FieldReader } from 'keypage-core'
import { readPath } from 'keypage-shared'
import type { FilterExpr, FindArgs, PaginationExecutor } from 'keypage-types'

export type MemoryExecutorOptions<TRow> = {
    readField?: FieldReader<TRow>
}

/**
 * 进程内执行层：按 MongoDB 的比较语义在数组上做 filter/sort/skip/limit。
 */
export class MemoryExecutor<TRow> implements PaginationExecutor<TRow> {
    private rows: TRow[]
    private readonly readField: FieldReader<TRow>

    constructor(rows: Iterable<TRow> = [], options: MemoryExecutorOptions<TRow> = {}) {
        this.rows = Array.from(rows)
        this.readField = options.readField ?? ((row, field) => readPath(row, field))
    }

    insert(...rows: TRow[]): void {
        this.rows.push(...rows)
    }

    remove(predicate: (row: TRow) => boolean): number {
        const before = this.rows.length
        this.rows = this.rows.filter(row => !predicate(row))
        return before - this.rows.length
    }

    async executeFind(args: FindArgs): Promise<TRow[]> {
        const matched = this.match(args.filter)
        matched.sort(compareBy(args.sort, this.readField))
        const offset = args.skip ?? 0
        return matched.slice(offset, offset + args.limit)
    }

    async executeCount(filter: FilterExpr | undefined): Promise<number> {
        return this.match(filter).length
    }

    private match(filter: FilterExpr | undefined): TRow[] {
        if (!filter) return this.rows.slice()
        return this.rows.filter(row => matchesFilter(row, filter, this.readField))
    }
}
