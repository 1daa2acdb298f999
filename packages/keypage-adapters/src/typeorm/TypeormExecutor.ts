import type { DataSource, EntityManager, EntityTarget, ObjectLiteral, SelectQueryBuilder } from 'typeorm'
import type { FilterExpr, FindArgs, PaginationExecutor } from 'keypage-types'
import { compileFilterToSql, resolveColumn } from './compile'

export type TypeormExecutorOptions = {
    /** QueryBuilder 别名，默认 'item' */
    alias?: string
    /** 事务内使用：传入 runner.manager */
    manager?: EntityManager
    /**
     * keyset 条件把 NULL 视为最小值。PostgreSQL 默认 NULL 排在 ASC 末尾，开启后显式输出
     * NULLS FIRST / NULLS LAST；MySQL、SQLite 本身就是 NULL 最小，无需开启（也不支持该语法）
     */
    nullsLowest?: boolean
}

/**
 * SQL 侧的执行层：FilterExpr 编译为参数化 WHERE，sort 映射为 ORDER BY。
 * NULL 的排序位置由数据库决定，见 TypeormExecutorOptions.nullsLowest。
 */
export class TypeormExecutor<TEntity extends ObjectLiteral> implements PaginationExecutor<TEntity> {
    private paramIndex = 0
    private readonly alias: string
    private readonly manager: EntityManager
    private readonly nullsLowest: boolean

    constructor(
        dataSource: DataSource,
        private readonly entity: EntityTarget<TEntity>,
        options: TypeormExecutorOptions = {}
    ) {
        this.alias = options.alias ?? 'item'
        this.manager = options.manager ?? dataSource.manager
        this.nullsLowest = options.nullsLowest === true
    }

    async executeFind(args: FindArgs): Promise<TEntity[]> {
        const qb = this.createQueryBuilder(args.filter)

        args.sort.forEach((rule, idx) => {
            const direction = rule.dir === 'asc' ? 'ASC' : 'DESC'
            const column = resolveColumn(this.alias, rule.field)
            const nulls = this.nullsLowest ? (rule.dir === 'asc' ? 'NULLS FIRST' : 'NULLS LAST') : undefined
            if (idx === 0) qb.orderBy(column, direction, nulls)
            else qb.addOrderBy(column, direction, nulls)
        })

        if (args.skip) qb.skip(args.skip)
        qb.take(args.limit)

        return qb.getMany()
    }

    async executeCount(filter: FilterExpr | undefined): Promise<number> {
        return this.createQueryBuilder(filter).getCount()
    }

    private createQueryBuilder(filter: FilterExpr | undefined): SelectQueryBuilder<TEntity> {
        const qb = this.manager.getRepository(this.entity).createQueryBuilder(this.alias)
        const compiled = compileFilterToSql(filter, { alias: this.alias, nextParam: this.nextParam.bind(this) })
        if (compiled) qb.andWhere(compiled.sql, compiled.params)
        return qb
    }

    private nextParam(hint: string) {
        this.paramIndex += 1
        return `${hint.replace(/\W/g, '_')}_${this.paramIndex}`
    }
}
