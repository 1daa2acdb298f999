import pLimit from 'p-limit'
import { errorMessage } from 'keypage-shared'
import type {
    FilterExpr,
    FindArgs,
    FindResult,
    PaginationExecutor,
    PaginationRequest,
    QueryPlan
} from 'keypage-types'
import { resolvePaginatorConfig } from './config'
import type { PaginatorConfig, ResolvedPaginatorConfig } from './config'
import { createError, isPaginationError } from './error'
import { assemblePage } from './page/assemble'
import { normalizePaginationRequest } from './query/request'
import { translateQuery } from './query/translate'

/**
 * 分页入口：请求归一化 -> 翻译为 {filter, sort, limit+1} -> find/count 并发执行 -> 组装结果。
 */
export class Paginator<TRow> {
    private readonly config: ResolvedPaginatorConfig<TRow>

    constructor(
        private readonly executor: PaginationExecutor<TRow>,
        config: PaginatorConfig<TRow> = {}
    ) {
        this.config = resolvePaginatorConfig(config)
    }

    async paginate(request: PaginationRequest): Promise<FindResult<TRow>> {
        const { codec, readField, logger } = this.config
        const normalized = normalizePaginationRequest(request, this.config)
        const plan = translateQuery(normalized, codec)

        logger.debug?.('keypage: paginate', {
            mode: normalized.mode.kind,
            sort: normalized.sort,
            limit: plan.limit,
            ...(plan.skip !== undefined ? { skip: plan.skip } : {}),
            includeTotal: normalized.includeTotal
        })

        const [rows, totalCount] = await Promise.all([
            this.find(plan),
            normalized.includeTotal ? this.count(plan.countFilter) : Promise.resolve(undefined)
        ])

        try {
            return assemblePage({
                rows,
                plan,
                request: normalized,
                codec,
                readField,
                ...(totalCount !== undefined ? { totalCount } : {})
            })
        } catch (err) {
            if (isPaginationError(err) && err.code === 'CONTRACT_VIOLATION') {
                logger.error?.('keypage: executor contract violated', { ...err.details, message: err.message })
            }
            throw err
        }
    }

    /**
     * 并发执行多个互相独立的分页请求（并发数受 config.concurrency 限制），结果顺序与输入一致。
     */
    async paginateMany(requests: PaginationRequest[]): Promise<FindResult<TRow>[]> {
        const limit = pLimit(this.config.concurrency)
        return Promise.all(requests.map(request => limit(() => this.paginate(request))))
    }

    private async find(plan: QueryPlan): Promise<TRow[]> {
        const args: FindArgs = {
            ...(plan.filter ? { filter: plan.filter } : {}),
            sort: plan.sort,
            limit: plan.limit,
            ...(plan.skip !== undefined ? { skip: plan.skip } : {})
        }
        try {
            return await this.executor.executeFind(args)
        } catch (err) {
            throw this.executionFailure('find', err)
        }
    }

    private async count(filter: FilterExpr | undefined): Promise<number> {
        try {
            return await this.executor.executeCount(filter)
        } catch (err) {
            throw this.executionFailure('count', err)
        }
    }

    private executionFailure(operation: 'find' | 'count', err: unknown) {
        const message = errorMessage(err)
        this.config.logger.error?.('keypage: executor failed', { operation, message })
        return createError('EXECUTION_FAILURE', `Pagination ${operation} failed: ${message}`, {
            kind: 'adapter',
            operation
        }, err)
    }
}
