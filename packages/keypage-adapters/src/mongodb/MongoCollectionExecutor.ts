import type {
    Collection,
    CountDocumentsOptions,
    Document,
    Filter,
    FindOptions,
    SortDirection,
    WithId
} from 'mongodb'
import type { FilterExpr, FindArgs, PaginationExecutor, SortRule } from 'keypage-types'
import { compileFilterToMongo } from './compile'

export type MongoExecutorOptions = {
    /** 透传给 find 的选项（collation、hint、projection、maxTimeMS...），sort/limit/skip 由分页决定 */
    find?: Omit<FindOptions, 'sort' | 'limit' | 'skip'>
    count?: Omit<CountDocumentsOptions, 'limit' | 'skip'>
}

export function toMongoSort(sort: SortRule[]): Map<string, SortDirection> {
    // 用 Map 保证字段顺序（对象 key 可能被重排）
    return new Map(sort.map((rule): [string, SortDirection] => [rule.field, rule.dir === 'asc' ? 1 : -1]))
}

export class MongoCollectionExecutor<TRow extends Document = WithId<Document>> implements PaginationExecutor<TRow> {
    constructor(
        private readonly collection: Collection<Document>,
        private readonly options: MongoExecutorOptions = {}
    ) {}

    async executeFind(args: FindArgs): Promise<TRow[]> {
        const cursor = this.collection.find<TRow>(this.toFilter(args.filter), {
            ...this.options.find,
            sort: toMongoSort(args.sort),
            limit: args.limit,
            ...(args.skip ? { skip: args.skip } : {})
        })
        return cursor.toArray()
    }

    async executeCount(filter: FilterExpr | undefined): Promise<number> {
        return this.collection.countDocuments(this.toFilter(filter), this.options.count ?? {})
    }

    private toFilter(filter: FilterExpr | undefined): Filter<Document> {
        return compileFilterToMongo(filter)
    }
}
