export { MongoCollectionExecutor, compileFilterToMongo, toMongoSort } from './mongodb'
export type { MongoExecutorOptions } from './mongodb'

export { TypeormExecutor, compileFilterToSql, resolveColumn } from './typeorm'
export type { TypeormExecutorOptions, SqlFilter, SqlCompileContext } from './typeorm'

export { MemoryExecutor } from './memory'
export type { MemoryExecutorOptions } from './memory'
