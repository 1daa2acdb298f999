export { MongoCollectionExecutor, toMongoSort } from './MongoCollectionExecutor'
export type { MongoExecutorOptions } from './MongoCollectionExecutor'
export { compileFilterToMongo } from './compile'
