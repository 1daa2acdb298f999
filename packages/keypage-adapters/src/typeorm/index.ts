export { TypeormExecutor } from './TypeormExecutor'
export type { TypeormExecutorOptions } from './TypeormExecutor'
export { compileFilterToSql, resolveColumn } from './compile'
export type { SqlFilter, SqlCompileContext } from './compile'
