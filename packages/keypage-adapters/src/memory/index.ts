export { MemoryExecutor } from './MemoryExecutor'
export type { MemoryExecutorOptions } from './MemoryExecutor'
