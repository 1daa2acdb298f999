export type PaginationLogMeta = Record<string, unknown>

export type PaginationLogger = {
    child?: (bindings: PaginationLogMeta) => PaginationLogger
    debug?: (msg: string, meta?: PaginationLogMeta) => void
    info?: (msg: string, meta?: PaginationLogMeta) => void
    warn?: (msg: string, meta?: PaginationLogMeta) => void
    error?: (msg: string, meta?: PaginationLogMeta) => void
}

export function createNoopLogger(): PaginationLogger {
    return {}
}
