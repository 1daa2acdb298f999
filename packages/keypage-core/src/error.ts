const PAGINATION_ERROR_BRAND = Symbol.for('keypage.error')

export type PaginationErrorCode =
    | 'INVALID_SORT_SPEC'
    | 'INVALID_CURSOR'
    | 'INVALID_LIMIT'
    | 'INVALID_SKIP'
    | 'INVALID_REQUEST'
    | 'EXECUTION_FAILURE'
    | 'CONTRACT_VIOLATION'

export type PaginationErrorKind = 'validation' | 'adapter' | 'internal'

export type PaginationErrorDetails = {
    kind: PaginationErrorKind
    path?: string
    field?: string
    operation?: 'find' | 'count'
    expected?: number
    actual?: number
    [k: string]: unknown
}

export class PaginationError extends Error {
    readonly code: PaginationErrorCode
    readonly details?: PaginationErrorDetails
    readonly [PAGINATION_ERROR_BRAND] = true

    constructor(code: PaginationErrorCode, message: string, details?: PaginationErrorDetails, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause })
        this.name = 'PaginationError'
        this.code = code
        this.details = details
    }
}

export function isPaginationError(value: unknown): value is PaginationError {
    if (value instanceof PaginationError) return true
    return typeof value === 'object'
        && value !== null
        && Reflect.get(value, PAGINATION_ERROR_BRAND) === true
}

export function createError(
    code: PaginationErrorCode,
    message: string,
    details?: PaginationErrorDetails,
    cause?: unknown
): PaginationError {
    return new PaginationError(code, message, details, cause)
}

export function throwError(
    code: PaginationErrorCode,
    message: string,
    details?: PaginationErrorDetails,
    cause?: unknown
): never {
    throw createError(code, message, details, cause)
}

/**
 * 调用方输入错误与执行层错误都可以交给调用方处理；CONTRACT_VIOLATION 代表 bug，不应重试。
 */
export function isRecoverable(error: unknown): boolean {
    return isPaginationError(error) && error.code !== 'CONTRACT_VIOLATION'
}
