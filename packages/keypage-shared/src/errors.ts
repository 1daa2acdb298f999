export function toError(reason: unknown): Error {
    if (reason instanceof Error) return reason
    if (typeof reason === 'string' && reason) return new Error(reason)
    try {
        const serialized: string | undefined = JSON.stringify(reason)
        return new Error(serialized ?? 'Unknown error')
    } catch {
        return new Error('Unknown error')
    }
}

export function errorMessage(reason: unknown): string {
    return toError(reason).message
}
