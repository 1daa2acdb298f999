import { z } from 'zod'
import type { ZodError, ZodIssue } from 'zod'

export { z }

export function formatZodIssuePath(issue: Pick<ZodIssue, 'path'>): string {
    return issue.path.length ? issue.path.join('.') : '(root)'
}

export function formatZodErrorMessage(error: ZodError): string {
    return error.issues
        .map(issue => `${formatZodIssuePath(issue)}: ${issue.message}`)
        .join('; ')
}
