export { toError, errorMessage } from './errors'

export { z, formatZodErrorMessage, formatZodIssuePath } from './zod'

export { readPath, isFieldPath } from './path'
