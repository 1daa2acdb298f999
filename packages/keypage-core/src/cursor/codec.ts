import { createHmac, timingSafeEqual } from 'node:crypto'
import { Decimal128, Double, Int32, Long, ObjectId, deserialize, serialize } from 'bson'
import type { Document } from 'bson'
import type { CursorToken, SortRule, SortValueType } from 'keypage-types'
import { errorMessage } from 'keypage-shared'
import { throwError } from '../error'

export type SortKeyTuple = unknown[]

export type CursorCodecOptions = {
    /** 配置后 token 附带 HMAC-SHA256 签名，解码时校验 */
    secret?: string
}

const BASE64URL = /^[A-Za-z0-9_-]+$/
const SIGNATURE_SEPARATOR = '.'

type ValueKind = SortValueType | 'null' | 'other'

function kindOf(value: unknown): ValueKind {
    if (value === null || value === undefined) return 'null'
    if (typeof value === 'string') return 'string'
    if (typeof value === 'number' || typeof value === 'bigint') return 'number'
    if (typeof value === 'boolean') return 'boolean'
    if (value instanceof Date) return 'date'
    if (value instanceof ObjectId) return 'objectId'
    if (value instanceof Long || value instanceof Int32 || value instanceof Double || value instanceof Decimal128) {
        return 'number'
    }
    return 'other'
}

function invalidCursor(reason: string, extra?: Record<string, unknown>, cause?: unknown): never {
    throwError('INVALID_CURSOR', `Invalid cursor: ${reason}`, { kind: 'validation', path: 'cursor', ...extra }, cause)
}

function decodeSegment(segment: string): Buffer {
    // Buffer 的 base64url 解码会静默跳过非法字符，这里要求输入是规范编码
    if (!BASE64URL.test(segment) || segment.length % 4 === 1) {
        invalidCursor('not url-safe base64')
    }
    const bytes = Buffer.from(segment, 'base64url')
    if (bytes.toString('base64url') !== segment) {
        invalidCursor('not url-safe base64')
    }
    return bytes
}

/**
 * SortKeyTuple <-> CursorToken。
 *
 * token 是一个 BSON 文档（key 为 sort 字段，按 sort 顺序写入）的 URL-safe base64（无 padding）。
 * 同一 tuple 每次编码得到完全相同的 token。
 */
export class CursorCodec {
    private readonly secret?: string

    constructor(options: CursorCodecOptions = {}) {
        if (typeof options.secret === 'string' && options.secret) {
            this.secret = options.secret
        }
    }

    get signed(): boolean {
        return this.secret !== undefined
    }

    encode(sort: SortRule[], tuple: SortKeyTuple): CursorToken {
        if (tuple.length !== sort.length) {
            throwError('CONTRACT_VIOLATION', 'Cursor tuple does not match sort', {
                kind: 'internal',
                expected: sort.length,
                actual: tuple.length
            })
        }

        const doc: Document = {}
        sort.forEach((rule, index) => {
            const value = tuple[index]
            doc[rule.field] = value === undefined ? null : value
        })

        let bytes: Uint8Array
        try {
            bytes = serialize(doc)
        } catch (err) {
            throwError('INVALID_CURSOR', `Unable to encode cursor: ${errorMessage(err)}`, { kind: 'validation' }, err)
        }

        const payload = Buffer.from(bytes).toString('base64url')
        return this.secret === undefined
            ? payload
            : `${payload}${SIGNATURE_SEPARATOR}${this.sign(payload)}`
    }

    decode(sort: SortRule[], token: CursorToken): SortKeyTuple {
        if (typeof token !== 'string' || !token) invalidCursor('empty token')

        const payload = this.verify(token)
        const bytes = decodeSegment(payload)

        let doc: Document
        try {
            // Int64 解码为 bigint，避免超出 2^53 的值丢精度
            doc = deserialize(bytes, { useBigInt64: true })
        } catch (err) {
            invalidCursor('not a BSON document', undefined, err)
        }

        const keys = Object.keys(doc)
        if (keys.length !== sort.length) {
            invalidCursor('field count does not match sort', { expected: sort.length, actual: keys.length })
        }

        return sort.map(rule => {
            if (!Object.prototype.hasOwnProperty.call(doc, rule.field)) {
                invalidCursor(`missing field "${rule.field}"`, { field: rule.field })
            }
            const value: unknown = doc[rule.field]
            if (rule.type) {
                const kind = kindOf(value)
                if (kind !== 'null' && kind !== rule.type) {
                    invalidCursor(`field "${rule.field}" is ${kind}, expected ${rule.type}`, { field: rule.field })
                }
            }
            return value
        })
    }

    private sign(payload: string): string {
        return createHmac('sha256', this.secret ?? '').update(payload).digest('base64url')
    }

    private verify(token: string): string {
        const separatorIndex = token.indexOf(SIGNATURE_SEPARATOR)

        if (this.secret === undefined) {
            if (separatorIndex !== -1) invalidCursor('unexpected signature')
            return token
        }

        if (separatorIndex === -1) invalidCursor('missing signature')
        const payload = token.slice(0, separatorIndex)
        const signature = token.slice(separatorIndex + 1)

        const expected = Buffer.from(this.sign(payload), 'utf8')
        const actual = Buffer.from(signature, 'utf8')
        if (expected.length !== actual.length || !timingSafeEqual(expected, actual)) {
            invalidCursor('signature mismatch')
        }
        return payload
    }
}
