import { describe, it, expect } from 'vitest'
import { ObjectId } from 'bson'
import type { SortRule } from 'keypage-types'
import { CursorCodec, isPaginationError } from 'keypage-core'

const codeOf = (fn: () => unknown): string | undefined => {
    try {
        fn()
    } catch (err) {
        return isPaginationError(err) ? err.code : 'UNKNOWN'
    }
    return undefined
}

const scoreThenId: SortRule[] = [
    { field: 'score', dir: 'desc' },
    { field: '_id', dir: 'asc' }
]

describe('CursorCodec', () => {
    it('encode/decode 往返保持值与类型', () => {
        const codec = new CursorCodec()
        const id = new ObjectId('65a1b2c3d4e5f60718293a4b')
        const token = codec.encode(scoreThenId, [5, id])

        const decoded = codec.decode(scoreThenId, token)

        expect(decoded).toHaveLength(2)
        expect(decoded[0]).toBe(5)
        expect(decoded[1]).toBeInstanceOf(ObjectId)
        expect(String(decoded[1])).toBe('65a1b2c3d4e5f60718293a4b')
    })

    it('round-trips dates, strings, booleans, doubles and null', () => {
        const codec = new CursorCodec()
        const sort: SortRule[] = [
            { field: 'createdAt', dir: 'desc' },
            { field: 'name', dir: 'asc' },
            { field: 'active', dir: 'asc' },
            { field: 'ratio', dir: 'asc' },
            { field: 'deletedAt', dir: 'asc' }
        ]
        const createdAt = new Date('2024-03-01T12:00:00.000Z')
        const token = codec.encode(sort, [createdAt, 'Bananas', true, 2.5, null])

        expect(codec.decode(sort, token)).toEqual([createdAt, 'Bananas', true, 2.5, null])
    })

    it('bigint 往返后仍是 bigint，超出 2^53 也不丢精度', () => {
        const codec = new CursorCodec()
        const sort: SortRule[] = [{ field: 'seq', dir: 'asc', type: 'number' }, { field: 'big', dir: 'asc' }]
        const tuple = [10n, 2n ** 60n + 1n]

        expect(codec.decode(sort, codec.encode(sort, tuple))).toEqual(tuple)
    })

    it('keeps plain numbers as numbers', () => {
        const codec = new CursorCodec()
        const sort: SortRule[] = [{ field: 'a', dir: 'asc' }, { field: 'b', dir: 'asc' }]

        expect(codec.decode(sort, codec.encode(sort, [2 ** 40, -7]))).toEqual([2 ** 40, -7])
    })

    it('相同 tuple 总是得到相同 token，且只含 URL-safe 字符', () => {
        const tuple = [5, 'abc']
        const sort: SortRule[] = [{ field: 'score', dir: 'desc' }, { field: 'name', dir: 'asc' }]

        const a = new CursorCodec().encode(sort, tuple)
        const b = new CursorCodec().encode(sort, tuple)

        expect(a).toBe(b)
        expect(a).toMatch(/^[A-Za-z0-9_-]+$/)
    })

    it('encodes undefined sort values as null', () => {
        const codec = new CursorCodec()
        const token = codec.encode(scoreThenId, [undefined, 1])

        expect(codec.decode(scoreThenId, token)).toEqual([null, 1])
    })

    it('tuple 长度与 sort 不一致时抛 CONTRACT_VIOLATION', () => {
        const codec = new CursorCodec()
        expect(codeOf(() => codec.encode(scoreThenId, [5]))).toBe('CONTRACT_VIOLATION')
    })

    it('rejects empty, non-base64 and non-BSON tokens', () => {
        const codec = new CursorCodec()

        expect(codeOf(() => codec.decode(scoreThenId, ''))).toBe('INVALID_CURSOR')
        expect(codeOf(() => codec.decode(scoreThenId, 'abc$%'))).toBe('INVALID_CURSOR')
        expect(codeOf(() => codec.decode(scoreThenId, 'abc='))).toBe('INVALID_CURSOR')

        const notBson = Buffer.from('hello world').toString('base64url')
        expect(codeOf(() => codec.decode(scoreThenId, notBson))).toBe('INVALID_CURSOR')
    })

    it('字段数量或字段名与 sort 不符时拒绝', () => {
        const codec = new CursorCodec()
        const token = codec.encode([{ field: 'a', dir: 'asc' }], [1])

        expect(codeOf(() => codec.decode([{ field: 'a', dir: 'asc' }, { field: 'b', dir: 'asc' }], token)))
            .toBe('INVALID_CURSOR')
        expect(codeOf(() => codec.decode([{ field: 'b', dir: 'asc' }], token))).toBe('INVALID_CURSOR')
    })

    it('rejects values whose type differs from the declared sort type', () => {
        const codec = new CursorCodec()
        const untyped: SortRule[] = [{ field: 'score', dir: 'desc' }]
        const typed: SortRule[] = [{ field: 'score', dir: 'desc', type: 'number' }]

        const stringToken = codec.encode(untyped, ['five'])
        expect(codeOf(() => codec.decode(typed, stringToken))).toBe('INVALID_CURSOR')

        const nullToken = codec.encode(untyped, [null])
        expect(codec.decode(typed, nullToken)).toEqual([null])
    })

    it('error message names the failing field', () => {
        const codec = new CursorCodec()
        const token = codec.encode([{ field: 'a', dir: 'asc' }], [1])

        let message = ''
        try {
            codec.decode([{ field: 'b', dir: 'asc' }], token)
        } catch (err) {
            message = err instanceof Error ? err.message : ''
        }
        expect(message).toBe('Invalid cursor: missing field "b"')
    })

    it('任意单字符篡改要么解码失败，要么得到不同的 tuple', () => {
        const codec = new CursorCodec()
        const sort: SortRule[] = [{ field: 'score', dir: 'desc' }, { field: 'name', dir: 'asc' }]
        const tuple = [5, 'abc']
        const token = codec.encode(sort, tuple)

        for (let i = 0; i < token.length; i++) {
            const replacement = token[i] === 'A' ? 'B' : 'A'
            const mutated = `${token.slice(0, i)}${replacement}${token.slice(i + 1)}`
            try {
                expect(codec.decode(sort, mutated)).not.toEqual(tuple)
            } catch (err) {
                expect(isPaginationError(err) ? err.code : 'UNKNOWN').toBe('INVALID_CURSOR')
            }
        }
    })

    describe('signed cursors', () => {
        it('appends a signature and verifies it on decode', () => {
            const codec = new CursorCodec({ secret: 'test-secret' })
            const token = codec.encode(scoreThenId, [5, 1])

            expect(codec.signed).toBe(true)
            expect(token.split('.')).toHaveLength(2)
            expect(codec.decode(scoreThenId, token)).toEqual([5, 1])
        })

        it('签名被篡改、缺失或密钥不同都拒绝', () => {
            const codec = new CursorCodec({ secret: 'test-secret' })
            const other = new CursorCodec({ secret: 'other-secret' })
            const unsigned = new CursorCodec()

            const token = codec.encode(scoreThenId, [5, 1])
            const [payload, signature] = token.split('.')
            const flipped = `${payload}.${signature.startsWith('A') ? 'B' : 'A'}${signature.slice(1)}`

            expect(codeOf(() => codec.decode(scoreThenId, flipped))).toBe('INVALID_CURSOR')
            expect(codeOf(() => codec.decode(scoreThenId, payload))).toBe('INVALID_CURSOR')
            expect(codeOf(() => other.decode(scoreThenId, token))).toBe('INVALID_CURSOR')
            expect(codeOf(() => unsigned.decode(scoreThenId, token))).toBe('INVALID_CURSOR')
        })

        it('treats an empty secret as unsigned', () => {
            const codec = new CursorCodec({ secret: '' })
            expect(codec.signed).toBe(false)
            expect(codec.encode(scoreThenId, [5, 1])).toBe(new CursorCodec().encode(scoreThenId, [5, 1]))
        })
    })
})
