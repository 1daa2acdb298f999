import { describe, it, expect } from 'vitest'
import { ObjectId } from 'bson'
import type { FilterExpr } from 'keypage-types'
import { compareBy, compareValues, ensureTieBreaker, matchesFilter, reverseSort } from 'keypage-core'
import { readPath } from 'keypage-shared'

type Row = Record<string, unknown>

const matches = (row: Row, filter: FilterExpr) => matchesFilter(row, filter, readPath)

describe('compareValues', () => {
    it('跨类型按 null < number < string < object < array < ObjectId < boolean < date 排序', () => {
        const ordered = [
            null,
            -1,
            2.5,
            'a',
            { a: 1 },
            [1],
            new ObjectId('000000000000000000000001'),
            false,
            true,
            new Date('2024-01-01T00:00:00.000Z')
        ]

        for (let i = 0; i < ordered.length - 1; i++) {
            expect(compareValues(ordered[i], ordered[i + 1])).toBe(-1)
            expect(compareValues(ordered[i + 1], ordered[i])).toBe(1)
        }
    })

    it('compares large bigints exactly', () => {
        expect(compareValues(2n ** 60n, 2n ** 60n + 1n)).toBe(-1)
        expect(compareValues(2n ** 60n, 2n ** 60n)).toBe(0)
        expect(compareValues(3n, 2.5)).toBe(1)
    })

    it('treats undefined like null', () => {
        expect(compareValues(undefined, null)).toBe(0)
    })
})

describe('compareBy', () => {
    it('applies rules in order with per-rule direction', () => {
        const rows = [
            { score: 3, _id: 1 },
            { score: 5, _id: 2 },
            { score: 5, _id: 1 }
        ]
        rows.sort(compareBy([{ field: 'score', dir: 'desc' }, { field: '_id', dir: 'asc' }], readPath))

        expect(rows).toEqual([
            { score: 5, _id: 1 },
            { score: 5, _id: 2 },
            { score: 3, _id: 1 }
        ])
    })
})

describe('sort helpers', () => {
    it('reverseSort flips every direction and keeps declared types', () => {
        expect(reverseSort([{ field: 'a', dir: 'asc', type: 'number' }, { field: 'b', dir: 'desc' }])).toEqual([
            { field: 'a', dir: 'desc', type: 'number' },
            { field: 'b', dir: 'asc' }
        ])
    })

    it('ensureTieBreaker leaves the sort alone without a tie breaker', () => {
        const sort = [{ field: 'a', dir: 'asc' as const }]
        expect(ensureTieBreaker(sort, undefined)).toBe(sort)
    })
})

describe('matchesFilter', () => {
    it('eq null 同时匹配 null 与缺失字段', () => {
        const filter: FilterExpr = { op: 'eq', field: 'deletedAt', value: null }

        expect(matches({ deletedAt: null }, filter)).toBe(true)
        expect(matches({}, filter)).toBe(true)
        expect(matches({ deletedAt: 0 }, filter)).toBe(false)
    })

    it('isNull only matches an explicit null and exists rejects both', () => {
        expect(matches({ v: null }, { op: 'isNull', field: 'v' })).toBe(true)
        expect(matches({}, { op: 'isNull', field: 'v' })).toBe(false)
        expect(matches({ v: null }, { op: 'exists', field: 'v' })).toBe(false)
        expect(matches({ v: 0 }, { op: 'exists', field: 'v' })).toBe(true)
    })

    it('范围比较只在同一类型区间内成立', () => {
        expect(matches({ v: 'abc' }, { op: 'gt', field: 'v', value: 1 })).toBe(false)
        expect(matches({ v: null }, { op: 'lt', field: 'v', value: 1 })).toBe(false)
        expect(matches({ v: 2 }, { op: 'gt', field: 'v', value: 1 })).toBe(true)
        expect(matches({ v: 1 }, { op: 'gte', field: 'v', value: 1 })).toBe(true)
        expect(matches({ v: 1 }, { op: 'lte', field: 'v', value: 0 })).toBe(false)
    })

    it('combines and/or/not', () => {
        const filter: FilterExpr = {
            op: 'and',
            args: [
                { op: 'in', field: 'status', values: ['active', 'pending'] },
                { op: 'not', arg: { op: 'eq', field: 'owner', value: 'bob' } },
                {
                    op: 'or',
                    args: [
                        { op: 'ne', field: 'score', value: 0 },
                        { op: 'exists', field: 'pinned' }
                    ]
                }
            ]
        }

        expect(matches({ status: 'active', owner: 'amy', score: 3 }, filter)).toBe(true)
        expect(matches({ status: 'archived', owner: 'amy', score: 3 }, filter)).toBe(false)
        expect(matches({ status: 'pending', owner: 'bob', score: 3 }, filter)).toBe(false)
        expect(matches({ status: 'pending', owner: 'amy', score: 0 }, filter)).toBe(false)
        expect(matches({ status: 'pending', owner: 'amy', score: 0, pinned: true }, filter)).toBe(true)
    })

    it('string operators are case-sensitive and ignore non-strings', () => {
        expect(matches({ title: 'Hello world' }, { op: 'startsWith', field: 'title', value: 'Hello' })).toBe(true)
        expect(matches({ title: 'Hello world' }, { op: 'startsWith', field: 'title', value: 'hello' })).toBe(false)
        expect(matches({ title: 'Hello world' }, { op: 'endsWith', field: 'title', value: 'world' })).toBe(true)
        expect(matches({ title: 'Hello world' }, { op: 'contains', field: 'title', value: 'o w' })).toBe(true)
        expect(matches({ title: 42 }, { op: 'contains', field: 'title', value: '4' })).toBe(false)
    })

    it('reads nested fields through dotted paths', () => {
        expect(matches({ meta: { rank: 2 } }, { op: 'eq', field: 'meta.rank', value: 2 })).toBe(true)
    })
})
