import type { Document } from 'mongodb'
import type { FilterExpr } from 'keypage-types'

// $nor 一个空条件：匹配不到任何文档
const MATCH_NONE: Document = { $nor: [{}] }

function escapeRegExp(input: string): string {
    return input.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

export function compileFilterToMongo(filter: FilterExpr | undefined): Document {
    if (!filter) return {}
    return compileMongoExpr(filter)
}

function compileMongoExpr(expr: FilterExpr): Document {
    switch (expr.op) {
        case 'and':
            return expr.args.length ? { $and: expr.args.map(compileMongoExpr) } : {}
        case 'or':
            return expr.args.length ? { $or: expr.args.map(compileMongoExpr) } : MATCH_NONE
        case 'not':
            return { $nor: [compileMongoExpr(expr.arg)] }
        case 'eq':
            return { [expr.field]: { $eq: expr.value } }
        case 'ne':
            return { [expr.field]: { $ne: expr.value } }
        case 'in':
            return { [expr.field]: { $in: expr.values } }
        case 'gt':
        case 'gte':
        case 'lt':
        case 'lte':
            return { [expr.field]: { [`$${expr.op}`]: expr.value } }
        case 'startsWith':
            return { [expr.field]: { $regex: `^${escapeRegExp(expr.value)}` } }
        case 'endsWith':
            return { [expr.field]: { $regex: `${escapeRegExp(expr.value)}$` } }
        case 'contains':
            return { [expr.field]: { $regex: escapeRegExp(expr.value) } }
        case 'isNull':
            return { [expr.field]: { $type: 'null' } }
        case 'exists':
            return { [expr.field]: { $exists: true, $ne: null } }
    }
}
