export type CursorToken = string

export type SortDir = 'asc' | 'desc'

/**
 * 可选声明：字段在存储中的 BSON 类型。声明后 cursor 解码会拒绝类型不符的值（null 除外）。
 */
export type SortValueType = 'string' | 'number' | 'boolean' | 'date' | 'objectId'

export type SortRule = { field: string; dir: SortDir; type?: SortValueType }

export type FilterExpr =
    | { op: 'and'; args: FilterExpr[] }
    | { op: 'or'; args: FilterExpr[] }
    | { op: 'not'; arg: FilterExpr }
    | { op: 'eq' | 'ne'; field: string; value: unknown }
    | { op: 'in'; field: string; values: unknown[] }
    | { op: 'gt' | 'gte' | 'lt' | 'lte'; field: string; value: unknown }
    | { op: 'startsWith' | 'endsWith' | 'contains'; field: string; value: string }
    | { op: 'isNull'; field: string }
    | { op: 'exists'; field: string }

export type ComparisonOp = Extract<FilterExpr, { op: 'gt' | 'gte' | 'lt' | 'lte' }>['op']
