const isRecord = (value: unknown): value is Record<string, unknown> => {
    return typeof value === 'object' && value !== null
}

/**
 * 按点号路径读取字段（MongoDB 风格，如 `meta.score`）。
 * 完整 key 优先命中，路径上任意一段缺失时返回 undefined。
 */
export function readPath(target: unknown, path: string): unknown {
    if (!isRecord(target)) return undefined
    if (path in target) return target[path]
    if (!path.includes('.')) return undefined

    let current: unknown = target
    for (const segment of path.split('.')) {
        if (!isRecord(current)) return undefined
        current = current[segment]
    }
    return current
}

// 字母/下划线开头的标识符，可用点号连接嵌套字段；排除一切需要转义的字符
const FIELD_PATH = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z0-9_]+)*$/

/**
 * 字段名会被拼进 SQL 的 ORDER BY / WHERE 以及 MongoDB 的查询文档，只接受标识符路径。
 */
export function isFieldPath(field: string): boolean {
    return FIELD_PATH.test(field)
}
