const SECRET_KEY_PATTERN = /password|token|secret/i

/**
 * Copy of a value with secret-looking fields replaced, for logging
 */
export function redactSecrets(value: unknown): unknown {
    return JSON.parse(JSON.stringify(value, (key, v: unknown) => {
        if (typeof v === 'string' && SECRET_KEY_PATTERN.test(key)) {
            return '<redacted>'
        }
        return v
    }) ?? 'null')
}
