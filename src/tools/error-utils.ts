/**
 * Error handling helpers shared by providers and CLI
 */
export class ErrorUtils {

    /**
     * Extracts a string message from any thrown value
     */
    static extractErrorMessage(error: unknown): string {
        if (error instanceof Error) {
            return error.message
        }
        if (typeof error === 'string') {
            return error
        }
        return String(error)
    }

    /**
     * Azure SDK RestError and Node fetch errors both expose an HTTP status code
     */
    static statusCodeOf(error: unknown): number | undefined {
        if (typeof error === 'object' && error !== null && 'statusCode' in error && typeof error.statusCode === 'number') {
            return error.statusCode
        }
        return undefined
    }

    static isNotFound(error: unknown): boolean {
        return ErrorUtils.statusCodeOf(error) === 404
    }

    /**
     * Walk the cause chain of an error, outermost first
     */
    static causeChain(error: unknown): unknown[] {
        const chain: unknown[] = []
        let current: unknown = error
        while (current !== undefined && chain.length < 10) {
            chain.push(current)
            current = current instanceof Error ? current.cause : undefined
        }
        return chain
    }
}
