/**
 * Error handling utilities shared by provider and remote calls
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
     * Converts any thrown value to an Error, keeping Error instances as they are
     */
    static toError(error: unknown): Error {
        return error instanceof Error ? error : new Error(String(error))
    }

    /**
     * Creates an Error prefixed with context, keeping the original error as cause
     */
    static createContextError(context: string, originalError: unknown): Error {
        const error = new Error(`${context}: ${this.extractErrorMessage(originalError)}`)
        error.cause = originalError
        return error
    }

    /**
     * Runs an async provider operation, prefixing any failure with context
     * @param operation - The async operation to execute
     * @param context - Description of the operation, e.g. "CreateSubnet 10.0.0.0/24"
     */
    static async wrapOperation<T>(operation: () => Promise<T>, context: string): Promise<T> {
        try {
            return await operation()
        } catch (error) {
            throw this.createContextError(context, error)
        }
    }

    /**
     * AWS SDK service exceptions carry their error code as `name` (e.g. "DependencyViolation").
     * Walks the cause chain so wrapped errors are recognized too.
     */
    static getAwsErrorCode(error: unknown): string | undefined {
        let current: unknown = error
        while (current instanceof Error) {
            if (current.name && current.name !== 'Error') {
                return current.name
            }
            current = current.cause
        }
        return undefined
    }
}
