/**
 * Outcome of a bounded polling loop
 */
export type PollResult<T> =
    | { status: 'success', value: T, attempts: number }
    | { status: 'timeout', attempts: number }

export interface PollOptions {
    /** Delay between two attempts (milliseconds) */
    intervalMs: number

    /** Stop after this many attempts */
    maxAttempts?: number

    /** Stop once this much time elapsed since the first attempt (milliseconds) */
    timeoutMs?: number
}

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms))
}

/**
 * Call check at a fixed interval until it returns a value other than undefined,
 * or until the attempt cap or timeout is reached. Errors thrown by check propagate.
 *
 * At least one attempt is always made. Without maxAttempts nor timeoutMs, a single attempt is made.
 */
export async function pollUntil<T>(check: (attempt: number) => Promise<T | undefined>, opts: PollOptions): Promise<PollResult<T>> {
    const startedAt = Date.now()
    const maxAttempts = opts.maxAttempts ?? (opts.timeoutMs === undefined ? 1 : Number.POSITIVE_INFINITY)

    let attempt = 0
    while (true) {
        attempt++
        const value = await check(attempt)
        if (value !== undefined) {
            return { status: 'success', value: value, attempts: attempt }
        }

        if (attempt >= maxAttempts) {
            return { status: 'timeout', attempts: attempt }
        }

        if (opts.timeoutMs !== undefined && Date.now() - startedAt + opts.intervalMs > opts.timeoutMs) {
            return { status: 'timeout', attempts: attempt }
        }

        await sleep(opts.intervalMs)
    }
}
