import * as assert from 'assert'
import { pollUntil } from '../../../src/core/polling'

describe('Bounded polling', () => {

    it('should return first defined value with attempt count', async () => {
        const result = await pollUntil(async (attempt) => attempt === 3 ? 'ready' : undefined, { intervalMs: 0, maxAttempts: 5 })
        assert.deepStrictEqual(result, { status: 'success', value: 'ready', attempts: 3 })
    })

    it('should time out once attempts are exhausted', async () => {
        let calls = 0
        const result = await pollUntil(async () => { calls++; return undefined }, { intervalMs: 0, maxAttempts: 4 })

        assert.deepStrictEqual(result, { status: 'timeout', attempts: 4 })
        assert.strictEqual(calls, 4)
    })

    it('should time out once elapsed time exceeds timeout', async () => {
        const result = await pollUntil(async () => undefined, { intervalMs: 5, timeoutMs: 30 })

        assert.strictEqual(result.status, 'timeout')
        assert.ok(result.attempts >= 1)
    })

    it('should make a single attempt without cap nor timeout', async () => {
        const result = await pollUntil(async () => undefined, { intervalMs: 0 })
        assert.deepStrictEqual(result, { status: 'timeout', attempts: 1 })
    })

    it('should propagate errors raised by check', async () => {
        await assert.rejects(pollUntil(async () => { throw new Error('boom') }, { intervalMs: 0, maxAttempts: 3 }), /boom/)
    })
})
