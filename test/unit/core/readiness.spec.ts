import * as assert from 'assert'
import * as sinon from 'sinon'
import { parseBootstrapStatus, ReadinessProber } from '../../../src/core/readiness'
import { BootstrapError } from '../../../src/core/errors/taxonomy'
import { failed, FakeRemoteRunner, ok } from '../../helpers/remote'

describe('Readiness prober', () => {

    const HOST = '203.0.113.1'

    it('should report reachable host once a session succeeds', async () => {
        let attempts = 0
        const runner = new FakeRemoteRunner().on((host, command) => {
            if (command !== 'true') return undefined
            attempts++
            return attempts < 3 ? failed(255, 'Connection refused') : undefined
        })
        const prober = new ReadinessProber({ runner: runner, pollIntervalMs: 1 })

        assert.strictEqual(await prober.waitForReachable(HOST, 5), true)
        assert.deepStrictEqual(runner.commandsOn(HOST), ['true', 'true', 'true'])
    })

    it('should return false when host stays unreachable', async () => {
        const runner = new FakeRemoteRunner().on(() => failed(255, 'Connection timed out'))
        const prober = new ReadinessProber({ runner: runner, pollIntervalMs: 1 })

        assert.strictEqual(await prober.waitForReachable(HOST, 0.02), false)
        assert.ok(runner.calls.length >= 1)
    })

    it('should accept a finished bootstrap', async () => {
        const runner = new FakeRemoteRunner()
        const prober = new ReadinessProber({ runner: runner, pollIntervalMs: 1 })

        await prober.waitForBootstrapComplete(HOST)

        assert.deepStrictEqual(runner.commandsOn(HOST), ['cloud-init status --wait', 'cloud-init status'])
    })

    it('should fail naming the host when cloud-init reports an error', async () => {
        const runner = new FakeRemoteRunner().on((host, command) => command === 'cloud-init status' ? ok('status: error\n') : undefined)
        const prober = new ReadinessProber({ runner: runner, pollIntervalMs: 1 })

        await assert.rejects(prober.waitForBootstrapComplete(HOST), (error: unknown) => {
            assert.ok(error instanceof BootstrapError)
            assert.strictEqual(error.message, 'cloud-init failed on 203.0.113.1: status: error')
            return true
        })
    })

    it('should fail when waiting for cloud-init exits non-zero', async () => {
        const runner = new FakeRemoteRunner().on((host, command) => command === 'cloud-init status --wait' ? failed(1) : undefined)
        const prober = new ReadinessProber({ runner: runner, pollIntervalMs: 1 })

        await assert.rejects(prober.waitForBootstrapComplete(HOST), (error: unknown) => {
            assert.ok(error instanceof BootstrapError)
            assert.strictEqual(error.message, "cloud-init failed on 203.0.113.1: 'cloud-init status --wait' exited with code 1")
            return true
        })
        assert.deepStrictEqual(runner.commandsOn(HOST), ['cloud-init status --wait'])
    })

    it('should treat unrecognized status as finished', async () => {
        const runner = new FakeRemoteRunner().on((host, command) => command === 'cloud-init status' ? ok('status: disabled\n') : undefined)
        const prober = new ReadinessProber({ runner: runner, pollIntervalMs: 1 })
        const runSpy = sinon.spy(runner, 'run')

        await prober.waitForBootstrapComplete(HOST)

        assert.strictEqual(runSpy.callCount, 2)
    })

    it('should recognize cloud-init status strings', () => {
        assert.strictEqual(parseBootstrapStatus('status: done'), 'done')
        assert.strictEqual(parseBootstrapStatus('status: error'), 'error')
        assert.strictEqual(parseBootstrapStatus('status: running'), 'unrecognized')
        assert.strictEqual(parseBootstrapStatus(''), 'unrecognized')
    })
})
