import { getLogger } from '../log/utils'
import { RemoteCommandRunner } from '../tools/ssh'
import { pollUntil } from './polling'
import { SPOTKUBE_ERROR_CODES } from './errors/codes'
import { BootstrapError } from './errors/taxonomy'
import { READINESS_TIMEOUTS } from './const'

export interface ReadinessProberArgs {
    runner: RemoteCommandRunner
    pollIntervalMs: number
}

/**
 * cloud-init status query outputs
 */
const CLOUD_INIT_STATUS_DONE = "status: done"
const CLOUD_INIT_STATUS_ERROR = "status: error"

export type BootstrapStatus = 'done' | 'error' | 'unrecognized'

export function parseBootstrapStatus(output: string): BootstrapStatus {
    if (output.includes(CLOUD_INIT_STATUS_DONE)) return 'done'
    if (output.includes(CLOUD_INIT_STATUS_ERROR)) return 'error'
    return 'unrecognized'
}

/**
 * Blocking checks that a node reached a usable state
 */
export class ReadinessProber {

    private readonly logger = getLogger(ReadinessProber.name)

    constructor(private readonly args: ReadinessProberArgs) {}

    /**
     * Try to open a session on host until one succeeds or timeout elapses.
     * @returns false on timeout, caller decides whether it is fatal
     */
    async waitForReachable(host: string, timeoutSeconds: number = READINESS_TIMEOUTS.SSH_REACHABLE_TIMEOUT_SECONDS): Promise<boolean> {
        this.logger.info(`Waiting for ${host} to accept SSH sessions (timeout ${timeoutSeconds}s)`)

        const result = await pollUntil(async (attempt) => {
            const probe = await this.args.runner.run(host, "true", { timeoutMs: READINESS_TIMEOUTS.SSH_PROBE_COMMAND_TIMEOUT_MS })
            if (probe.exitCode === 0) {
                return true
            }
            this.logger.debug(`SSH attempt ${attempt} on ${host} failed with exit code ${probe.exitCode}`)
            return undefined
        }, { intervalMs: this.args.pollIntervalMs, timeoutMs: timeoutSeconds * 1000 })

        if (result.status === 'success') {
            this.logger.info(`${host} is reachable`)
            return true
        }

        this.logger.warn(`${host} still unreachable after ${result.attempts} attempts`)
        return false
    }

    /**
     * Wait for cloud-init to finish on host.
     *
     * Unrecognized status strings are logged and treated as success.
     *
     * @throws BootstrapError naming host if cloud-init failed
     */
    async waitForBootstrapComplete(host: string): Promise<void> {
        this.logger.info(`Waiting for cloud-init to finish on ${host}`)

        const wait = await this.args.runner.run(host, "cloud-init status --wait")
        if (wait.exitCode !== 0) {
            throw new BootstrapError(SPOTKUBE_ERROR_CODES.BOOTSTRAP_FAILED, {
                host: host,
                reason: `'cloud-init status --wait' exited with code ${wait.exitCode}`,
            })
        }

        const status = await this.args.runner.run(host, "cloud-init status")
        const output = status.stdout.trim()

        switch (parseBootstrapStatus(output)) {
            case 'done':
                this.logger.info(`cloud-init done on ${host}`)
                return
            case 'error':
                throw new BootstrapError(SPOTKUBE_ERROR_CODES.BOOTSTRAP_FAILED, { host: host, reason: output })
            case 'unrecognized':
                this.logger.info(`cloud-init on ${host} reported '${output}', assuming it finished`)
                return
        }
    }
}
