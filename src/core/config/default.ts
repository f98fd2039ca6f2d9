import * as os from 'os'
import * as path from 'path'
import lodash from 'lodash'
import type { PartialDeep } from 'type-fest'
import { CoreConfig, CoreConfigSchema } from './interface'
import { ENV_XDG_DATA_HOME, READINESS_TIMEOUTS, SPOTKUBE_APP_NAME } from '../const'
import { AWS_TIMEOUTS } from '../../providers/aws/constants'

export const DEFAULT_TIMINGS: CoreConfig['timings'] = {
    spotPollIntervalMs: AWS_TIMEOUTS.SPOT_POLL_INTERVAL_MS,
    spotFulfilmentTimeoutMs: AWS_TIMEOUTS.SPOT_FULFILMENT_TIMEOUT_MS,
    instanceRunningMaxWaitSeconds: AWS_TIMEOUTS.INSTANCE_RUNNING_MAX_WAIT_SECONDS,
    instanceTerminatedMaxWaitSeconds: AWS_TIMEOUTS.INSTANCE_TERMINATED_MAX_WAIT_SECONDS,
    publicIpPollIntervalMs: AWS_TIMEOUTS.PUBLIC_IP_POLL_INTERVAL_MS,
    publicIpMaxAttempts: AWS_TIMEOUTS.PUBLIC_IP_MAX_ATTEMPTS,
    sshPollIntervalMs: READINESS_TIMEOUTS.SSH_POLL_INTERVAL_MS,
    sshReachableTimeoutSeconds: READINESS_TIMEOUTS.SSH_REACHABLE_TIMEOUT_SECONDS,
}

export const DEFAULT_CORE_CONFIG: CoreConfig = {
    dataDir: path.join(os.homedir(), ".local", "share", SPOTKUBE_APP_NAME),
    timings: DEFAULT_TIMINGS,
}

export class ConfigLoader {

    /**
     * Data root follows XDG Base Directory layout:
     * $XDG_DATA_HOME/spotkube, or ~/.local/share/spotkube when unset.
     */
    static resolveDataDir(env: NodeJS.ProcessEnv = process.env): string {
        const xdgDataHome = env[ENV_XDG_DATA_HOME]
        if (xdgDataHome) {
            return path.join(xdgDataHome, SPOTKUBE_APP_NAME)
        }
        return DEFAULT_CORE_CONFIG.dataDir
    }

    /**
     * Build core config from environment, with optional overrides merged over defaults.
     */
    static load(overrides: PartialDeep<CoreConfig> = {}, env: NodeJS.ProcessEnv = process.env): CoreConfig {
        const base: CoreConfig = {
            dataDir: ConfigLoader.resolveDataDir(env),
            timings: { ...DEFAULT_TIMINGS },
        }
        return CoreConfigSchema.parse(lodash.merge(base, overrides))
    }
}
