import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { ConfigLoader } from '../../src/core/config/default'
import { CoreConfig } from '../../src/core/config/interface'
import { AWS_TEST_CONSTANTS } from '../helpers/providers/aws'

export function createTempDir(prefix: string = 'spotkube-test-'): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), prefix))
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true })
}

/**
 * Core config with a dedicated data directory and near-zero wait times
 */
export function getUnitTestCoreConfig(dataDir: string): CoreConfig {
    return ConfigLoader.load({
        dataDir: dataDir,
        timings: {
            spotPollIntervalMs: 0,
            spotFulfilmentTimeoutMs: 200,
            publicIpPollIntervalMs: 0,
            publicIpMaxAttempts: 3,
            sshPollIntervalMs: 1,
            sshReachableTimeoutSeconds: 0.05,
        },
    }, {})
}

/**
 * Raw (on-disk) cluster configuration: 1 GPU worker and 2 CPU workers
 */
export const DEFAULT_RAW_CLUSTER_CONFIG = {
    region: AWS_TEST_CONSTANTS.DEFAULT_REGION,
    ami_ssm_parameter: AWS_TEST_CONSTANTS.DEFAULT_AMI_PARAMETER,
    allowed_ingress: AWS_TEST_CONSTANTS.DEFAULT_ALLOWED_INGRESS,
    key_name: AWS_TEST_CONSTANTS.DEFAULT_KEY_PAIR,
    key_path: AWS_TEST_CONSTANTS.DEFAULT_SSH_KEY_PATH,
    vpc_cidr_block: AWS_TEST_CONSTANTS.DEFAULT_VPC_CIDR,
    main_instance_type: AWS_TEST_CONSTANTS.MAIN_INSTANCE_TYPE,
    worker_instance_type: AWS_TEST_CONSTANTS.CPU_INSTANCE_TYPE,
    gpu_instance_type: AWS_TEST_CONSTANTS.GPU_INSTANCE_TYPE,
    num_gpu_workers: 1,
    num_cpu_workers: 2,
}

/**
 * Write cluster configuration JSON in dir, returns file path
 */
export function writeClusterConfig(dir: string, overrides: Record<string, unknown> = {}, fileName: string = 'cluster-config.json'): string {
    const configPath = path.join(dir, fileName)
    fs.writeFileSync(configPath, JSON.stringify({ ...DEFAULT_RAW_CLUSTER_CONFIG, ...overrides }, null, 2))
    return configPath
}
