import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { z, ZodError } from 'zod'
import { SPOTKUBE_ERROR_CODES } from '../errors/codes'
import { ConfigurationError } from '../errors/taxonomy'
import { CoreValidators } from '../validation/patterns'
import { DEFAULT_SSH_USER, KUBERNETES_DEFAULTS } from '../const'
import { AWS_SPOT } from '../../providers/aws/constants'
import { AwsTypeGuards } from '../../providers/aws/type-guards'
import { getLogger } from '../../log/utils'

const logger = getLogger('ClusterConfig')

function cidrBlock(description: string) {
    return z.string()
        .describe(description)
        .refine(
            (val) => CoreValidators.isValidIPv4Cidr(val),
            { message: "Invalid IPv4 CIDR block (e.g. '10.0.1.0/24', '203.0.113.0/32')" }
        )
}

function instanceType(description: string) {
    return z.string()
        .describe(description)
        .refine(
            (val) => AwsTypeGuards.instanceType(val),
            { message: "Unknown EC2 instance type (e.g. 't3.large', 'g4dn.xlarge')" }
        )
}

/**
 * On-disk cluster configuration. Keys are snake_case as written by users,
 * the parsed value is transformed into camelCase ClusterConfig.
 */
export const ClusterConfigFileSchema = z.object({
    region: z.string().min(1).describe("AWS region, e.g. eu-west-1"),
    ami_ssm_parameter: z.string().min(1).describe("SSM parameter holding the boot image ID"),
    allowed_ingress: cidrBlock("CIDR allowed to reach SSH and Kubernetes API"),
    key_name: z.string().min(1).describe("EC2 key pair name"),
    key_path: z.string().min(1).describe("Local path of the key pair private key"),
    vpc_cidr_block: cidrBlock("CIDR of the cluster subnet, inside the default VPC range"),
    main_instance_type: instanceType("Instance type of the main node"),
    worker_instance_type: instanceType("Instance type of CPU workers"),
    gpu_instance_type: instanceType("Instance type of GPU workers"),
    num_gpu_workers: z.number().int().nonnegative().describe("Number of GPU workers"),
    num_cpu_workers: z.number().int().nonnegative().describe("Number of CPU workers"),
    ssh_user: z.string().min(1).default(DEFAULT_SSH_USER).describe("SSH user of the boot image"),
    spot_max_price: z.union([
            z.number().positive().transform((val) => String(val)),
            z.string().regex(/^\d+(\.\d+)?$/, { message: "Spot price must be a decimal number, e.g. '1.0'" }),
        ])
        .default(AWS_SPOT.DEFAULT_MAX_PRICE)
        .describe("Max hourly spot price per instance (USD)"),
    kubernetes_version: z.string()
        .regex(/^v\d+\.\d+$/, { message: "Kubernetes version must look like 'v1.35'" })
        .default(KUBERNETES_DEFAULTS.KUBERNETES_VERSION),
    calico_version: z.string()
        .regex(/^v\d+\.\d+\.\d+$/, { message: "Calico version must look like 'v3.31.3'" })
        .default(KUBERNETES_DEFAULTS.CALICO_VERSION),
    nvidia_driver_version: z.string()
        .regex(/^\d+$/, { message: "NVIDIA driver version must be a major version, e.g. '580'" })
        .default(KUBERNETES_DEFAULTS.NVIDIA_DRIVER_VERSION),
    pod_cidr: cidrBlock("Kubernetes pod network CIDR").default(KUBERNETES_DEFAULTS.POD_CIDR),
    service_cidr: cidrBlock("Kubernetes service network CIDR").default(KUBERNETES_DEFAULTS.SERVICE_CIDR),
}).transform((raw) => ({
    region: raw.region,
    amiSsmParameter: raw.ami_ssm_parameter,
    allowedIngress: raw.allowed_ingress,
    keyName: raw.key_name,
    keyPath: expandHomePath(raw.key_path),
    vpcCidrBlock: raw.vpc_cidr_block,
    mainInstanceType: raw.main_instance_type,
    workerInstanceType: raw.worker_instance_type,
    gpuInstanceType: raw.gpu_instance_type,
    numGpuWorkers: raw.num_gpu_workers,
    numCpuWorkers: raw.num_cpu_workers,
    sshUser: raw.ssh_user,
    spotMaxPrice: raw.spot_max_price,
    kubernetesVersion: raw.kubernetes_version,
    calicoVersion: raw.calico_version,
    nvidiaDriverVersion: raw.nvidia_driver_version,
    podCidr: raw.pod_cidr,
    serviceCidr: raw.service_cidr,
}))

export type ClusterConfig = z.output<typeof ClusterConfigFileSchema>

/**
 * Expand a leading '~' to the user home directory
 */
export function expandHomePath(p: string, home: string = os.homedir()): string {
    if (p === "~") return home
    if (p.startsWith("~/")) return path.join(home, p.slice(2))
    return p
}

function formatIssues(error: ZodError): string {
    return error.issues
        .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
        .join('; ')
}

/**
 * Validate raw configuration content.
 * @param sourcePath - file the content was read from, for error messages
 * @throws ConfigurationError listing every schema violation
 */
export function parseClusterConfig(raw: unknown, sourcePath: string): ClusterConfig {
    const result = ClusterConfigFileSchema.safeParse(raw)
    if (!result.success) {
        throw new ConfigurationError(
            SPOTKUBE_ERROR_CODES.CONFIG_INVALID,
            { path: sourcePath, issues: formatIssues(result.error) },
            result.error
        )
    }
    return result.data
}

/**
 * Load and validate cluster configuration file
 */
export async function loadClusterConfig(configPath: string): Promise<ClusterConfig> {
    logger.debug(`Loading cluster configuration from ${configPath}`)

    let content: string
    try {
        content = await fs.promises.readFile(configPath, 'utf-8')
    } catch (error) {
        throw new ConfigurationError(
            SPOTKUBE_ERROR_CODES.CONFIG_FILE_NOT_FOUND,
            { path: configPath },
            error instanceof Error ? error : undefined
        )
    }

    let raw: unknown
    try {
        raw = JSON.parse(content)
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error)
        throw new ConfigurationError(
            SPOTKUBE_ERROR_CODES.CONFIG_INVALID_JSON,
            { path: configPath, reason: reason },
            error instanceof Error ? error : undefined
        )
    }

    return parseClusterConfig(raw, configPath)
}
