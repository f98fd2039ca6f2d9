/**
 * In-process AWS provider stand-in recording every call
 */

import {
    ClusterProviderApi,
    IngressRule,
    InstanceAddresses,
    SpotLaunchSpec,
    SpotRequestStatus,
} from '../../../src/core/provider'

/**
 * AWS-specific test constants
 */
export const AWS_TEST_CONSTANTS = {
    DEFAULT_REGION: 'us-east-1',
    DEFAULT_ZONE: 'us-east-1a',
    DEFAULT_AMI_ID: 'ami-0abcdef1234567890',
    DEFAULT_AMI_PARAMETER: '/test/ubuntu/ami-id',
    DEFAULT_VPC_ID: 'vpc-0123456789abcdef0',
    MAIN_INSTANCE_TYPE: 't3.large',
    CPU_INSTANCE_TYPE: 't3.medium',
    GPU_INSTANCE_TYPE: 'g4dn.xlarge',
    DEFAULT_KEY_PAIR: 'test-keypair',
    DEFAULT_SSH_KEY_PATH: '/tmp/test-ssh-key',
    DEFAULT_VPC_CIDR: '172.31.200.0/24',
    DEFAULT_ALLOWED_INGRESS: '198.51.100.0/24',
} as const

export interface ProviderCall {
    method: keyof ClusterProviderApi
    args: unknown[]
}

export interface FakeAwsProviderOptions {
    region?: string
    /**
     * Spot status codes returned by successive describe calls, per instance type.
     * Last code is repeated once the list is exhausted. Defaults to ['pending-fulfillment', 'fulfilled'].
     */
    spotStatusesByInstanceType?: Record<string, string[]>
    /** Instance types never getting a public address */
    withoutPublicIp?: string[]
    /** Number of describe calls returning no public address before one is assigned */
    publicIpDelayAttempts?: number
    /** Methods failing with given error */
    failures?: Partial<Record<keyof ClusterProviderApi, Error>>
}

interface FakeSpotRequest {
    id: string
    instanceId: string
    instanceType: string
    describeCount: number
}

const DEFAULT_SPOT_STATUSES = ['pending-fulfillment', 'fulfilled']

/**
 * Fake provider: IDs are sequential, the n-th spot request gets instance i-fake-n
 * with public address 203.0.113.n and private address 10.0.1.n
 */
export class FakeAwsProvider implements ClusterProviderApi {

    readonly region: string
    readonly calls: ProviderCall[] = []
    readonly spotSpecs: SpotLaunchSpec[] = []
    readonly instanceTags = new Map<string, Record<string, string>>()

    private readonly spotRequests = new Map<string, FakeSpotRequest>()
    private readonly addressChecks = new Map<string, number>()
    private spotCounter = 0
    private subnetCounter = 0
    private groupCounter = 0

    constructor(private readonly opts: FakeAwsProviderOptions = {}) {
        this.region = opts.region ?? AWS_TEST_CONSTANTS.DEFAULT_REGION
    }

    private record(method: keyof ClusterProviderApi, ...args: unknown[]): void {
        this.calls.push({ method, args })
        const failure = this.opts.failures?.[method]
        if (failure) {
            throw failure
        }
    }

    callsTo(method: keyof ClusterProviderApi): ProviderCall[] {
        return this.calls.filter(c => c.method === method)
    }

    private spotRequestOfInstance(instanceId: string): FakeSpotRequest | undefined {
        return Array.from(this.spotRequests.values()).find(r => r.instanceId === instanceId)
    }

    async getParameter(name: string): Promise<string> {
        this.record('getParameter', name)
        return AWS_TEST_CONSTANTS.DEFAULT_AMI_ID
    }

    async getDefaultVpcId(): Promise<string> {
        this.record('getDefaultVpcId')
        return AWS_TEST_CONSTANTS.DEFAULT_VPC_ID
    }

    async createSubnet(vpcId: string, cidrBlock: string, availabilityZone: string): Promise<string> {
        this.record('createSubnet', vpcId, cidrBlock, availabilityZone)
        return `subnet-fake-${++this.subnetCounter}`
    }

    async enableSubnetPublicIp(subnetId: string): Promise<void> {
        this.record('enableSubnetPublicIp', subnetId)
    }

    async createSecurityGroup(name: string, description: string, vpcId: string): Promise<string> {
        this.record('createSecurityGroup', name, description, vpcId)
        return `sg-fake-${++this.groupCounter}`
    }

    async authorizeIngress(securityGroupId: string, rules: IngressRule[]): Promise<void> {
        this.record('authorizeIngress', securityGroupId, rules)
    }

    async deleteSecurityGroup(securityGroupId: string): Promise<void> {
        this.record('deleteSecurityGroup', securityGroupId)
    }

    async deleteSubnet(subnetId: string): Promise<void> {
        this.record('deleteSubnet', subnetId)
    }

    async requestSpotInstance(launchSpec: SpotLaunchSpec): Promise<string> {
        this.record('requestSpotInstance', launchSpec)
        this.spotSpecs.push(launchSpec)
        const n = ++this.spotCounter
        const request: FakeSpotRequest = {
            id: `sir-fake-${n}`,
            instanceId: `i-fake-${n}`,
            instanceType: launchSpec.instanceType,
            describeCount: 0,
        }
        this.spotRequests.set(request.id, request)
        return request.id
    }

    async describeSpotRequest(spotRequestId: string): Promise<SpotRequestStatus> {
        this.record('describeSpotRequest', spotRequestId)
        const request = this.spotRequests.get(spotRequestId)
        if (!request) {
            throw new Error(`Unknown spot request ${spotRequestId}`)
        }

        const statuses = this.opts.spotStatusesByInstanceType?.[request.instanceType] ?? DEFAULT_SPOT_STATUSES
        const code = statuses[Math.min(request.describeCount, statuses.length - 1)]
        request.describeCount++

        return code === 'fulfilled' ? { code, instanceId: request.instanceId } : { code }
    }

    async cancelSpotRequests(spotRequestIds: string[]): Promise<void> {
        this.record('cancelSpotRequests', spotRequestIds)
    }

    async waitForInstanceRunning(instanceId: string, maxWaitSeconds: number): Promise<void> {
        this.record('waitForInstanceRunning', instanceId, maxWaitSeconds)
    }

    async tagInstance(instanceId: string, tags: Record<string, string>): Promise<void> {
        this.record('tagInstance', instanceId, tags)
        this.instanceTags.set(instanceId, tags)
    }

    async describeInstanceAddresses(instanceId: string): Promise<InstanceAddresses> {
        this.record('describeInstanceAddresses', instanceId)
        const n = instanceId.replace('i-fake-', '')
        const privateIp = `10.0.1.${n}`

        const checks = (this.addressChecks.get(instanceId) ?? 0) + 1
        this.addressChecks.set(instanceId, checks)

        const request = this.spotRequestOfInstance(instanceId)
        if (request && this.opts.withoutPublicIp?.includes(request.instanceType)) {
            return { privateIp }
        }
        if (checks <= (this.opts.publicIpDelayAttempts ?? 0)) {
            return { privateIp }
        }
        return { publicIp: `203.0.113.${n}`, privateIp }
    }

    async terminateInstances(instanceIds: string[]): Promise<void> {
        this.record('terminateInstances', instanceIds)
    }

    async waitForInstancesTerminated(instanceIds: string[], maxWaitSeconds: number): Promise<void> {
        this.record('waitForInstancesTerminated', instanceIds, maxWaitSeconds)
    }
}
