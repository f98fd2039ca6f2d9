import {
    AuthorizeSecurityGroupIngressCommand,
    CancelSpotInstanceRequestsCommand,
    CreateSecurityGroupCommand,
    CreateSubnetCommand,
    CreateTagsCommand,
    DeleteSecurityGroupCommand,
    DeleteSubnetCommand,
    DescribeInstancesCommand,
    DescribeSpotInstanceRequestsCommand,
    DescribeVpcsCommand,
    EC2Client,
    IpPermission,
    ModifySubnetAttributeCommand,
    RequestSpotInstancesCommand,
    TerminateInstancesCommand,
    waitUntilInstanceRunning,
    waitUntilInstanceTerminated,
} from '@aws-sdk/client-ec2'
import { GetParameterCommand, SSMClient } from '@aws-sdk/client-ssm'
import { getLogger, Logger } from '../../log/utils'
import { ErrorUtils } from '../../tools/error-utils'
import { SPOTKUBE_ERROR_CODES } from '../../core/errors/codes'
import { ProviderError } from '../../core/errors/taxonomy'
import {
    ClusterProviderApi,
    IngressRule,
    InstanceAddresses,
    SpotLaunchSpec,
    SpotRequestStatus,
} from '../../core/provider'
import { AWS_SPOT } from './constants'
import { AwsTypeGuards } from './type-guards'

export interface AwsClientArgs {
    region: string
    /** Injected clients, default to SDK clients built for region */
    ec2?: EC2Client
    ssm?: SSMClient
}

/**
 * Spot request status reported while a freshly created request is not yet visible
 */
const SPOT_REQUEST_NOT_FOUND_CODE = 'InvalidSpotInstanceRequestID.NotFound'
const SPOT_STATUS_NOT_YET_VISIBLE = 'pending-evaluation'

function invalidResponse(operation: string, reason: string): ProviderError {
    return new ProviderError(SPOTKUBE_ERROR_CODES.PROVIDER_RESPONSE_INVALID, { operation, reason })
}

/**
 * EC2 and SSM operations used by cluster provisioning, one client per region.
 */
export class AwsClient implements ClusterProviderApi {

    readonly region: string

    private readonly logger: Logger
    private readonly ec2: EC2Client
    private readonly ssm: SSMClient

    constructor(name: string, args: AwsClientArgs) {
        this.region = args.region
        this.logger = getLogger(name)
        this.ec2 = args.ec2 ?? new EC2Client({ region: args.region })
        this.ssm = args.ssm ?? new SSMClient({ region: args.region })
    }

    async getParameter(name: string): Promise<string> {
        this.logger.debug(`Reading SSM parameter ${name}`)
        const response = await ErrorUtils.wrapOperation(
            () => this.ssm.send(new GetParameterCommand({ Name: name })),
            `GetParameter ${name}`
        )
        const value = response.Parameter?.Value
        if (!value) {
            throw invalidResponse('GetParameter', `parameter ${name} has no value`)
        }
        return value
    }

    async getDefaultVpcId(): Promise<string> {
        const response = await ErrorUtils.wrapOperation(
            () => this.ec2.send(new DescribeVpcsCommand({ Filters: [{ Name: 'isDefault', Values: ['true'] }] })),
            'DescribeVpcs'
        )
        const vpcId = response.Vpcs?.[0]?.VpcId
        if (!vpcId) {
            throw invalidResponse('DescribeVpcs', `no default VPC in region ${this.region}`)
        }
        return vpcId
    }

    async createSubnet(vpcId: string, cidrBlock: string, availabilityZone: string): Promise<string> {
        const response = await ErrorUtils.wrapOperation(
            () => this.ec2.send(new CreateSubnetCommand({ VpcId: vpcId, CidrBlock: cidrBlock, AvailabilityZone: availabilityZone })),
            `CreateSubnet ${cidrBlock}`
        )
        const subnetId = response.Subnet?.SubnetId
        if (!subnetId) {
            throw invalidResponse('CreateSubnet', 'response has no subnet ID')
        }
        return subnetId
    }

    async enableSubnetPublicIp(subnetId: string): Promise<void> {
        await ErrorUtils.wrapOperation(
            () => this.ec2.send(new ModifySubnetAttributeCommand({ SubnetId: subnetId, MapPublicIpOnLaunch: { Value: true } })),
            `ModifySubnetAttribute ${subnetId}`
        )
    }

    async createSecurityGroup(name: string, description: string, vpcId: string): Promise<string> {
        const response = await ErrorUtils.wrapOperation(
            () => this.ec2.send(new CreateSecurityGroupCommand({ GroupName: name, Description: description, VpcId: vpcId })),
            `CreateSecurityGroup ${name}`
        )
        if (!response.GroupId) {
            throw invalidResponse('CreateSecurityGroup', 'response has no group ID')
        }
        return response.GroupId
    }

    async authorizeIngress(securityGroupId: string, rules: IngressRule[]): Promise<void> {
        const permissions: IpPermission[] = rules.map(rule => {
            switch (rule.kind) {
                case 'same-group':
                    return { IpProtocol: '-1', FromPort: -1, ToPort: -1, UserIdGroupPairs: [{ GroupId: securityGroupId }] }
                case 'cidr':
                    return { IpProtocol: rule.protocol, FromPort: rule.port, ToPort: rule.port, IpRanges: [{ CidrIp: rule.cidr }] }
            }
        })

        await ErrorUtils.wrapOperation(
            () => this.ec2.send(new AuthorizeSecurityGroupIngressCommand({ GroupId: securityGroupId, IpPermissions: permissions })),
            `AuthorizeSecurityGroupIngress ${securityGroupId}`
        )
    }

    async deleteSecurityGroup(securityGroupId: string): Promise<void> {
        await ErrorUtils.wrapOperation(
            () => this.ec2.send(new DeleteSecurityGroupCommand({ GroupId: securityGroupId })),
            `DeleteSecurityGroup ${securityGroupId}`
        )
    }

    async deleteSubnet(subnetId: string): Promise<void> {
        await ErrorUtils.wrapOperation(
            () => this.ec2.send(new DeleteSubnetCommand({ SubnetId: subnetId })),
            `DeleteSubnet ${subnetId}`
        )
    }

    async requestSpotInstance(launchSpec: SpotLaunchSpec): Promise<string> {
        const instanceType = launchSpec.instanceType
        if (!AwsTypeGuards.instanceType(instanceType)) {
            throw invalidResponse('RequestSpotInstances', `unknown instance type ${instanceType}`)
        }

        const response = await ErrorUtils.wrapOperation(
            () => this.ec2.send(new RequestSpotInstancesCommand({
                SpotPrice: launchSpec.maxPrice,
                InstanceCount: 1,
                Type: AWS_SPOT.REQUEST_TYPE,
                LaunchSpecification: {
                    ImageId: launchSpec.imageId,
                    InstanceType: instanceType,
                    KeyName: launchSpec.keyName,
                    SubnetId: launchSpec.subnetId,
                    SecurityGroupIds: [launchSpec.securityGroupId],
                    UserData: launchSpec.userDataBase64,
                },
            })),
            `RequestSpotInstances ${instanceType}`
        )

        const spotRequestId = response.SpotInstanceRequests?.[0]?.SpotInstanceRequestId
        if (!spotRequestId) {
            throw invalidResponse('RequestSpotInstances', 'response has no spot request ID')
        }
        return spotRequestId
    }

    async describeSpotRequest(spotRequestId: string): Promise<SpotRequestStatus> {
        try {
            const response = await this.ec2.send(new DescribeSpotInstanceRequestsCommand({ SpotInstanceRequestIds: [spotRequestId] }))
            const request = response.SpotInstanceRequests?.[0]
            const code = request?.Status?.Code
            if (!request || !code) {
                throw invalidResponse('DescribeSpotInstanceRequests', `no status for ${spotRequestId}`)
            }
            return { code: code, instanceId: request.InstanceId }
        } catch (error) {
            // New requests may not be visible yet
            if (ErrorUtils.getAwsErrorCode(error) === SPOT_REQUEST_NOT_FOUND_CODE) {
                this.logger.debug(`Spot request ${spotRequestId} not visible yet`)
                return { code: SPOT_STATUS_NOT_YET_VISIBLE }
            }
            if (error instanceof ProviderError) throw error
            throw ErrorUtils.createContextError(`DescribeSpotInstanceRequests ${spotRequestId}`, error)
        }
    }

    async cancelSpotRequests(spotRequestIds: string[]): Promise<void> {
        await ErrorUtils.wrapOperation(
            () => this.ec2.send(new CancelSpotInstanceRequestsCommand({ SpotInstanceRequestIds: spotRequestIds })),
            `CancelSpotInstanceRequests ${spotRequestIds.join(', ')}`
        )
    }

    async waitForInstanceRunning(instanceId: string, maxWaitSeconds: number): Promise<void> {
        await ErrorUtils.wrapOperation(
            () => waitUntilInstanceRunning({ client: this.ec2, maxWaitTime: maxWaitSeconds }, { InstanceIds: [instanceId] }),
            `Waiting for instance ${instanceId} to be running`
        )
    }

    async tagInstance(instanceId: string, tags: Record<string, string>): Promise<void> {
        await ErrorUtils.wrapOperation(
            () => this.ec2.send(new CreateTagsCommand({
                Resources: [instanceId],
                Tags: Object.entries(tags).map(([key, value]) => ({ Key: key, Value: value })),
            })),
            `CreateTags ${instanceId}`
        )
    }

    async describeInstanceAddresses(instanceId: string): Promise<InstanceAddresses> {
        const response = await ErrorUtils.wrapOperation(
            () => this.ec2.send(new DescribeInstancesCommand({ InstanceIds: [instanceId] })),
            `DescribeInstances ${instanceId}`
        )
        const instance = response.Reservations?.[0]?.Instances?.[0]
        if (!instance) {
            throw invalidResponse('DescribeInstances', `instance ${instanceId} not found`)
        }
        return {
            publicIp: instance.PublicIpAddress,
            privateIp: instance.PrivateIpAddress,
        }
    }

    async terminateInstances(instanceIds: string[]): Promise<void> {
        await ErrorUtils.wrapOperation(
            () => this.ec2.send(new TerminateInstancesCommand({ InstanceIds: instanceIds })),
            `TerminateInstances ${instanceIds.join(', ')}`
        )
    }

    async waitForInstancesTerminated(instanceIds: string[], maxWaitSeconds: number): Promise<void> {
        await ErrorUtils.wrapOperation(
            () => waitUntilInstanceTerminated({ client: this.ec2, maxWaitTime: maxWaitSeconds }, { InstanceIds: instanceIds }),
            `Waiting for instances ${instanceIds.join(', ')} to terminate`
        )
    }
}

/**
 * Default provider factory used by the CLI
 */
export function createAwsClient(region: string): AwsClient {
    return new AwsClient(AwsClient.name, { region })
}
