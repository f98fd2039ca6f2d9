import { getLogger } from '../../log/utils'
import { ClusterProviderApi, IngressRule } from '../../core/provider'
import { ClusterRecord, NetworkHandle } from '../../core/state/state'
import { KUBE_API_PORT, SSH_PORT, SPOTKUBE_APP_NAME } from '../../core/const'

export interface NetworkProvisionerArgs {
    provider: ClusterProviderApi
    /** Clock used to build unique security group names */
    now?: () => Date
}

/**
 * Subnet lives in the first availability zone of the region
 */
export function firstAvailabilityZone(region: string): string {
    return `${region}a`
}

export function securityGroupName(clusterName: string, now: Date): string {
    return `${SPOTKUBE_APP_NAME}-${clusterName}-${Math.floor(now.getTime() / 1000)}`
}

export function clusterIngressRules(allowedIngressCidr: string): IngressRule[] {
    return [
        { kind: 'same-group' },
        { kind: 'cidr', protocol: 'tcp', port: SSH_PORT, cidr: allowedIngressCidr },
        { kind: 'cidr', protocol: 'tcp', port: KUBE_API_PORT, cidr: allowedIngressCidr },
    ]
}

/**
 * Creates the subnet and security group shared by all cluster nodes, once per cluster.
 * Provider calls are not retried, any failure aborts provisioning.
 */
export class NetworkProvisioner {

    private readonly logger = getLogger(NetworkProvisioner.name)

    constructor(private readonly args: NetworkProvisionerArgs) {}

    async ensureNetwork(region: string, cidrBlock: string, allowedIngressCidr: string, record: ClusterRecord): Promise<NetworkHandle> {
        if (record.network) {
            this.logger.info(`Network already provisioned for ${record.clusterName}: subnet ${record.network.subnetId}, security group ${record.network.securityGroupId}`)
            return record.network
        }

        const provider = this.args.provider
        const now = this.args.now ?? (() => new Date())

        this.logger.info(`Provisioning network for ${record.clusterName} in ${region}`)

        const vpcId = await provider.getDefaultVpcId()
        this.logger.debug(`Using default VPC ${vpcId}`)

        const zone = firstAvailabilityZone(region)
        const subnetId = await provider.createSubnet(vpcId, cidrBlock, zone)
        this.logger.info(`Created subnet ${subnetId} (${cidrBlock}) in ${zone}`)

        await provider.enableSubnetPublicIp(subnetId)

        const groupName = securityGroupName(record.clusterName, now())
        const securityGroupId = await provider.createSecurityGroup(groupName, `Kubernetes cluster ${record.clusterName}`, vpcId)
        this.logger.info(`Created security group ${securityGroupId} (${groupName})`)

        await provider.authorizeIngress(securityGroupId, clusterIngressRules(allowedIngressCidr))
        this.logger.debug(`Authorized ingress on ${securityGroupId} from ${allowedIngressCidr} and cluster members`)

        return { vpcId, subnetId, securityGroupId }
    }
}
