import { getLogger } from '../log/utils'
import { CoreConfig } from './config/interface'
import { ProviderClientFactory } from './provider'
import { ClusterLedger } from './state/ledger'
import { listNodeHandles } from './state/state'
import { SPOTKUBE_ERROR_CODES } from './errors/codes'
import { StateError, TeardownError } from './errors/taxonomy'
import { ErrorUtils } from '../tools/error-utils'
import { CoreBrandedTypeCreators } from './types/branded'

export interface TeardownCoordinatorArgs {
    coreConfig: CoreConfig
    providerFactory: ProviderClientFactory
}

/**
 * Hard reclaim of every resource recorded for a cluster. Nodes are not drained.
 */
export class TeardownCoordinator {

    private readonly logger = getLogger(TeardownCoordinator.name)
    private readonly ledger: ClusterLedger

    constructor(private readonly args: TeardownCoordinatorArgs) {
        this.ledger = new ClusterLedger(args.coreConfig.dataDir)
    }

    /**
     * @throws ConfigurationError if name is not a valid cluster name
     * @throws StateError if cluster has no ledger
     * @throws TeardownError if instances could not be terminated, ledger is then kept
     */
    async delete(name: string): Promise<void> {
        const clusterName = CoreBrandedTypeCreators.createClusterName(name)
        const record = await this.ledger.load(clusterName)
        if (!record) {
            throw new StateError(SPOTKUBE_ERROR_CODES.CLUSTER_NOT_FOUND, { clusterName: clusterName })
        }

        this.logger.info(`Deleting cluster ${clusterName} in ${record.region}`)

        const provider = this.args.providerFactory(record.region)
        const nodes = listNodeHandles(record)
        const instanceIds = nodes.map(n => n.node.instanceId)
        const spotRequestIds = nodes.map(n => n.node.spotRequestId)

        if (instanceIds.length > 0) {
            this.logger.info(`Terminating instances ${instanceIds.join(', ')}`)
            try {
                await provider.terminateInstances(instanceIds)
                await provider.waitForInstancesTerminated(instanceIds, this.args.coreConfig.timings.instanceTerminatedMaxWaitSeconds)
            } catch (error) {
                throw new TeardownError(
                    SPOTKUBE_ERROR_CODES.TERMINATE_FAILED,
                    { instanceIds: instanceIds, reason: ErrorUtils.extractErrorMessage(error) },
                    ErrorUtils.toError(error)
                )
            }
            this.logger.info(`Instances terminated`)
        }

        if (spotRequestIds.length > 0) {
            this.logger.info(`Cancelling spot requests ${spotRequestIds.join(', ')}`)
            try {
                await provider.cancelSpotRequests(spotRequestIds)
            } catch (error) {
                this.logger.warn(`Failed to cancel spot requests: ${ErrorUtils.extractErrorMessage(error)}`)
            }
        }

        if (record.network) {
            const { securityGroupId, subnetId } = record.network

            try {
                await provider.deleteSecurityGroup(securityGroupId)
                this.logger.info(`Deleted security group ${securityGroupId}`)
            } catch (error) {
                this.logger.warn(`Failed to delete security group ${securityGroupId}: ${ErrorUtils.extractErrorMessage(error)}`)
            }

            try {
                await provider.deleteSubnet(subnetId)
                this.logger.info(`Deleted subnet ${subnetId}`)
            } catch (error) {
                this.logger.warn(`Failed to delete subnet ${subnetId}: ${ErrorUtils.extractErrorMessage(error)}`)
            }
        }

        await this.ledger.delete(clusterName)
        this.logger.info(`Cluster ${clusterName} deleted`)
    }
}
