import { getLogger } from '../../log/utils'
import { ClusterProviderApi, InstanceAddresses, SpotRequestStatus } from '../../core/provider'
import { NodeHandle } from '../../core/state/state'
import { Timings } from '../../core/config/interface'
import { pollUntil } from '../../core/polling'
import { SPOTKUBE_ERROR_CODES } from '../../core/errors/codes'
import { AllocationError, ProviderError } from '../../core/errors/taxonomy'
import { encodeUserData } from '../../core/bootstrap/user-data'
import { ErrorUtils } from '../../tools/error-utils'
import { AWS_SPOT, AWS_TAGS } from './constants'

export interface NodeLauncherArgs {
    provider: ClusterProviderApi
    timings: Timings
    /** Max hourly spot price (USD) */
    maxPrice: string
    /** Value of cluster tag set on every instance */
    clusterName: string
}

export interface LaunchRequest {
    /** Name tag of the instance */
    name: string
    instanceType: string
    subnetId: string
    securityGroupId: string
    /** Plain text boot script, encoded before submission */
    userData: string
    imageId: string
    keyName: string
}

const TERMINAL_FAILURE_STATUSES: ReadonlySet<string> = new Set<string>(AWS_SPOT.TERMINAL_FAILURE_STATUSES)

/**
 * Launches a single instance from a one-time spot request
 */
export class NodeLauncher {

    private readonly logger = getLogger(NodeLauncher.name)

    constructor(private readonly args: NodeLauncherArgs) {}

    /**
     * @throws AllocationError if the spot request fails or is not fulfilled in time.
     * Once submitted, a request whose launch fails is cancelled and its instance terminated.
     */
    async launch(req: LaunchRequest): Promise<NodeHandle> {
        const provider = this.args.provider

        this.logger.info(`Requesting spot instance ${req.instanceType} for ${req.name} (max price ${this.args.maxPrice})`)

        const spotRequestId = await provider.requestSpotInstance({
            imageId: req.imageId,
            instanceType: req.instanceType,
            keyName: req.keyName,
            subnetId: req.subnetId,
            securityGroupId: req.securityGroupId,
            userDataBase64: encodeUserData(req.userData),
            maxPrice: this.args.maxPrice,
        })
        this.logger.info(`Spot request ${spotRequestId} submitted for ${req.name}`)

        const allocated: { instanceId?: string } = {}
        try {
            return await this.completeLaunch(spotRequestId, req, allocated)
        } catch (error) {
            await this.releaseFailedLaunch(spotRequestId, allocated.instanceId, req.name)
            throw error
        }
    }

    /**
     * Wait for fulfilment, running state and public address of a submitted request.
     * Allocated instance ID is written to allocated as soon as it is known.
     */
    private async completeLaunch(spotRequestId: string, req: LaunchRequest, allocated: { instanceId?: string }): Promise<NodeHandle> {
        const provider = this.args.provider
        const timings = this.args.timings

        const instanceId = await this.waitForFulfilment(spotRequestId, req.name)
        allocated.instanceId = instanceId
        this.logger.info(`Spot request ${spotRequestId} fulfilled with instance ${instanceId}`)

        await provider.waitForInstanceRunning(instanceId, timings.instanceRunningMaxWaitSeconds)
        this.logger.info(`Instance ${instanceId} (${req.name}) is running`)

        await provider.tagInstance(instanceId, {
            [AWS_TAGS.NAME]: req.name,
            [AWS_TAGS.CLUSTER]: this.args.clusterName,
        })

        const observed: { addresses?: InstanceAddresses } = {}
        const addresses = await pollUntil(async () => {
            const current = await provider.describeInstanceAddresses(instanceId)
            observed.addresses = current
            return current.publicIp ? current : undefined
        }, { intervalMs: timings.publicIpPollIntervalMs, maxAttempts: timings.publicIpMaxAttempts })

        if (addresses.status === 'success') {
            this.logger.info(`Instance ${instanceId} (${req.name}) has public address ${addresses.value.publicIp}`)
            return {
                spotRequestId: spotRequestId,
                instanceId: instanceId,
                publicIp: addresses.value.publicIp,
                privateIp: addresses.value.privateIp,
            }
        }

        // recorded without public address, readiness checks on this node fail later
        this.logger.warn(`Instance ${instanceId} (${req.name}) has no public address after ${addresses.attempts} attempts`)
        return {
            spotRequestId: spotRequestId,
            instanceId: instanceId,
            privateIp: observed.addresses?.privateIp,
        }
    }

    /**
     * Cancel the spot request of a failed launch and terminate its instance if one was allocated.
     * Cleanup failures are only logged.
     */
    private async releaseFailedLaunch(spotRequestId: string, instanceId: string | undefined, nodeName: string): Promise<void> {
        const provider = this.args.provider

        this.logger.warn(`Launch of ${nodeName} failed, cancelling spot request ${spotRequestId}`)
        try {
            await provider.cancelSpotRequests([spotRequestId])
        } catch (error) {
            this.logger.warn(`Failed to cancel spot request ${spotRequestId}: ${ErrorUtils.extractErrorMessage(error)}`)
        }

        if (instanceId) {
            this.logger.warn(`Terminating instance ${instanceId} of failed launch ${nodeName}`)
            try {
                await provider.terminateInstances([instanceId])
            } catch (error) {
                this.logger.warn(`Failed to terminate instance ${instanceId}: ${ErrorUtils.extractErrorMessage(error)}`)
            }
        }
    }

    /**
     * Poll spot request until fulfilled.
     * @returns allocated instance ID
     * @throws AllocationError on terminal failure status or timeout
     */
    private async waitForFulfilment(spotRequestId: string, nodeName: string): Promise<string> {
        const observed: { status?: SpotRequestStatus } = {}

        const result = await pollUntil(async () => {
            const status = await this.args.provider.describeSpotRequest(spotRequestId)
            observed.status = status

            if (TERMINAL_FAILURE_STATUSES.has(status.code)) {
                throw new AllocationError(SPOTKUBE_ERROR_CODES.SPOT_REQUEST_FAILED, {
                    spotRequestId: spotRequestId,
                    nodeName: nodeName,
                    status: status.code,
                })
            }

            if (status.code !== AWS_SPOT.STATUS_FULFILLED) {
                this.logger.debug(`Spot request ${spotRequestId} for ${nodeName} is ${status.code}`)
                return undefined
            }

            if (!status.instanceId) {
                throw new ProviderError(SPOTKUBE_ERROR_CODES.PROVIDER_RESPONSE_INVALID, {
                    operation: 'DescribeSpotInstanceRequests',
                    reason: `request ${spotRequestId} fulfilled without instance ID`,
                })
            }
            return status.instanceId
        }, { intervalMs: this.args.timings.spotPollIntervalMs, timeoutMs: this.args.timings.spotFulfilmentTimeoutMs })

        if (result.status === 'timeout') {
            throw new AllocationError(SPOTKUBE_ERROR_CODES.SPOT_REQUEST_TIMEOUT, {
                spotRequestId: spotRequestId,
                nodeName: nodeName,
                timeoutSeconds: Math.round(this.args.timings.spotFulfilmentTimeoutMs / 1000),
                status: observed.status?.code ?? 'unknown',
            })
        }

        return result.value
    }
}
