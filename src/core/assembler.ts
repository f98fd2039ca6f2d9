import * as fs from 'fs'
import { getLogger } from '../log/utils'
import { CoreConfig } from './config/interface'
import { ClusterConfig, loadClusterConfig } from './config/cluster'
import { ProviderClientFactory } from './provider'
import { ClusterLedger } from './state/ledger'
import {
    ClusterRecord,
    isClusterComplete,
    isNodeLaunched,
    isWorkerJoined,
    MAIN_NODE_KEY,
    newClusterRecord,
    NodeHandle,
    withKubeconfigPath,
    withNetwork,
    withNode,
    withWorkerJoined,
} from './state/state'
import { PlannedNode, planClusterNodes } from './topology'
import { ReadinessProber } from './readiness'
import { rewriteApiEndpoint } from './kubeconfig'
import { renderMainUserData, renderWorkerUserData } from './bootstrap/user-data'
import { CoreBrandedTypeCreators } from './types/branded'
import { SPOTKUBE_ERROR_CODES } from './errors/codes'
import { ConfigurationError, ReadinessError, RemoteCommandError, StateError } from './errors/taxonomy'
import { KUBEADM_ADMIN_CONF_PATH } from './const'
import { NetworkProvisioner } from '../providers/aws/network'
import { NodeLauncher } from '../providers/aws/launcher'
import { RemoteCommandRunner, runChecked, SshClient } from '../tools/ssh'

export type RemoteRunnerFactory = (config: ClusterConfig) => RemoteCommandRunner

export interface ClusterAssemblerArgs {
    coreConfig: CoreConfig
    providerFactory: ProviderClientFactory
    /** Defaults to ssh with configured user and key */
    remoteRunnerFactory?: RemoteRunnerFactory
    now?: () => Date
}

export interface CreateClusterArgs {
    clusterName: string
    configPath: string
}

export interface NodeSummary {
    key: string
    instanceId: string
    publicIp?: string
    privateIp?: string
}

export interface ClusterSummary {
    clusterName: string
    region: string
    main: NodeSummary
    workers: NodeSummary[]
    kubeconfigPath: string
}

export const defaultRemoteRunnerFactory: RemoteRunnerFactory = (config) =>
    new SshClient({ user: config.sshUser, privateKeyPath: config.keyPath })

/**
 * Context of a single create run
 */
interface AssemblyRun {
    clusterName: string
    config: ClusterConfig
    runner: RemoteCommandRunner
    prober: ReadinessProber
}

/**
 * Drives cluster creation to completion. Every step is gated on the ledger and
 * persisted as soon as it succeeds, so an interrupted run resumes where it stopped.
 */
export class ClusterAssembler {

    private readonly logger = getLogger(ClusterAssembler.name)
    private readonly ledger: ClusterLedger

    constructor(private readonly args: ClusterAssemblerArgs) {
        this.ledger = new ClusterLedger(args.coreConfig.dataDir)
    }

    async create(createArgs: CreateClusterArgs): Promise<ClusterSummary> {
        const clusterName = CoreBrandedTypeCreators.createClusterName(createArgs.clusterName)
        const now = this.args.now ?? (() => new Date())
        const timings = this.args.coreConfig.timings

        // 1. completed clusters are never re-created, interrupted ones are resumed
        const existing = await this.ledger.load(clusterName)
        if (existing && isClusterComplete(existing)) {
            throw new StateError(SPOTKUBE_ERROR_CODES.CLUSTER_ALREADY_EXISTS, { clusterName: clusterName })
        }

        // 2. configuration and clients
        const config = await loadClusterConfig(createArgs.configPath)
        if (existing && existing.region !== config.region) {
            throw new ConfigurationError(SPOTKUBE_ERROR_CODES.CONFIG_REGION_MISMATCH, {
                clusterName: clusterName,
                recordedRegion: existing.region,
                configuredRegion: config.region,
            })
        }

        const provider = this.args.providerFactory(config.region)
        const runner = (this.args.remoteRunnerFactory ?? defaultRemoteRunnerFactory)(config)
        const run: AssemblyRun = {
            clusterName: clusterName,
            config: config,
            runner: runner,
            prober: new ReadinessProber({ runner: runner, pollIntervalMs: timings.sshPollIntervalMs }),
        }

        // 3. ledger
        let record: ClusterRecord
        if (existing) {
            this.logger.info(`Resuming creation of cluster ${clusterName}`)
            record = existing
        } else {
            this.logger.info(`Creating cluster ${clusterName} in ${config.region}`)
            record = newClusterRecord(clusterName, config.region, now())
            await this.ledger.save(record)
        }

        // 4. boot image
        const imageId = await provider.getParameter(config.amiSsmParameter)
        this.logger.info(`Using image ${imageId} from ${config.amiSsmParameter}`)

        // 5. network
        const network = await new NetworkProvisioner({ provider: provider, now: now })
            .ensureNetwork(config.region, config.vpcCidrBlock, config.allowedIngress, record)
        if (!record.network) {
            record = withNetwork(record, network)
            await this.ledger.save(record)
        }

        // 6. nodes
        const plan = planClusterNodes(clusterName, config)
        const launcher = new NodeLauncher({
            provider: provider,
            timings: timings,
            maxPrice: config.spotMaxPrice,
            clusterName: clusterName,
        })
        record = await this.launchPendingNodes(run, record, plan, (node) => launcher.launch({
            name: node.name,
            instanceType: node.instanceType,
            subnetId: network.subnetId,
            securityGroupId: network.securityGroupId,
            userData: this.renderUserData(node, config),
            imageId: imageId,
            keyName: config.keyName,
        }))

        // 7. main node readiness
        const mainHost = await this.waitNodeReady(run, record, MAIN_NODE_KEY)

        // 8-9. workers join one by one
        const pendingWorkers = plan.filter(node => node.role !== 'main' && !isWorkerJoined(record, node.key))
        if (pendingWorkers.length > 0) {
            const joinCommand = await this.getJoinCommand(run, mainHost)

            for (const worker of plan.filter(node => node.role !== 'main')) {
                if (isWorkerJoined(record, worker.key)) {
                    this.logger.info(`Worker ${worker.key} already joined`)
                    continue
                }

                const workerHost = await this.waitNodeReady(run, record, worker.key)

                this.logger.info(`Joining worker ${worker.key} (${workerHost}) to cluster`)
                await runChecked(run.runner, workerHost, `sudo ${joinCommand}`)

                record = withWorkerJoined(record, worker.key)
                await this.ledger.save(record)
                this.logger.info(`Worker ${worker.key} joined`)
            }
        } else {
            this.logger.info(`No worker left to join`)
        }

        // 10. credentials
        if (!record.kubeconfigPath) {
            const kubeconfigPath = await this.fetchKubeconfig(run, mainHost)
            record = withKubeconfigPath(record, kubeconfigPath)
            await this.ledger.save(record)
        }

        // 11. report
        const summary = this.summarize(record, plan)
        this.logger.info(`Cluster ${clusterName} ready, kubeconfig: ${summary.kubeconfigPath}`)
        return summary
    }

    /**
     * Launch every planned node missing from the ledger concurrently.
     * Launch tasks hand their result to a single persist queue which applies and saves
     * one node at a time. Once all launches settled, the first failure is rethrown.
     */
    private async launchPendingNodes(
        run: AssemblyRun,
        record: ClusterRecord,
        plan: PlannedNode[],
        launch: (node: PlannedNode) => Promise<NodeHandle>
    ): Promise<ClusterRecord> {
        const pending = plan.filter(node => !isNodeLaunched(record, node.key))
        if (pending.length === 0) {
            this.logger.info(`All ${plan.length} nodes of ${run.clusterName} already launched`)
            return record
        }

        this.logger.info(`Launching ${pending.length} node(s): ${pending.map(n => n.key).join(', ')}`)

        let current = record
        let persistQueue: Promise<void> = Promise.resolve()

        const persistNode = (key: string, handle: NodeHandle): Promise<void> => {
            const persisted = persistQueue.then(async () => {
                current = withNode(current, key, handle)
                await this.ledger.save(current)
                this.logger.info(`Node ${key} recorded (instance ${handle.instanceId})`)
            })
            // failure is reported to the launch awaiting it, later nodes are still persisted
            persistQueue = persisted.catch((error: unknown) => {
                this.logger.debug(`Persisting node ${key} failed`, error)
            })
            return persisted
        }

        const results = await Promise.allSettled(pending.map(async (node) => {
            const handle = await launch(node)
            await persistNode(node.key, handle)
        }))

        results.forEach((result, i) => {
            if (result.status === 'rejected') {
                this.logger.error(`Launch of ${pending[i].key} failed`, result.reason)
            }
        })

        const failure = results.find((result): result is PromiseRejectedResult => result.status === 'rejected')
        if (failure) {
            throw failure.reason
        }

        return current
    }

    private renderUserData(node: PlannedNode, config: ClusterConfig): string {
        if (node.role === 'main') {
            return renderMainUserData({
                kubernetesVersion: config.kubernetesVersion,
                calicoVersion: config.calicoVersion,
                podCidr: config.podCidr,
                serviceCidr: config.serviceCidr,
            })
        }
        return renderWorkerUserData({
            kubernetesVersion: config.kubernetesVersion,
            nvidiaDriverVersion: config.nvidiaDriverVersion,
        })
    }

    /**
     * Wait until node is reachable and its bootstrap finished.
     * @returns node public address
     */
    private async waitNodeReady(run: AssemblyRun, record: ClusterRecord, key: string): Promise<string> {
        const node: NodeHandle | undefined = record.nodes[key]
        if (!node) {
            throw new StateError(SPOTKUBE_ERROR_CODES.NODE_NOT_LAUNCHED, { nodeKey: key, clusterName: run.clusterName })
        }

        const host = node.publicIp
        if (!host) {
            throw new ReadinessError(SPOTKUBE_ERROR_CODES.NODE_WITHOUT_PUBLIC_ADDRESS, { nodeKey: key, instanceId: node.instanceId })
        }

        const timeoutSeconds = this.args.coreConfig.timings.sshReachableTimeoutSeconds
        const reachable = await run.prober.waitForReachable(host, timeoutSeconds)
        if (!reachable) {
            throw new ReadinessError(SPOTKUBE_ERROR_CODES.NODE_UNREACHABLE, { host: host, timeoutSeconds: timeoutSeconds })
        }

        await run.prober.waitForBootstrapComplete(host)
        return host
    }

    private async getJoinCommand(run: AssemblyRun, mainHost: string): Promise<string> {
        this.logger.info(`Retrieving join command from ${mainHost}`)
        const result = await runChecked(run.runner, mainHost, "sudo kubeadm token create --print-join-command")
        const joinCommand = result.stdout.trim()
        if (!joinCommand) {
            throw new RemoteCommandError(SPOTKUBE_ERROR_CODES.JOIN_COMMAND_EMPTY, { host: mainHost })
        }
        return joinCommand
    }

    private async fetchKubeconfig(run: AssemblyRun, mainHost: string): Promise<string> {
        this.logger.info(`Retrieving kubeconfig from ${mainHost}`)
        const result = await runChecked(run.runner, mainHost, `sudo cat ${KUBEADM_ADMIN_CONF_PATH}`)

        const kubeconfigPath = this.ledger.kubeconfigFile(run.clusterName)
        await fs.promises.writeFile(kubeconfigPath, rewriteApiEndpoint(result.stdout, mainHost), { mode: 0o600 })
        await fs.promises.chmod(kubeconfigPath, 0o600)

        this.logger.info(`Kubeconfig written to ${kubeconfigPath}`)
        return kubeconfigPath
    }

    private summarize(record: ClusterRecord, plan: PlannedNode[]): ClusterSummary {
        const toSummary = (key: string): NodeSummary => {
            const node: NodeHandle | undefined = record.nodes[key]
            if (!node) {
                throw new StateError(SPOTKUBE_ERROR_CODES.NODE_NOT_LAUNCHED, { nodeKey: key, clusterName: record.clusterName })
            }
            return { key: key, instanceId: node.instanceId, publicIp: node.publicIp, privateIp: node.privateIp }
        }

        if (!record.kubeconfigPath) {
            throw new StateError(SPOTKUBE_ERROR_CODES.KUBECONFIG_NOT_FOUND, { clusterName: record.clusterName })
        }

        return {
            clusterName: record.clusterName,
            region: record.region,
            main: toSummary(MAIN_NODE_KEY),
            workers: plan.filter(node => node.role !== 'main').map(node => toSummary(node.key)),
            kubeconfigPath: record.kubeconfigPath,
        }
    }
}
