import { ClusterConfig } from './config/cluster'
import { cpuWorkerKey, gpuWorkerKey, MAIN_NODE_KEY } from './state/state'

export type NodeRole = 'main' | 'gpu-worker' | 'cpu-worker'

export interface PlannedNode {
    /** Ledger key, e.g. gpu_worker_0 */
    key: string
    role: NodeRole
    /** Instance Name tag */
    name: string
    instanceType: string
}

function workerName(clusterName: string, role: NodeRole, index: number, count: number): string {
    const base = `${clusterName}-k8s-${role}`
    return count > 1 ? `${base}-${index + 1}` : base
}

/**
 * Nodes of a cluster in join order: main node, GPU workers by index, then CPU workers by index
 */
export function planClusterNodes(clusterName: string, config: ClusterConfig): PlannedNode[] {
    const nodes: PlannedNode[] = [{
        key: MAIN_NODE_KEY,
        role: 'main',
        name: `${clusterName}-k8s-main`,
        instanceType: config.mainInstanceType,
    }]

    for (let i = 0; i < config.numGpuWorkers; i++) {
        nodes.push({
            key: gpuWorkerKey(i),
            role: 'gpu-worker',
            name: workerName(clusterName, 'gpu-worker', i, config.numGpuWorkers),
            instanceType: config.gpuInstanceType,
        })
    }

    for (let i = 0; i < config.numCpuWorkers; i++) {
        nodes.push({
            key: cpuWorkerKey(i),
            role: 'cpu-worker',
            name: workerName(clusterName, 'cpu-worker', i, config.numCpuWorkers),
            instanceType: config.workerInstanceType,
        })
    }

    return nodes
}
