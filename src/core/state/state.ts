import { z } from "zod"
import { CORE_VALIDATION_PATTERNS } from "../validation/patterns"

export const CLUSTER_RECORD_VERSION = "1"

export const MAIN_NODE_KEY = "main_node"

export function gpuWorkerKey(index: number): string {
    return `gpu_worker_${index}`
}

export function cpuWorkerKey(index: number): string {
    return `cpu_worker_${index}`
}

export const NetworkHandleSchema = z.object({
    vpcId: z.string().min(1).describe("Network (VPC) ID"),
    subnetId: z.string().min(1).describe("Cluster subnet ID"),
    securityGroupId: z.string().min(1).describe("Cluster security group ID"),
})

export const NodeHandleSchema = z.object({
    spotRequestId: z.string().min(1).describe("Spot request the instance was allocated from"),
    instanceId: z.string().min(1).describe("Instance ID"),
    publicIp: z.string().optional().describe("Public IPv4 address, absent when none was assigned in time"),
    privateIp: z.string().optional().describe("Private IPv4 address"),
})

const nodeKey = z.string().regex(CORE_VALIDATION_PATTERNS.NODE_KEY, { message: "Invalid node key (e.g. 'main_node', 'gpu_worker_0', 'cpu_worker_1')" })

export const ClusterRecordSchema = z.object({
    version: z.literal(CLUSTER_RECORD_VERSION),
    clusterName: z.string().min(1),
    createdAt: z.string().datetime().describe("Creation timestamp (ISO 8601)"),
    region: z.string().min(1),
    // all three IDs or nothing: partially written network is treated as not provisioned
    network: NetworkHandleSchema.optional().catch(undefined),
    nodes: z.record(nodeKey, NodeHandleSchema).default({}),
    joined: z.record(nodeKey, z.boolean()).default({}),
    kubeconfigPath: z.string().optional().describe("Retrieved admin kubeconfig, set once fetched"),
})

export type NetworkHandle = z.infer<typeof NetworkHandleSchema>
export type NodeHandle = z.infer<typeof NodeHandleSchema>
export type ClusterRecord = z.infer<typeof ClusterRecordSchema>

export function newClusterRecord(clusterName: string, region: string, now: Date = new Date()): ClusterRecord {
    return {
        version: CLUSTER_RECORD_VERSION,
        clusterName: clusterName,
        createdAt: now.toISOString(),
        region: region,
        nodes: {},
        joined: {},
    }
}

//
// Mutators never modify the given record
//

export function withNetwork(record: ClusterRecord, network: NetworkHandle): ClusterRecord {
    return { ...record, network: { ...network } }
}

export function withNode(record: ClusterRecord, key: string, node: NodeHandle): ClusterRecord {
    return { ...record, nodes: { ...record.nodes, [key]: { ...node } } }
}

export function withWorkerJoined(record: ClusterRecord, key: string): ClusterRecord {
    return { ...record, joined: { ...record.joined, [key]: true } }
}

export function withKubeconfigPath(record: ClusterRecord, kubeconfigPath: string): ClusterRecord {
    return { ...record, kubeconfigPath: kubeconfigPath }
}

//
// Queries
//

export function isNetworkProvisioned(record: ClusterRecord): boolean {
    return record.network !== undefined
}

export function isNodeLaunched(record: ClusterRecord, key: string): boolean {
    return record.nodes[key]?.instanceId !== undefined
}

export function isWorkerJoined(record: ClusterRecord, key: string): boolean {
    return record.joined[key] === true
}

export function isClusterComplete(record: ClusterRecord): boolean {
    return record.kubeconfigPath !== undefined
}

/**
 * Node handles in key order, main node first
 */
export function listNodeHandles(record: ClusterRecord): Array<{ key: string, node: NodeHandle }> {
    return Object.keys(record.nodes)
        .sort((a, b) => {
            if (a === MAIN_NODE_KEY) return -1
            if (b === MAIN_NODE_KEY) return 1
            return a.localeCompare(b, undefined, { numeric: true })
        })
        .map(key => ({ key: key, node: record.nodes[key] }))
}
