/**
 * Core validation patterns
 * These patterns are compiled once and reused throughout the application
 */

export const CORE_VALIDATION_PATTERNS = {
    /** IPv4 CIDR block (e.g. '10.0.1.0/24', '0.0.0.0/0') */
    IP_V4_CIDR: /^((25[0-5]|(2[0-4]|1\d|[1-9]|)\d)\.){3}(25[0-5]|(2[0-4]|1\d|[1-9]|)\d)\/(3[0-2]|[12]?\d)$/,

    /** Cluster name, also used as a directory name */
    CLUSTER_NAME: /^[a-zA-Z0-9][a-zA-Z0-9_-]*$/,

    /** Logical node keys recorded in the ledger */
    NODE_KEY: /^(main_node|gpu_worker_\d+|cpu_worker_\d+)$/,

    /** Any API server URL on the kubeadm port, with an IPv4 host */
    KUBE_API_ENDPOINT: /https:\/\/[0-9.]+:6443/g,
} as const

export const CLUSTER_NAME_MAX_LENGTH = 63

/**
 * Validation utilities
 */
export class CoreValidators {
    static isValidIPv4Cidr(cidr: string): boolean {
        return typeof cidr === 'string' && CORE_VALIDATION_PATTERNS.IP_V4_CIDR.test(cidr)
    }

    /**
     * Validates cluster name format
     * @param name - The cluster name to validate
     * @returns true if name is usable both as a ledger directory and in resource names
     */
    static isValidClusterName(name: string): boolean {
        return typeof name === 'string' &&
               name.length > 0 &&
               name.length <= CLUSTER_NAME_MAX_LENGTH &&
               CORE_VALIDATION_PATTERNS.CLUSTER_NAME.test(name)
    }
}
