import { KUBE_API_PORT } from './const'
import { CORE_VALIDATION_PATTERNS } from './validation/patterns'

/**
 * Point every API server URL of a kubeadm admin kubeconfig to the main node public address.
 * kubeadm writes the node private address, unreachable from outside the VPC.
 */
export function rewriteApiEndpoint(kubeconfig: string, mainPublicIp: string): string {
    return kubeconfig.replace(CORE_VALIDATION_PATTERNS.KUBE_API_ENDPOINT, `https://${mainPublicIp}:${KUBE_API_PORT}`)
}
