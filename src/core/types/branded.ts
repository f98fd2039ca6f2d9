/**
 * Branded types used across the provisioning workflow
 */

import { SPOTKUBE_ERROR_CODES } from '../errors/codes'
import { ConfigurationError } from '../errors/taxonomy'
import { CoreValidators } from '../validation/patterns'

/**
 * Brand utility type for creating type-safe branded types
 */
export type Brand<T, TBrand> = T & { readonly __brand: TBrand }

export type ClusterName = Brand<string, 'ClusterName'>

/**
 * Type creators validating and branding values in one step
 */
export class CoreBrandedTypeCreators {
    /**
     * Creates a branded cluster name
     * @throws ConfigurationError if the name cannot be used as a state directory
     */
    static createClusterName(value: string): ClusterName {
        if (!CoreValidators.isValidClusterName(value)) {
            throw new ConfigurationError(SPOTKUBE_ERROR_CODES.INVALID_CLUSTER_NAME, { clusterName: value })
        }
        return value as ClusterName
    }
}
