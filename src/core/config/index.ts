/**
 * Core configuration module
 *
 * @description Runtime configuration (data directory, timings) and the
 * per-cluster configuration file read by `create`.
 */

export { CoreConfigSchema, TimingsSchema, type CoreConfig, type Timings } from './interface'
export { ConfigLoader, DEFAULT_CORE_CONFIG, DEFAULT_TIMINGS } from './default'
export {
    ClusterConfigFileSchema,
    loadClusterConfig,
    parseClusterConfig,
    expandHomePath,
    type ClusterConfig,
} from './cluster'
