/**
 * spotkube core module
 */

// Orchestration
export { ClusterAssembler, defaultRemoteRunnerFactory } from './assembler';
export type { ClusterAssemblerArgs, ClusterSummary, CreateClusterArgs, NodeSummary, RemoteRunnerFactory } from './assembler';
export { TeardownCoordinator } from './teardown';
export type { TeardownCoordinatorArgs } from './teardown';
export { ReadinessProber, parseBootstrapStatus } from './readiness';
export type { BootstrapStatus, ReadinessProberArgs } from './readiness';
export { planClusterNodes } from './topology';
export type { NodeRole, PlannedNode } from './topology';

// Provider boundary
export type {
  ClusterProviderApi,
  IngressRule,
  InstanceAddresses,
  ProviderClientFactory,
  SpotLaunchSpec,
  SpotRequestStatus
} from './provider';

// Ledger
export * from './state';

// Configuration
export * from './config';

// Helpers
export { rewriteApiEndpoint } from './kubeconfig';
export { renderMainUserData, renderWorkerUserData, encodeUserData } from './bootstrap/user-data';
export { pollUntil, sleep } from './polling';
export type { PollOptions, PollResult } from './polling';

// Branded types
export type { Brand, ClusterName } from './types/branded';
export { CoreBrandedTypeCreators } from './types/branded';

// Validation patterns
export { CoreValidators, CORE_VALIDATION_PATTERNS, CLUSTER_NAME_MAX_LENGTH } from './validation/patterns';
