/**
 * Error codes raised by spotkube.
 * Every code is registered in ErrorCodeRegistry when this module loads.
 */

import { ErrorCategory, ErrorCode, ErrorCodeRegistry, ErrorSeverity } from './taxonomy';

export const SPOTKUBE_ERROR_CODES = {
  CONFIG_FILE_NOT_FOUND: {
    code: 'SK_CONFIG_FILE_NOT_FOUND',
    category: ErrorCategory.CONFIGURATION,
    severity: ErrorSeverity.CRITICAL,
    message: 'Config file {path} not found',
    suggestions: ['Pass an existing configuration file with --config']
  },
  CONFIG_INVALID_JSON: {
    code: 'SK_CONFIG_INVALID_JSON',
    category: ErrorCategory.CONFIGURATION,
    severity: ErrorSeverity.CRITICAL,
    message: 'Config file {path} is not valid JSON: {reason}'
  },
  CONFIG_INVALID: {
    code: 'SK_CONFIG_INVALID',
    category: ErrorCategory.CONFIGURATION,
    severity: ErrorSeverity.CRITICAL,
    message: 'Config file {path} is invalid: {issues}',
    possibleCauses: ['A required field is missing', 'A CIDR block or worker count has the wrong format']
  },
  CONFIG_REGION_MISMATCH: {
    code: 'SK_CONFIG_REGION_MISMATCH',
    category: ErrorCategory.CONFIGURATION,
    severity: ErrorSeverity.CRITICAL,
    message: "Cluster '{clusterName}' was started in region {recordedRegion} but configuration targets {configuredRegion}",
    suggestions: ['Resume the cluster with the configuration it was created with']
  },
  INVALID_CLUSTER_NAME: {
    code: 'SK_INVALID_CLUSTER_NAME',
    category: ErrorCategory.CONFIGURATION,
    severity: ErrorSeverity.CRITICAL,
    message: "Invalid cluster name '{clusterName}': use letters, digits, '-' and '_' (max 63 characters)"
  },
  CLUSTER_ALREADY_EXISTS: {
    code: 'SK_CLUSTER_ALREADY_EXISTS',
    category: ErrorCategory.STATE,
    severity: ErrorSeverity.CRITICAL,
    message: "Cluster '{clusterName}' already exists",
    suggestions: ['Delete it first or pick another name']
  },
  CLUSTER_NOT_FOUND: {
    code: 'SK_CLUSTER_NOT_FOUND',
    category: ErrorCategory.STATE,
    severity: ErrorSeverity.CRITICAL,
    message: "Cluster '{clusterName}' not found"
  },
  KUBECONFIG_NOT_FOUND: {
    code: 'SK_KUBECONFIG_NOT_FOUND',
    category: ErrorCategory.STATE,
    severity: ErrorSeverity.ERROR,
    message: "Kubeconfig for cluster '{clusterName}' not found",
    suggestions: ['Run create again to finish provisioning']
  },
  STATE_UNREADABLE: {
    code: 'SK_STATE_UNREADABLE',
    category: ErrorCategory.STATE,
    severity: ErrorSeverity.CRITICAL,
    message: 'Ledger {path} is unreadable: {reason}'
  },
  STATE_WRITE_FAILED: {
    code: 'SK_STATE_WRITE_FAILED',
    category: ErrorCategory.STATE,
    severity: ErrorSeverity.CRITICAL,
    message: 'Failed to persist ledger {path}: {reason}'
  },
  NODE_NOT_LAUNCHED: {
    code: 'SK_NODE_NOT_LAUNCHED',
    category: ErrorCategory.STATE,
    severity: ErrorSeverity.CRITICAL,
    message: "Node {nodeKey} of cluster '{clusterName}' has no instance in ledger"
  },
  SPOT_REQUEST_FAILED: {
    code: 'SK_SPOT_REQUEST_FAILED',
    category: ErrorCategory.ALLOCATION,
    severity: ErrorSeverity.CRITICAL,
    message: 'Spot request {spotRequestId} for {nodeName} failed: {status}',
    possibleCauses: ['Spot price ceiling below current market price', 'Instance type not offered in availability zone'],
    suggestions: ['Raise spot_max_price or choose another instance type']
  },
  SPOT_REQUEST_TIMEOUT: {
    code: 'SK_SPOT_REQUEST_TIMEOUT',
    category: ErrorCategory.ALLOCATION,
    severity: ErrorSeverity.CRITICAL,
    message: 'Spot request {spotRequestId} for {nodeName} not fulfilled after {timeoutSeconds}s (last status: {status})'
  },
  PROVIDER_RESPONSE_INVALID: {
    code: 'SK_PROVIDER_RESPONSE_INVALID',
    category: ErrorCategory.PROVIDER,
    severity: ErrorSeverity.CRITICAL,
    message: 'Unexpected provider response for {operation}: {reason}'
  },
  NODE_UNREACHABLE: {
    code: 'SK_NODE_UNREACHABLE',
    category: ErrorCategory.READINESS,
    severity: ErrorSeverity.ERROR,
    message: 'Host {host} not reachable over SSH after {timeoutSeconds}s',
    suggestions: ['Check allowed_ingress covers your address', 'Run create again to resume']
  },
  NODE_WITHOUT_PUBLIC_ADDRESS: {
    code: 'SK_NODE_WITHOUT_PUBLIC_ADDRESS',
    category: ErrorCategory.READINESS,
    severity: ErrorSeverity.ERROR,
    message: 'Node {nodeKey} ({instanceId}) has no public address'
  },
  BOOTSTRAP_FAILED: {
    code: 'SK_BOOTSTRAP_FAILED',
    category: ErrorCategory.BOOTSTRAP,
    severity: ErrorSeverity.ERROR,
    message: 'cloud-init failed on {host}: {reason}',
    suggestions: ['Inspect /var/log/cloud-init-output.log on the node']
  },
  REMOTE_COMMAND_FAILED: {
    code: 'SK_REMOTE_COMMAND_FAILED',
    category: ErrorCategory.REMOTE,
    severity: ErrorSeverity.ERROR,
    message: "Command '{command}' failed on {host} with exit code {exitCode}: {stderr}"
  },
  JOIN_COMMAND_EMPTY: {
    code: 'SK_JOIN_COMMAND_EMPTY',
    category: ErrorCategory.REMOTE,
    severity: ErrorSeverity.ERROR,
    message: 'kubeadm returned an empty join command on {host}'
  },
  TERMINATE_FAILED: {
    code: 'SK_TERMINATE_FAILED',
    category: ErrorCategory.TEARDOWN,
    severity: ErrorSeverity.CRITICAL,
    message: 'Failed to terminate instances {instanceIds}: {reason}'
  }
} satisfies Record<string, ErrorCode>;

for (const errorCode of Object.values(SPOTKUBE_ERROR_CODES)) {
  ErrorCodeRegistry.register(errorCode);
}
