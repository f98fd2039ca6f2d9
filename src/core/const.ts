export const SPOTKUBE_APP_NAME = "spotkube"
export const SPOTKUBE_VERSION = "0.1.0"

/** Environment variables */
export const ENV_LOG_LEVEL = "SPOTKUBE_LOG_LEVEL"
export const ENV_XDG_DATA_HOME = "XDG_DATA_HOME"

/** Per-cluster state directory content */
export const LEDGER_FILE_NAME = "cluster-resources.json"
export const KUBECONFIG_FILE_NAME = "kubeconfig"

export const DEFAULT_CONFIG_FILE = "cluster-config.json"

export const KUBE_API_PORT = 6443
export const SSH_PORT = 22
export const DEFAULT_SSH_USER = "ubuntu"

/** Path of admin kubeconfig written by kubeadm init on the main node */
export const KUBEADM_ADMIN_CONF_PATH = "/etc/kubernetes/admin.conf"

/**
 * Readiness probing timings
 */
export const READINESS_TIMEOUTS = {
    /** Interval between two SSH connection attempts (milliseconds) */
    SSH_POLL_INTERVAL_MS: 5_000,

    /** Time allowed for a freshly booted node to accept SSH sessions (seconds) */
    SSH_REACHABLE_TIMEOUT_SECONDS: 300,

    /** Timeout applied to the SSH process of a single probe (milliseconds) */
    SSH_PROBE_COMMAND_TIMEOUT_MS: 15_000,

    /** Timeout applied to long-running remote commands such as kubeadm join (milliseconds) */
    REMOTE_COMMAND_TIMEOUT_MS: 30 * 60_000,
} as const

/**
 * Kubernetes bootstrap defaults, used when cluster configuration does not override them
 */
export const KUBERNETES_DEFAULTS = {
    KUBERNETES_VERSION: "v1.35",
    CALICO_VERSION: "v3.31.3",
    NVIDIA_DRIVER_VERSION: "580",
    POD_CIDR: "10.100.0.0/16",
    SERVICE_CIDR: "10.101.0.0/16",
} as const
