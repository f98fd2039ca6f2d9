/**
 * AWS configuration constants
 * Centralizes AWS-specific timings and magic values
 */

/**
 * AWS timeout and polling configuration
 */
export const AWS_TIMEOUTS = {
    /** Interval between two spot request status checks (milliseconds) */
    SPOT_POLL_INTERVAL_MS: 5_000,

    /** Time allowed for a spot request to be fulfilled (milliseconds) */
    SPOT_FULFILMENT_TIMEOUT_MS: 10 * 60_000,

    /** Max wait for an instance to reach running state (seconds) */
    INSTANCE_RUNNING_MAX_WAIT_SECONDS: 600,

    /** Max wait for instances to reach terminated state (seconds) */
    INSTANCE_TERMINATED_MAX_WAIT_SECONDS: 900,

    /** Interval between two public address checks (milliseconds) */
    PUBLIC_IP_POLL_INTERVAL_MS: 1_000,

    /** Number of public address checks before proceeding without one */
    PUBLIC_IP_MAX_ATTEMPTS: 30,
} as const

/**
 * Spot request configuration and status codes
 * See https://docs.aws.amazon.com/AWSEC2/latest/UserGuide/spot-request-status.html
 */
export const AWS_SPOT = {
    DEFAULT_MAX_PRICE: "1.0",

    REQUEST_TYPE: "one-time",

    STATUS_FULFILLED: "fulfilled",

    /** Status codes after which a request will never be fulfilled */
    TERMINAL_FAILURE_STATUSES: ["price-too-low", "canceled-before-fulfillment", "bad-parameters"],
} as const

/**
 * Tag keys applied to cluster resources
 */
export const AWS_TAGS = {
    NAME: "Name",
    CLUSTER: "spotkube:cluster",
} as const
